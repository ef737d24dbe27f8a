import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK, systemClock } from '../common/clock';
import { ADMISSION_OPTIONS, AdmissionOptions } from './admission.config';

/**
 * Exposes the typed admission options and the clock under injection tokens
 * so that tests can replace either without touching the environment.
 */
@Global()
@Module({
  providers: [
    {
      provide: ADMISSION_OPTIONS,
      useFactory: (config: ConfigService): AdmissionOptions =>
        config.getOrThrow<AdmissionOptions>('admission'),
      inject: [ConfigService],
    },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [ADMISSION_OPTIONS, CLOCK],
})
export class AdmissionConfigModule {}
