import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AdmissionModule } from './admission/admission.module';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { AdmissionConfigModule } from './config/admission-config.module';
import admissionConfig from './config/admission.config';
import { validateEnvironment } from './config/env.validation';
import { CounterStoreModule } from './counter-store/counter-store.module';
import { HealthModule } from './health/health.module';
import { LoggingModule } from './logging/logging.module';
import { MetricsModule } from './metrics/metrics.module';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [admissionConfig],
      validate: validateEnvironment,
    }),
    EventEmitterModule.forRoot(),
    AdmissionConfigModule,
    LoggingModule,
    MetricsModule,
    RedisModule,
    CounterStoreModule,
    AdmissionModule,
    HealthModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: AllExceptionsFilter }],
})
export class AppModule {}
