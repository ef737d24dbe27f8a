import { Module } from '@nestjs/common';
import { AdmissionModule } from '../admission/admission.module';
import { CounterStoreHealthIndicator } from './counter-store.health';
import { HealthController } from './health.controller';

@Module({
  imports: [AdmissionModule],
  controllers: [HealthController],
  providers: [CounterStoreHealthIndicator],
})
export class HealthModule {}
