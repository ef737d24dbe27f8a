import { Global, Module } from '@nestjs/common';
import { AdmissionMetricsService } from './admission-metrics.service';
import { MetricsController } from './metrics.controller';

@Global()
@Module({
  controllers: [MetricsController],
  providers: [AdmissionMetricsService],
  exports: [AdmissionMetricsService],
})
export class MetricsModule {}
