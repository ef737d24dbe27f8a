import { Controller, Get, Header, Res } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { SkipAdmission } from '../admission/skip-admission.decorator';
import { AdmissionMetricsService } from './admission-metrics.service';

@ApiTags('Metrics')
@Controller('metrics')
@SkipAdmission()
export class MetricsController {
  constructor(private readonly metrics: AdmissionMetricsService) {}

  @Get()
  @Header('Cache-Control', 'no-store')
  @ApiOperation({ summary: 'Prometheus text exposition' })
  async scrape(@Res() res: Response): Promise<void> {
    res.setHeader('Content-Type', this.metrics.contentType);
    res.send(await this.metrics.getPrometheusMetrics());
  }
}
