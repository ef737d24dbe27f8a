import { Controller, Get, HttpStatus, Res } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { SkipAdmission } from '../admission/skip-admission.decorator';
import { RuleStoreService } from '../rules/rule-store.service';
import { CounterStoreHealthIndicator } from './counter-store.health';
import { HealthReport } from './health.types';

@ApiTags('Health')
@Controller('health')
@SkipAdmission()
export class HealthController {
  constructor(
    private readonly counterStore: CounterStoreHealthIndicator,
    private readonly ruleStore: RuleStoreService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Counter store reachability' })
  @ApiResponse({ status: 200, description: 'Healthy or degraded' })
  @ApiResponse({ status: 503, description: 'Counter store down' })
  async check(@Res({ passthrough: true }) res: Response): Promise<HealthReport> {
    const counterStore = await this.counterStore.isHealthy();
    if (counterStore.status === 'down') {
      res.status(HttpStatus.SERVICE_UNAVAILABLE);
    }
    return {
      status: counterStore.status,
      rulesVersion: this.ruleStore.current().version,
      checks: [counterStore],
    };
  }
}
