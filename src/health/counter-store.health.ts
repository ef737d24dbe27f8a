import { Inject, Injectable } from '@nestjs/common';
import { ADMISSION_OPTIONS, AdmissionOptions } from '../config/admission.config';
import { RedisService } from '../redis/redis.service';
import { HealthIndicatorResult } from './health.types';

@Injectable()
export class CounterStoreHealthIndicator {
  constructor(
    @Inject(ADMISSION_OPTIONS) private readonly options: AdmissionOptions,
    private readonly redisService: RedisService,
  ) {}

  async isHealthy(): Promise<HealthIndicatorResult> {
    const timestamp = new Date().toISOString();
    const { driver } = this.options.counterStore;

    if (driver === 'memory') {
      return {
        name: 'counter_store',
        status: 'up',
        message: 'In-process counter store',
        timestamp,
        details: { driver },
      };
    }

    const startTime = Date.now();
    const reachable = await this.redisService.ping();
    const latency = Date.now() - startTime;

    if (!reachable) {
      return {
        name: 'counter_store',
        status: 'down',
        message: `Redis is unreachable; admission fails ${this.options.failPolicy}`,
        timestamp,
        details: { driver, failPolicy: this.options.failPolicy },
      };
    }

    return {
      name: 'counter_store',
      status: latency > this.options.counterStore.timeoutMs ? 'degraded' : 'up',
      message:
        latency > this.options.counterStore.timeoutMs
          ? `Redis latency ${latency}ms exceeds the admission timeout`
          : 'Redis is healthy',
      timestamp,
      details: { driver, latency },
    };
  }
}
