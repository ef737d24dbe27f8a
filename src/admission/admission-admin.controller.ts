/**
 * Admission Management Controller
 * Admin endpoints for inspecting and operating admission control
 */

import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  NotFoundException,
  Param,
  Post,
  Put,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CircuitBreakerMetrics } from '../circuit-breaker/circuit-breaker';
import { CircuitBreakerRegistry } from '../circuit-breaker/circuit-breaker.registry';
import { ConfigurationError, CounterStoreError } from '../common/errors';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { RulesDocumentDto } from '../rules/dto/rules-document.dto';
import { RuleStoreService } from '../rules/rule-store.service';
import { CircuitBreakerConfig, RuleSnapshot } from '../rules/rule.types';
import { ForceOpenDto } from './dto/force-open.dto';
import { SkipAdmission } from './skip-admission.decorator';

export interface RulesSummary {
  version: string;
  loadedAt: string;
  source: string;
  rateLimits: {
    id: string;
    algorithm: string;
    key: string;
    fallbackScope: string;
    limit: number;
    windowMs: number;
    burst: number;
    match: { routes: readonly string[]; methods: readonly string[]; backends: readonly string[] };
  }[];
  circuitBreakers: CircuitBreakerConfig[];
  wafRules: {
    id: string;
    priority: number;
    action: string;
    severity: string;
    rateDerived: boolean;
  }[];
}

function summarizeRules(snapshot: RuleSnapshot): RulesSummary {
  return {
    version: snapshot.version,
    loadedAt: new Date(snapshot.loadedAt).toISOString(),
    source: snapshot.source,
    rateLimits: snapshot.rateLimits.map((rule) => ({
      id: rule.id,
      algorithm: rule.algorithm,
      key: rule.key.source,
      fallbackScope: rule.fallback.source,
      limit: rule.limit,
      windowMs: rule.windowMs,
      burst: rule.burst,
      match: rule.match,
    })),
    circuitBreakers: [...snapshot.circuitBreakers.values()],
    wafRules: snapshot.wafRules.map((rule) => ({
      id: rule.id,
      priority: rule.priority,
      action: rule.action,
      severity: rule.severity,
      rateDerived: rule.rateDerived,
    })),
  };
}

function toBadRequest(error: unknown): unknown {
  if (error instanceof ConfigurationError) {
    return new BadRequestException({
      statusCode: 400,
      error: 'Bad Request',
      message: error.message,
      issues: error.issues,
    });
  }
  return error;
}

@ApiTags('Admission Management')
@Controller('admin/admission')
@SkipAdmission()
export class AdmissionAdminController {
  constructor(
    private readonly ruleStore: RuleStoreService,
    private readonly breakers: CircuitBreakerRegistry,
    private readonly rateLimiter: RateLimiterService,
  ) {}

  /**
   * Get the active rule snapshot
   */
  @Get('rules')
  @ApiOperation({ summary: 'Get the active rule set' })
  @ApiResponse({ status: 200, description: 'Active rule snapshot summary' })
  getRules(): RulesSummary {
    return summarizeRules(this.ruleStore.current());
  }

  /**
   * Reload rules from the configured file
   */
  @Post('rules/reload')
  @HttpCode(200)
  @ApiOperation({ summary: 'Reload rules from the configured file' })
  @ApiResponse({ status: 200, description: 'Rules reloaded' })
  @ApiResponse({ status: 400, description: 'Rule document rejected' })
  async reloadRules(): Promise<RulesSummary> {
    try {
      return summarizeRules(await this.ruleStore.reload());
    } catch (error) {
      throw toBadRequest(error);
    }
  }

  /**
   * Replace the rule document
   */
  @Put('rules')
  @ApiOperation({ summary: 'Replace the rule document' })
  @ApiBody({ type: RulesDocumentDto })
  @ApiResponse({ status: 200, description: 'Rules replaced' })
  @ApiResponse({ status: 400, description: 'Rule document rejected' })
  replaceRules(@Body() document: Record<string, unknown>): RulesSummary {
    try {
      return summarizeRules(this.ruleStore.load(document, 'admin-api'));
    } catch (error) {
      throw toBadRequest(error);
    }
  }

  /**
   * List circuit breakers
   */
  @Get('breakers')
  @ApiOperation({ summary: 'List circuit breakers known to this node' })
  @ApiResponse({ status: 200, description: 'Breaker states and statistics' })
  getBreakers(): CircuitBreakerMetrics[] {
    return this.breakers.getAllMetrics();
  }

  /**
   * Reset a circuit breaker
   */
  @Post('breakers/:backendId/reset')
  @HttpCode(200)
  @ApiOperation({ summary: 'Discard a breaker; it restarts closed' })
  @ApiResponse({ status: 200, description: 'Breaker reset' })
  resetBreaker(@Param('backendId') backendId: string): {
    backendId: string;
    reset: boolean;
  } {
    return { backendId, reset: this.breakers.reset(backendId) };
  }

  /**
   * Force a circuit breaker open
   */
  @Post('breakers/:backendId/open')
  @HttpCode(200)
  @ApiOperation({ summary: 'Force a breaker open' })
  @ApiResponse({ status: 200, description: 'Breaker opened' })
  forceOpen(
    @Param('backendId') backendId: string,
    @Body() body: ForceOpenDto,
  ): CircuitBreakerMetrics | null {
    this.breakers.forceOpen(
      backendId,
      body.reason || 'manual',
      this.ruleStore.current(),
    );
    return this.breakers.getMetrics(backendId);
  }

  /**
   * Reset a rate-limit counter
   */
  @Delete('rate-limits/:ruleId/:key')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Reset the counter of one rule and derived key',
    description:
      'The key is the one reported in admission decisions, e.g. id:client-a or scope:route:/orders',
  })
  @ApiResponse({ status: 200, description: 'Counter reset' })
  @ApiResponse({ status: 404, description: 'Unknown rule' })
  async resetCounter(
    @Param('ruleId') ruleId: string,
    @Param('key') key: string,
  ): Promise<{ ruleId: string; key: string; reset: true }> {
    const rule = this.ruleStore
      .current()
      .rateLimits.find((candidate) => candidate.id === ruleId);
    if (!rule) {
      throw new NotFoundException(`Unknown rate-limit rule ${ruleId}`);
    }

    try {
      await this.rateLimiter.reset(ruleId, key);
    } catch (error) {
      if (error instanceof CounterStoreError) {
        throw new ServiceUnavailableException(error.message);
      }
      throw error;
    }
    return { ruleId, key, reset: true };
  }
}
