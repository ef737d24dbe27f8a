import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { readFile } from 'fs/promises';
import { CLOCK, Clock } from '../common/clock';
import { ConfigurationError } from '../common/errors';
import { ADMISSION_OPTIONS, AdmissionOptions } from '../config/admission.config';
import { AdmissionMetricsService } from '../metrics/admission-metrics.service';
import { RulesDocumentDto } from './dto/rules-document.dto';
import { compileRulesDocument } from './rule-compiler';
import { CircuitBreakerConfig, RuleSnapshot } from './rule.types';

export const RULES_RELOADED = 'admission.rules.reloaded';
export const RULES_REJECTED = 'admission.rules.rejected';

export interface RulesReloadedEvent {
  version: string;
  previousVersion: string;
  source: string;
}

export interface RulesRejectedEvent {
  source: string;
  issues: readonly string[];
}

function flattenValidationErrors(
  errors: ValidationError[],
  parent = '',
): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (constraint) => `${path}: ${constraint}`,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Holds the active rule snapshot. A load either replaces the snapshot
 * entirely or leaves it untouched; readers holding the previous snapshot
 * keep a consistent view of it.
 */
@Injectable()
export class RuleStoreService implements OnModuleInit {
  private readonly logger = new Logger(RuleStoreService.name);
  private snapshot: RuleSnapshot;

  constructor(
    @Inject(ADMISSION_OPTIONS) private readonly options: AdmissionOptions,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly eventEmitter: EventEmitter2,
    private readonly metrics: AdmissionMetricsService,
  ) {
    this.snapshot = Object.freeze({
      version: 'empty',
      loadedAt: clock.now(),
      source: 'default',
      rateLimits: [],
      circuitBreakers: new Map<string, CircuitBreakerConfig>(),
      wafRules: [],
      hasRateDerivedWafRules: false,
    });
  }

  async onModuleInit(): Promise<void> {
    if (this.options.rules.path) {
      // A bad document at start-up is fatal.
      await this.loadFromFile(this.options.rules.path);
    } else {
      this.logger.warn('ADMISSION_RULES_PATH not set, starting with no rules');
    }
  }

  current(): RuleSnapshot {
    return this.snapshot;
  }

  /**
   * Validates and compiles `raw`, then swaps it in.
   *
   * @throws ConfigurationError listing every problem; the active snapshot
   * is unchanged in that case.
   */
  load(raw: unknown, source: string): RuleSnapshot {
    try {
      const next = this.compile(raw, source);
      const previous = this.snapshot;
      this.snapshot = next;

      this.metrics.recordRulesReload('success');
      this.logger.log(
        `Loaded rules ${next.version} from ${source} (${next.rateLimits.length} rate limits, ${next.circuitBreakers.size} breakers, ${next.wafRules.length} WAF rules)`,
      );
      const event: RulesReloadedEvent = {
        version: next.version,
        previousVersion: previous.version,
        source,
      };
      this.eventEmitter.emit(RULES_RELOADED, event);
      return next;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.metrics.recordRulesReload('rejected');
        this.logger.error(
          `Rejected rules from ${source}, keeping ${this.snapshot.version}: ${error.message}`,
        );
        const event: RulesRejectedEvent = { source, issues: error.issues };
        this.eventEmitter.emit(RULES_REJECTED, event);
      }
      throw error;
    }
  }

  async loadFromFile(path: string): Promise<RuleSnapshot> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const failure = new ConfigurationError(`Cannot read rules file ${path}`, [
        reason,
      ]);
      this.metrics.recordRulesReload('rejected');
      this.logger.error(failure.message);
      this.eventEmitter.emit(RULES_REJECTED, {
        source: path,
        issues: failure.issues,
      } satisfies RulesRejectedEvent);
      throw failure;
    }
    return this.load(raw, path);
  }

  /**
   * Re-reads the configured rules file.
   */
  async reload(): Promise<RuleSnapshot> {
    const path = this.options.rules.path;
    if (!path) {
      throw new ConfigurationError('No rules file configured', [
        'set ADMISSION_RULES_PATH to reload from a file',
      ]);
    }
    return this.loadFromFile(path);
  }

  private compile(raw: unknown, source: string): RuleSnapshot {
    if (!isPlainObject(raw)) {
      throw new ConfigurationError('Invalid rules document', [
        'document must be a JSON object',
      ]);
    }

    const document = plainToInstance(RulesDocumentDto, raw);
    const errors = validateSync(document, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });
    if (errors.length > 0) {
      throw new ConfigurationError(
        'Invalid rules document',
        flattenValidationErrors(errors),
      );
    }

    const result = compileRulesDocument(
      document,
      {
        defaultScope: this.options.defaultRateLimitScope,
        defaultCircuitBreaker: this.options.defaultCircuitBreaker,
      },
      { loadedAt: this.clock.now(), source },
    );
    if (!result.ok) {
      throw new ConfigurationError('Invalid rules document', result.issues);
    }
    return result.snapshot;
  }
}
