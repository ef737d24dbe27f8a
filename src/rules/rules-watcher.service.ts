import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { FSWatcher, watch } from 'chokidar';
import { ADMISSION_OPTIONS, AdmissionOptions } from '../config/admission.config';
import { RuleStoreService } from './rule-store.service';

/**
 * Reloads the rules file when it changes on disk. Rejected documents are
 * logged by the rule store and leave the active rules in place.
 */
@Injectable()
export class RulesWatcherService
  implements OnApplicationBootstrap, OnModuleDestroy
{
  private readonly logger = new Logger(RulesWatcherService.name);
  private watcher?: FSWatcher;
  private reloadDebounceTimer?: NodeJS.Timeout;

  constructor(
    @Inject(ADMISSION_OPTIONS) private readonly options: AdmissionOptions,
    private readonly ruleStore: RuleStoreService,
  ) {}

  onApplicationBootstrap(): void {
    const { path, watch: enabled } = this.options.rules;
    if (!path || !enabled) {
      return;
    }

    this.watcher = watch(path, {
      ignoreInitial: true,
      awaitWriteFinish: {
        stabilityThreshold: 50,
        pollInterval: 10,
      },
    });
    this.watcher.on('change', () => this.handleChange());
    this.watcher.on('add', () => this.handleChange());
    this.watcher.on('error', (error) => {
      this.logger.error(`Watching ${path} failed: ${String(error)}`);
    });
    this.logger.log(`Watching ${path} for rule changes`);
  }

  async onModuleDestroy(): Promise<void> {
    if (this.reloadDebounceTimer) {
      clearTimeout(this.reloadDebounceTimer);
      this.reloadDebounceTimer = undefined;
    }
    await this.watcher?.close();
    this.watcher = undefined;
  }

  private handleChange(): void {
    if (this.reloadDebounceTimer) {
      clearTimeout(this.reloadDebounceTimer);
    }
    this.reloadDebounceTimer = setTimeout(() => {
      this.reloadDebounceTimer = undefined;
      this.ruleStore.reload().catch((error: unknown) => {
        this.logger.warn(
          `Rules file change not applied: ${error instanceof Error ? error.message : String(error)}`,
        );
      });
    }, this.options.rules.watchDebounceMs);
  }
}
