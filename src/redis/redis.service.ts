import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { createClient } from 'redis';
import { CounterStoreUnavailableError } from '../common/errors';
import { ADMISSION_OPTIONS, AdmissionOptions } from '../config/admission.config';

export type RedisClient = ReturnType<typeof createClient>;

/**
 * The two commands the counter store needs, kept narrow so the store can be
 * exercised against an in-process fake.
 */
export interface ScriptingClient {
  get(key: string): Promise<string | null>;
  eval(
    script: string,
    options: { keys: string[]; arguments: string[] },
  ): Promise<unknown>;
}

export interface ScriptingClientProvider {
  scriptingClient(): ScriptingClient;
}

@Injectable()
export class RedisService
  implements OnModuleInit, OnModuleDestroy, ScriptingClientProvider
{
  private readonly logger = new Logger(RedisService.name);
  private client: RedisClient | null = null;
  private isConnected = false;

  constructor(
    @Inject(ADMISSION_OPTIONS) private readonly options: AdmissionOptions,
  ) {}

  async onModuleInit(): Promise<void> {
    if (this.options.counterStore.driver !== 'redis') {
      return;
    }

    const client = createClient({
      url: this.options.counterStore.redisUrl,
      // Commands fail immediately while disconnected instead of queueing
      // behind the admission timeout.
      disableOfflineQueue: true,
    });
    client.on('error', (error: Error) => {
      this.logger.warn(`Redis error: ${error.message}`);
    });
    client.on('ready', () => {
      this.isConnected = true;
    });
    client.on('end', () => {
      this.isConnected = false;
    });
    this.client = client;

    try {
      await client.connect();
      this.logger.log('Redis connected successfully');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `Redis connection failed (${message}); counter store faults follow the admission fail policy`,
      );
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.client && this.isConnected) {
      await this.client.quit();
    }
    this.isConnected = false;
  }

  isRedisAvailable(): boolean {
    return this.isConnected;
  }

  async ping(): Promise<boolean> {
    if (!this.client || !this.isConnected) {
      return false;
    }
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      this.logger.debug(`Redis ping failed: ${String(error)}`);
      return false;
    }
  }

  scriptingClient(): ScriptingClient {
    const client = this.client;
    if (!client) {
      throw new CounterStoreUnavailableError('Redis client is not configured');
    }
    return {
      get: (key) => client.get(key),
      eval: (script, options) => client.eval(script, options),
    };
  }
}
