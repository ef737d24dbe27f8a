import { Global, Module } from '@nestjs/common';
import { CLOCK, Clock } from '../common/clock';
import { ADMISSION_OPTIONS, AdmissionOptions } from '../config/admission.config';
import { RedisService } from '../redis/redis.service';
import { COUNTER_STORE, CounterStore } from './counter-store.interface';
import { InMemoryCounterStore } from './in-memory-counter-store';
import { RedisCounterStore } from './redis-counter-store';

export function createCounterStore(
  options: AdmissionOptions,
  redis: RedisService,
  clock: Clock,
): CounterStore {
  if (options.counterStore.driver === 'memory') {
    return new InMemoryCounterStore(clock);
  }
  return new RedisCounterStore(redis, options.counterStore.maxCasRetries);
}

@Global()
@Module({
  providers: [
    {
      provide: COUNTER_STORE,
      useFactory: createCounterStore,
      inject: [ADMISSION_OPTIONS, RedisService, CLOCK],
    },
  ],
  exports: [COUNTER_STORE],
})
export class CounterStoreModule {}
