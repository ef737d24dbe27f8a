import { Module } from '@nestjs/common';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { CircuitBreakerRegistry } from '../circuit-breaker/circuit-breaker.registry';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import { RuleStoreService } from '../rules/rule-store.service';
import { RulesWatcherService } from '../rules/rules-watcher.service';
import { WafEngineService } from '../waf/waf-engine.service';
import { AdmissionAdminController } from './admission-admin.controller';
import { AdmissionControllerService } from './admission-controller.service';
import { AdmissionGuard } from './admission.guard';
import { AdmissionOutcomeInterceptor } from './admission-outcome.interceptor';
import {
  HeaderRequestClassifier,
  REQUEST_CLASSIFIER,
} from './request-classifier';

/**
 * Admission control for every HTTP route of the application: the guard and
 * outcome interceptor are registered globally from here.
 */
@Module({
  controllers: [AdmissionAdminController],
  providers: [
    RuleStoreService,
    RulesWatcherService,
    WafEngineService,
    RateLimiterService,
    CircuitBreakerRegistry,
    AdmissionControllerService,
    { provide: REQUEST_CLASSIFIER, useClass: HeaderRequestClassifier },
    { provide: APP_GUARD, useClass: AdmissionGuard },
    { provide: APP_INTERCEPTOR, useClass: AdmissionOutcomeInterceptor },
  ],
  exports: [
    RuleStoreService,
    RateLimiterService,
    CircuitBreakerRegistry,
    AdmissionControllerService,
    REQUEST_CLASSIFIER,
  ],
})
export class AdmissionModule {}
