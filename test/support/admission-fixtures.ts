import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { RequestContextInit, RequestContext, createRequestContext } from '../../src/admission/request-context';
import {
  AdmissionOptions,
  buildAdmissionOptions,
} from '../../src/config/admission.config';
import { RulesDocumentDto } from '../../src/rules/dto/rules-document.dto';
import { compileRulesDocument } from '../../src/rules/rule-compiler';
import { RuleSnapshot } from '../../src/rules/rule.types';

/** Aligned to a 60s window boundary. */
export const T0 = 1_700_000_040_000;

export function testOptions(
  env: Record<string, string> = {},
): AdmissionOptions {
  return buildAdmissionOptions({
    COUNTER_STORE_DRIVER: 'memory',
    ...env,
  });
}

/**
 * Validates and compiles a rules document, failing the test on any issue.
 */
export function buildSnapshot(
  document: Record<string, unknown>,
  options: AdmissionOptions = testOptions(),
): RuleSnapshot {
  const dto = plainToInstance(RulesDocumentDto, document);
  const errors = validateSync(dto, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new Error(`invalid test document: ${errors.map(String).join('\n')}`);
  }
  const result = compileRulesDocument(
    dto,
    {
      defaultScope: options.defaultRateLimitScope,
      defaultCircuitBreaker: options.defaultCircuitBreaker,
    },
    { loadedAt: T0, source: 'test' },
  );
  if (!result.ok) {
    throw new Error(`invalid test document: ${result.issues.join('; ')}`);
  }
  return result.snapshot;
}

export function requestContext(
  init: Partial<RequestContextInit> = {},
): RequestContext {
  return createRequestContext(
    { method: 'GET', route: '/orders', ...init },
    8192,
  );
}
