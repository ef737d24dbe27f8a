import { BlockList, isIP } from 'net';
import {
  CircuitBreakerConfigDto,
  RateLimitRuleDto,
  RulesDocumentDto,
  WafMatcherDto,
  WafRuleDto,
} from './dto/rules-document.dto';
import { KeyTemplate } from './key-template';
import {
  CircuitBreakerConfig,
  CircuitBreakerDefaults,
  RateLimitAlgorithm,
  RateLimitRule,
  RuleSnapshot,
  SlidingWindowType,
  WafMatcher,
  WafRule,
  WafSeverity,
} from './rule.types';

const MAX_MATCHER_DEPTH = 8;

export interface CompileOptions {
  defaultScope: string;
  defaultCircuitBreaker: CircuitBreakerDefaults;
}

export interface SnapshotMetadata {
  loadedAt: number;
  source: string;
}

export type CompileResult =
  | { ok: true; snapshot: RuleSnapshot }
  | { ok: false; issues: string[] };

/**
 * Turns a validated rules document into a frozen snapshot. Cross-field and
 * cross-rule checks that class-validator cannot express happen here; every
 * problem found is reported, not just the first.
 */
export function compileRulesDocument(
  document: RulesDocumentDto,
  options: CompileOptions,
  metadata: SnapshotMetadata,
): CompileResult {
  const issues: string[] = [];

  const rateLimits = (document.rateLimits ?? []).flatMap((dto) => {
    const rule = compileRateLimit(dto, options.defaultScope, issues);
    return rule ? [rule] : [];
  });
  const rateRuleIds = new Set(rateLimits.map((rule) => rule.id));

  const circuitBreakers = new Map<string, CircuitBreakerConfig>();
  for (const dto of document.circuitBreakers ?? []) {
    const config = compileCircuitBreaker(
      dto,
      options.defaultCircuitBreaker,
      issues,
    );
    if (config) {
      circuitBreakers.set(config.backendId, config);
    }
  }

  const wafRules = (document.wafRules ?? [])
    .flatMap((dto, order) => {
      const rule = compileWafRule(dto, order, rateRuleIds, issues);
      return rule && dto.enabled !== false ? [rule] : [];
    })
    .sort((a, b) => a.priority - b.priority || a.order - b.order);

  if (issues.length > 0) {
    return { ok: false, issues };
  }

  const snapshot: RuleSnapshot = {
    version: document.version,
    loadedAt: metadata.loadedAt,
    source: metadata.source,
    rateLimits: Object.freeze(rateLimits),
    circuitBreakers,
    wafRules: Object.freeze(wafRules),
    hasRateDerivedWafRules: wafRules.some((rule) => rule.rateDerived),
  };
  return { ok: true, snapshot: Object.freeze(snapshot) };
}

function parseTemplate(
  source: string,
  label: string,
  issues: string[],
): KeyTemplate | null {
  const parsed = KeyTemplate.parse(source);
  if ('issues' in parsed) {
    issues.push(...parsed.issues.map((issue) => `${label}: ${issue}`));
    return null;
  }
  return parsed.template;
}

function compileRateLimit(
  dto: RateLimitRuleDto,
  defaultScope: string,
  issues: string[],
): RateLimitRule | null {
  const label = `rateLimits[${dto.id}]`;
  const before = issues.length;

  const key = parseTemplate(dto.key, label, issues);
  const fallback = parseTemplate(dto.fallbackScope ?? defaultScope, label, issues);
  const burst = dto.burst ?? dto.limit;
  const bucket =
    dto.algorithm === RateLimitAlgorithm.TOKEN_BUCKET ||
    dto.algorithm === RateLimitAlgorithm.LEAKY_BUCKET;

  if (bucket && dto.limit > 0 && burst < 1) {
    issues.push(`${label}: burst must be at least 1 when limit is positive`);
  }
  const windowMs = Math.round(dto.windowSeconds * 1000);
  if (windowMs < 1) {
    issues.push(`${label}: window must be at least 1ms`);
  }

  if (!key || !fallback || issues.length > before) {
    return null;
  }

  return Object.freeze({
    id: dto.id,
    key,
    fallback,
    algorithm: dto.algorithm,
    limit: dto.limit,
    windowMs,
    burst,
    match: Object.freeze({
      routes: Object.freeze([...(dto.match?.routes ?? [])]),
      methods: Object.freeze(
        (dto.match?.methods ?? []).map((method) => method.toUpperCase()),
      ),
      backends: Object.freeze([...(dto.match?.backends ?? [])]),
    }),
  });
}

function compileCircuitBreaker(
  dto: CircuitBreakerConfigDto,
  defaults: CircuitBreakerDefaults,
  issues: string[],
): CircuitBreakerConfig | null {
  const label = `circuitBreakers[${dto.backendId}]`;
  const slidingWindowType = dto.slidingWindowType ?? SlidingWindowType.COUNT;
  const halfOpenPermittedCalls =
    dto.halfOpenPermittedCalls ?? defaults.halfOpenPermittedCalls;
  const config: CircuitBreakerConfig = {
    backendId: dto.backendId,
    failureRateThreshold: dto.failureRateThreshold,
    slidingWindowType,
    slidingWindowSize: dto.slidingWindowSize,
    minimumNumberOfCalls:
      dto.minimumNumberOfCalls ??
      (slidingWindowType === SlidingWindowType.COUNT
        ? dto.slidingWindowSize
        : defaults.minimumNumberOfCalls),
    waitDurationOpenMs: Math.round(dto.waitDurationOpenSeconds * 1000),
    halfOpenPermittedCalls,
    halfOpenSuccessThreshold:
      dto.halfOpenSuccessThreshold ?? halfOpenPermittedCalls,
    maxWaitInHalfOpenMs: Math.round((dto.maxWaitInHalfOpenSeconds ?? 0) * 1000),
  };

  const before = issues.length;
  if (config.halfOpenSuccessThreshold > config.halfOpenPermittedCalls) {
    issues.push(
      `${label}: halfOpenSuccessThreshold exceeds halfOpenPermittedCalls`,
    );
  }
  if (
    slidingWindowType === SlidingWindowType.COUNT &&
    config.minimumNumberOfCalls > config.slidingWindowSize
  ) {
    issues.push(
      `${label}: minimumNumberOfCalls exceeds a count window of ${config.slidingWindowSize}`,
    );
  }

  return issues.length > before ? null : Object.freeze(config);
}

function compileWafRule(
  dto: WafRuleDto,
  order: number,
  rateRuleIds: ReadonlySet<string>,
  issues: string[],
): WafRule | null {
  const matcher = compileMatcher(
    dto.match,
    `wafRules[${dto.id}]`,
    rateRuleIds,
    issues,
    0,
  );
  if (!matcher) {
    return null;
  }
  return Object.freeze({
    id: dto.id,
    priority: dto.priority,
    order,
    action: dto.action,
    severity: dto.severity ?? WafSeverity.MEDIUM,
    matcher,
    rateDerived: isRateDerived(matcher),
  });
}

function compileRegex(
  pattern: string,
  flags: string,
  label: string,
  issues: string[],
): RegExp | null {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    issues.push(`${label}: invalid regex /${pattern}/ (${reason})`);
    return null;
  }
}

/**
 * Builds the address list of an ip matcher from exact addresses and CIDR
 * ranges, IPv4 or IPv6.
 */
function compileAddressList(
  entries: readonly string[],
  label: string,
  issues: string[],
): BlockList | null {
  const list = new BlockList();
  let valid = true;

  for (const entry of entries) {
    const parts = entry.trim().split('/');
    const address = parts[0];
    const version = isIP(address);
    const family = version === 4 ? 'ipv4' : 'ipv6';
    const maxPrefix = version === 4 ? 32 : 128;
    const prefix =
      parts.length === 2 && /^\d{1,3}$/.test(parts[1]) ? Number(parts[1]) : null;
    const badPrefix =
      parts.length === 2 && (prefix === null || prefix > maxPrefix);

    if (version === 0 || parts.length > 2 || badPrefix) {
      issues.push(`${label}: invalid address or CIDR range "${entry}"`);
      valid = false;
      continue;
    }

    if (prefix === null) {
      list.addAddress(address, family);
    } else {
      list.addSubnet(address, prefix, family);
    }
  }

  return valid ? list : null;
}

function compileMatcher(
  dto: WafMatcherDto,
  label: string,
  rateRuleIds: ReadonlySet<string>,
  issues: string[],
  depth: number,
): WafMatcher | null {
  if (depth >= MAX_MATCHER_DEPTH) {
    issues.push(`${label}: matchers nested deeper than ${MAX_MATCHER_DEPTH}`);
    return null;
  }

  switch (dto.type) {
    case 'path': {
      if (dto.pattern === undefined || dto.pattern === '') {
        issues.push(`${label}: path matcher needs a pattern`);
        return null;
      }
      const mode = dto.mode ?? 'prefix';
      if (mode !== 'regex') {
        return { type: 'path', mode, pattern: dto.pattern, regex: null };
      }
      const regex = compileRegex(dto.pattern, '', label, issues);
      return regex ? { type: 'path', mode, pattern: dto.pattern, regex } : null;
    }

    case 'header': {
      if (!dto.name) {
        issues.push(`${label}: header matcher needs a name`);
        return null;
      }
      const hasEquals = dto.equals !== undefined;
      const hasContains = dto.contains !== undefined;
      if (hasEquals === hasContains) {
        issues.push(
          `${label}: header matcher needs exactly one of equals or contains`,
        );
        return null;
      }
      const ignoreCase = dto.ignoreCase ?? false;
      const value = dto.equals ?? dto.contains ?? '';
      return {
        type: 'header',
        name: dto.name.toLowerCase(),
        operator: hasEquals ? 'equals' : 'contains',
        value: ignoreCase ? value.toLowerCase() : value,
        ignoreCase,
      };
    }

    case 'body': {
      if (dto.pattern === undefined || dto.pattern === '') {
        issues.push(`${label}: body matcher needs a pattern`);
        return null;
      }
      const regex = compileRegex(
        dto.pattern,
        dto.ignoreCase ? 'i' : '',
        label,
        issues,
      );
      return regex ? { type: 'body', regex } : null;
    }

    case 'ip': {
      const addresses = dto.addresses ?? [];
      if (addresses.length === 0) {
        issues.push(`${label}: ip matcher needs at least one address`);
        return null;
      }
      const list = compileAddressList(addresses, label, issues);
      return list
        ? {
            type: 'ip',
            addresses: Object.freeze([...addresses]),
            list,
            invert: dto.invert ?? false,
          }
        : null;
    }

    case 'rate': {
      if (dto.ruleId !== undefined && !rateRuleIds.has(dto.ruleId)) {
        issues.push(`${label}: rate matcher refers to unknown rule ${dto.ruleId}`);
        return null;
      }
      return { type: 'rate', ruleId: dto.ruleId ?? null };
    }

    case 'all':
    case 'any': {
      const children = dto.matchers ?? [];
      if (children.length === 0) {
        issues.push(`${label}: ${dto.type} matcher needs at least one matcher`);
        return null;
      }
      const compiled = children.map((child, index) =>
        compileMatcher(
          child,
          `${label}.${dto.type}[${index}]`,
          rateRuleIds,
          issues,
          depth + 1,
        ),
      );
      const matchers = compiled.filter(
        (matcher): matcher is WafMatcher => matcher !== null,
      );
      if (matchers.length !== compiled.length) {
        return null;
      }
      return { type: dto.type, matchers: Object.freeze(matchers) };
    }
  }
}

export function isRateDerived(matcher: WafMatcher): boolean {
  switch (matcher.type) {
    case 'rate':
      return true;
    case 'all':
    case 'any':
      return matcher.matchers.some(isRateDerived);
    default:
      return false;
  }
}
