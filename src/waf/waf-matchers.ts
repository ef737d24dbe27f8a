import { isIP } from 'net';
import { RequestContext } from '../admission/request-context';
import { WafMatcher } from '../rules/rule.types';

/**
 * Rate-limit outcome of the current request, available to rate-derived
 * matchers on the second WAF pass.
 */
export interface RateSignal {
  readonly deniedRuleIds: ReadonlySet<string>;
}

interface ClientAddress {
  address: string;
  family: 'ipv4' | 'ipv6';
}

const IPV4_MAPPED_PREFIX = '::ffff:';

/**
 * Dual-stack servers report IPv4 clients as `::ffff:a.b.c.d`; those are
 * matched as the IPv4 address.
 */
export function clientAddress(ip: string | null): ClientAddress | null {
  if (!ip) {
    return null;
  }
  const lowered = ip.toLowerCase();
  if (lowered.startsWith(IPV4_MAPPED_PREFIX)) {
    const mapped = lowered.slice(IPV4_MAPPED_PREFIX.length);
    if (isIP(mapped) === 4) {
      return { address: mapped, family: 'ipv4' };
    }
  }
  switch (isIP(lowered)) {
    case 4:
      return { address: lowered, family: 'ipv4' };
    case 6:
      return { address: lowered, family: 'ipv6' };
    default:
      return null;
  }
}

export function matches(
  matcher: WafMatcher,
  context: RequestContext,
  rateSignal: RateSignal | null,
): boolean {
  switch (matcher.type) {
    case 'path':
      if (matcher.mode === 'exact') {
        return context.route === matcher.pattern;
      }
      if (matcher.mode === 'prefix') {
        return context.route.startsWith(matcher.pattern);
      }
      return matcher.regex !== null && matcher.regex.test(context.route);

    case 'header': {
      const raw = context.headers[matcher.name];
      if (raw === undefined) {
        return false;
      }
      const value = matcher.ignoreCase ? raw.toLowerCase() : raw;
      return matcher.operator === 'equals'
        ? value === matcher.value
        : value.includes(matcher.value);
    }

    case 'body':
      return context.bodySample.length > 0 && matcher.regex.test(context.bodySample);

    case 'ip': {
      // An unknown client address is never on the list.
      const client = clientAddress(context.identity.ip);
      const listed =
        client !== null && matcher.list.check(client.address, client.family);
      return matcher.invert ? !listed : listed;
    }

    case 'rate':
      if (!rateSignal) {
        return false;
      }
      return matcher.ruleId === null
        ? rateSignal.deniedRuleIds.size > 0
        : rateSignal.deniedRuleIds.has(matcher.ruleId);

    case 'all':
      return matcher.matchers.every((child) =>
        matches(child, context, rateSignal),
      );

    case 'any':
      return matcher.matchers.some((child) =>
        matches(child, context, rateSignal),
      );
  }
}
