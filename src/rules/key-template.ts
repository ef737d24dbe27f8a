import { createHash } from 'crypto';
import { RequestContext } from '../admission/request-context';

const PLACEHOLDERS = [
  'client_id',
  'ip',
  'api_key',
  'route',
  'method',
  'backend',
] as const;

type PlaceholderName = (typeof PLACEHOLDERS)[number];

type Segment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'placeholder'; readonly name: PlaceholderName }
  | { readonly kind: 'header'; readonly header: string };

const TOKEN = /\{([^{}]*)\}/g;

function isPlaceholderName(value: string): value is PlaceholderName {
  return PLACEHOLDERS.some((name) => name === value);
}

/**
 * API keys never appear in counter keys; only a digest prefix does.
 */
export function fingerprintApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex').slice(0, 16);
}

/**
 * Parsed rate-limit key template such as `{client_id}` or
 * `tenant:{header:x-tenant}:{route}`.
 */
export class KeyTemplate {
  private constructor(
    readonly source: string,
    private readonly segments: readonly Segment[],
  ) {}

  /**
   * Parses a template, returning the problems found instead of throwing so
   * that callers can report every bad rule at once. A bare placeholder name
   * (`client_id`) is accepted as shorthand for `{client_id}`.
   */
  static parse(source: string): { template: KeyTemplate } | { issues: string[] } {
    const text = isPlaceholderName(source) ? `{${source}}` : source;
    const segments: Segment[] = [];
    const issues: string[] = [];
    let cursor = 0;

    for (const match of text.matchAll(TOKEN)) {
      const index = match.index ?? 0;
      if (index > cursor) {
        segments.push({ kind: 'literal', text: text.slice(cursor, index) });
      }
      cursor = index + match[0].length;

      const token = match[1].trim();
      if (isPlaceholderName(token)) {
        segments.push({ kind: 'placeholder', name: token });
      } else if (token.startsWith('header:') && token.length > 'header:'.length) {
        segments.push({
          kind: 'header',
          header: token.slice('header:'.length).toLowerCase(),
        });
      } else {
        issues.push(`unknown placeholder {${match[1]}} in "${source}"`);
      }
    }

    if (cursor < text.length) {
      segments.push({ kind: 'literal', text: text.slice(cursor) });
    }

    const stray = segments.find(
      (segment) =>
        segment.kind === 'literal' && /[{}]/.test(segment.text),
    );
    if (stray) {
      issues.push(`unbalanced braces in "${source}"`);
    }

    return issues.length > 0
      ? { issues }
      : { template: new KeyTemplate(source, segments) };
  }

  /**
   * Substitutes request values. Returns null when any placeholder has no
   * value for this request.
   */
  resolve(context: RequestContext): string | null {
    let key = '';
    for (const segment of this.segments) {
      if (segment.kind === 'literal') {
        key += segment.text;
        continue;
      }
      const value =
        segment.kind === 'header'
          ? context.headers[segment.header]
          : placeholderValue(segment.name, context);
      if (!value) {
        return null;
      }
      key += value;
    }
    return key;
  }
}

function placeholderValue(
  name: PlaceholderName,
  context: RequestContext,
): string | null {
  switch (name) {
    case 'client_id':
      return context.identity.clientId;
    case 'ip':
      return context.identity.ip;
    case 'api_key':
      return context.identity.apiKey
        ? fingerprintApiKey(context.identity.apiKey)
        : null;
    case 'route':
      return context.route;
    case 'method':
      return context.method;
    case 'backend':
      return context.backendId;
  }
}
