/**
 * Per-request input to admission. Built once by the request classifier and
 * discarded with the request.
 */

export interface ClientIdentity {
  readonly clientId: string | null;
  readonly ip: string | null;
  readonly apiKey: string | null;
}

export interface RequestContext {
  readonly method: string;
  readonly route: string;
  readonly identity: ClientIdentity;
  readonly backendId: string | null;
  /** Lower-cased names; repeated headers joined with ", ". */
  readonly headers: Readonly<Record<string, string>>;
  readonly bodySample: string;
  /** Rate-limit keys already derived for this request, by rule id. */
  readonly derivedKeys: Map<string, string>;
  readonly signal?: AbortSignal;
}

export interface RequestContextInit {
  method: string;
  route: string;
  identity?: Partial<ClientIdentity>;
  backendId?: string | null;
  headers?: Record<string, string | string[] | undefined>;
  body?: string | Buffer | null;
  signal?: AbortSignal;
}

export function normalizeHeaders(
  headers: Record<string, string | string[] | undefined>,
): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    normalized[name.toLowerCase()] = Array.isArray(value)
      ? value.join(', ')
      : value;
  }
  return normalized;
}

/**
 * Truncates the body to at most `maxBytes` bytes of UTF-8.
 */
export function sampleBody(
  body: string | Buffer | null | undefined,
  maxBytes: number,
): string {
  if (body === null || body === undefined || maxBytes <= 0) {
    return '';
  }
  const bytes = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
  if (bytes.length <= maxBytes) {
    return bytes.toString('utf8');
  }
  return bytes.subarray(0, maxBytes).toString('utf8');
}

export function createRequestContext(
  init: RequestContextInit,
  maxBodySampleBytes: number,
): RequestContext {
  return {
    method: init.method.toUpperCase(),
    route: init.route,
    identity: {
      clientId: init.identity?.clientId || null,
      ip: init.identity?.ip || null,
      apiKey: init.identity?.apiKey || null,
    },
    backendId: init.backendId || null,
    headers: normalizeHeaders(init.headers ?? {}),
    bodySample: sampleBody(init.body, maxBodySampleBytes),
    derivedKeys: new Map(),
    signal: init.signal,
  };
}
