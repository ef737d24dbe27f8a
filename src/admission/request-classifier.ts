import { Inject, Injectable } from '@nestjs/common';
import { Request } from 'express';
import { ADMISSION_OPTIONS, AdmissionOptions } from '../config/admission.config';
import { RequestContext, createRequestContext } from './request-context';

export const REQUEST_CLASSIFIER = Symbol('REQUEST_CLASSIFIER');

/**
 * Turns an inbound HTTP request into the admission input. Deployments with
 * their own identity or routing scheme provide their own implementation
 * under `REQUEST_CLASSIFIER`.
 */
export interface RequestClassifier {
  classify(request: Request, signal: AbortSignal): RequestContext;
}

function serializeBody(body: unknown): string | Buffer | null {
  if (body === undefined || body === null) {
    return null;
  }
  if (typeof body === 'string' || Buffer.isBuffer(body)) {
    return body;
  }
  if (typeof body === 'object' && Object.keys(body).length === 0) {
    return null;
  }
  return JSON.stringify(body);
}

/**
 * Default classifier: identity and backend come from request headers
 * (`x-client-id`, `x-api-key`, `x-backend-id` unless configured otherwise)
 * and the IP from the first `X-Forwarded-For` hop.
 */
@Injectable()
export class HeaderRequestClassifier implements RequestClassifier {
  constructor(
    @Inject(ADMISSION_OPTIONS) private readonly options: AdmissionOptions,
  ) {}

  classify(request: Request, signal: AbortSignal): RequestContext {
    const { clientId, apiKey, backend } = this.options.classifierHeaders;
    const forwardedFor = request.header('x-forwarded-for');
    const ip =
      forwardedFor?.split(',')[0]?.trim() ||
      request.ip ||
      request.socket.remoteAddress ||
      null;
    const body: unknown = request.body;

    return createRequestContext(
      {
        method: request.method,
        route: request.path,
        identity: {
          clientId: request.header(clientId) ?? null,
          apiKey: request.header(apiKey) ?? null,
          ip,
        },
        backendId: request.header(backend) ?? null,
        headers: request.headers,
        body: serializeBody(body),
        signal,
      },
      this.options.maxBodySampleBytes,
    );
  }
}
