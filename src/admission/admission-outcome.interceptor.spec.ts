import {
  BadRequestException,
  CallHandler,
  ExecutionContext,
  ServiceUnavailableException,
} from '@nestjs/common';
import { lastValueFrom, of, throwError } from 'rxjs';
import { AdmissionControllerService } from './admission-controller.service';
import {
  AdmissionOutcomeInterceptor,
  isBackendFailure,
} from './admission-outcome.interceptor';
import { ADMITTED_BACKEND } from './admission.guard';

describe('isBackendFailure', () => {
  it('counts server errors and unexpected errors', () => {
    expect(isBackendFailure(new ServiceUnavailableException())).toBe(true);
    expect(isBackendFailure(new Error('socket hang up'))).toBe(true);
  });

  it('ignores client errors', () => {
    expect(isBackendFailure(new BadRequestException())).toBe(false);
  });
});

describe('AdmissionOutcomeInterceptor', () => {
  let recordOutcome: jest.Mock<void, [string, boolean]>;
  let interceptor: AdmissionOutcomeInterceptor;

  const httpContext = (locals: Record<string, unknown>): ExecutionContext => {
    const context: Partial<ExecutionContext> = {
      getType: <T extends string>() => 'http' as T,
      switchToHttp: () => ({
        getRequest: <T>() => ({}) as T,
        getResponse: <T>() => ({ locals }) as T,
        getNext: <T>() => ({}) as T,
      }),
    };
    return context as ExecutionContext;
  };

  const handler = (result: CallHandler['handle']): CallHandler => ({
    handle: result,
  });

  beforeEach(() => {
    recordOutcome = jest.fn<void, [string, boolean]>();
    const admission: Pick<AdmissionControllerService, 'recordOutcome'> = {
      recordOutcome,
    };
    interceptor = new AdmissionOutcomeInterceptor(
      admission as AdmissionControllerService,
    );
  });

  it('reports a successful call once', async () => {
    await lastValueFrom(
      interceptor.intercept(
        httpContext({ [ADMITTED_BACKEND]: 'payments' }),
        handler(() => of('ok')),
      ),
    );

    expect(recordOutcome.mock.calls).toEqual([['payments', true]]);
  });

  it('reports a backend failure', async () => {
    await expect(
      lastValueFrom(
        interceptor.intercept(
          httpContext({ [ADMITTED_BACKEND]: 'payments' }),
          handler(() => throwError(() => new Error('timeout'))),
        ),
      ),
    ).rejects.toThrow('timeout');

    expect(recordOutcome.mock.calls).toEqual([['payments', false]]);
  });

  it('does not blame the backend for client errors', async () => {
    await expect(
      lastValueFrom(
        interceptor.intercept(
          httpContext({ [ADMITTED_BACKEND]: 'payments' }),
          handler(() => throwError(() => new BadRequestException())),
        ),
      ),
    ).rejects.toBeInstanceOf(BadRequestException);

    expect(recordOutcome.mock.calls).toEqual([['payments', true]]);
  });

  it('stays out of requests without a backend', async () => {
    await lastValueFrom(
      interceptor.intercept(httpContext({}), handler(() => of('ok'))),
    );

    expect(recordOutcome).not.toHaveBeenCalled();
  });
});
