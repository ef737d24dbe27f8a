import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Response } from 'express';
import { Observable, tap } from 'rxjs';
import { AdmissionControllerService } from './admission-controller.service';
import { ADMITTED_BACKEND } from './admission.guard';

/**
 * Thrown errors other than HTTP exceptions, and HTTP exceptions of 5xx,
 * are backend failures. Client errors say nothing about backend health.
 */
export function isBackendFailure(error: unknown): boolean {
  if (error instanceof HttpException) {
    return error.getStatus() >= 500;
  }
  return true;
}

/**
 * Reports the outcome of every admitted request bound for a backend to
 * that backend's circuit breaker.
 */
@Injectable()
export class AdmissionOutcomeInterceptor implements NestInterceptor {
  constructor(private readonly admission: AdmissionControllerService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const response = context.switchToHttp().getResponse<Response>();
    const backendId: unknown = response.locals[ADMITTED_BACKEND];
    if (typeof backendId !== 'string') {
      return next.handle();
    }

    let reported = false;
    const report = (success: boolean) => {
      if (!reported) {
        reported = true;
        this.admission.recordOutcome(backendId, success);
      }
    };

    return next.handle().pipe(
      tap({
        next: () => report(true),
        complete: () => report(true),
        error: (error: unknown) => report(!isBackendFailure(error)),
      }),
    );
  }
}
