/**
 * Admission Guard
 * Runs every inbound request through admission control
 */

import {
  CanActivate,
  ExecutionContext,
  HttpException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request, Response } from 'express';
import { AdmissionCancelledError } from '../common/errors';
import { AdmissionControllerService } from './admission-controller.service';
import { REQUEST_CLASSIFIER, RequestClassifier } from './request-classifier';
import { SKIP_ADMISSION_KEY } from './skip-admission.decorator';
import { verdictToHttpException } from './verdict-http';

/** `res.locals` key holding the backend an admitted request is bound for. */
export const ADMITTED_BACKEND = 'admissionBackendId';

/** Non-standard status used when the client went away mid-evaluation. */
export const CLIENT_CLOSED_REQUEST = 499;

@Injectable()
export class AdmissionGuard implements CanActivate {
  private readonly logger = new Logger(AdmissionGuard.name);

  constructor(
    private readonly reflector: Reflector,
    private readonly admission: AdmissionControllerService,
    @Inject(REQUEST_CLASSIFIER) private readonly classifier: RequestClassifier,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (context.getType() !== 'http') {
      return true;
    }

    const skip = this.reflector.getAllAndOverride<boolean>(SKIP_ADMISSION_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (skip) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();

    const abort = new AbortController();
    const onClose = () => {
      if (!response.writableFinished) {
        abort.abort();
      }
    };
    response.once('close', onClose);

    const requestContext = this.classifier.classify(request, abort.signal);
    try {
      const verdict = await this.admission.admit(requestContext);

      for (const [name, value] of Object.entries(verdict.diagnosticHeaders)) {
        response.setHeader(name, value);
      }

      const exception = verdictToHttpException(verdict);
      if (exception) {
        throw exception;
      }

      if (requestContext.backendId) {
        response.locals[ADMITTED_BACKEND] = requestContext.backendId;
      }
      return true;
    } catch (error) {
      if (error instanceof AdmissionCancelledError) {
        this.logger.debug(`${request.method} ${request.path}: ${error.message}`);
        throw new HttpException('Request cancelled', CLIENT_CLOSED_REQUEST);
      }
      throw error;
    } finally {
      response.off('close', onClose);
    }
  }
}
