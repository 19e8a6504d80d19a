import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import type { AuthenticatedRequest } from '../common/http/authenticated-request';
import { DomainError, ERROR_CODES, type ErrorCode } from '../common/http/error-codes';
import { JsonLogger } from './json-logger.service';
import { safePath } from './http-logging.middleware';

export interface ErrorResponseBody {
  statusCode: number;
  errorCode: ErrorCode;
  message: string;
  timestamp: string;
  path: string;
  requestId?: string;
}

function errorCodeFor(exception: unknown, statusCode: number): ErrorCode {
  if (exception instanceof DomainError) return exception.code;
  if (statusCode === HttpStatus.UNAUTHORIZED) return ERROR_CODES.UNAUTHENTICATED;
  if (statusCode === HttpStatus.FORBIDDEN) return ERROR_CODES.FORBIDDEN;
  return ERROR_CODES.INTERNAL;
}

function safeMessageFor(statusCode: number): string {
  if (statusCode === HttpStatus.UNAUTHORIZED) return 'Unauthorized';
  if (statusCode === HttpStatus.FORBIDDEN) return 'Forbidden';
  return 'Internal server error';
}

/**
 * 401/403 and non-HTTP failures get the standard ErrorResponseBody.
 * Other HttpExceptions (validation, 404, 409) keep their own response.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  constructor(private readonly logger: JsonLogger) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<AuthenticatedRequest>();
    const res = ctx.getResponse<Response>();

    const isHttp = exception instanceof HttpException;
    const statusCode = isHttp ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const path = safePath(req);

    const meta: Record<string, unknown> = {
      requestId: req.requestId,
      method: req.method,
      path,
      statusCode
    };

    if (req.user) meta.userPseudo = req.user.pseudo;

    if (exception instanceof DomainError) meta.errorCode = exception.code;

    if (exception instanceof Error) {
      meta.errorName = exception.name;
      meta.errorMessage = exception.message;
      meta.stack = exception.stack;
    } else {
      meta.error = String(exception);
    }

    if (statusCode >= 500) {
      this.logger.error('Unhandled exception', meta);
    } else {
      this.logger.warn('Request failed', meta);
    }

    // Stack stays in logs; clients get a stable body.
    if (isHttp && statusCode !== HttpStatus.UNAUTHORIZED && statusCode !== HttpStatus.FORBIDDEN) {
      res.status(statusCode).json(exception.getResponse());
      return;
    }

    const body: ErrorResponseBody = {
      statusCode,
      errorCode: errorCodeFor(exception, statusCode),
      message: safeMessageFor(statusCode),
      timestamp: new Date().toISOString(),
      path,
      requestId: req.requestId
    };
    res.status(statusCode).json(body);
  }
}
