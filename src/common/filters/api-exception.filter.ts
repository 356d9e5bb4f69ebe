import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { ZodError } from 'zod';
import { RemoteError } from '../errors/remote-error';

export const REQUEST_ID_HEADER = 'x-request-id';

type ApiError = {
  code: number;
  message: string;
  reason?: string;
};

type ErrorEnvelope = {
  meta: {
    status: number;
    errors: ApiError[];
    requestId?: string;
  };
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractHttpMessage(exception: HttpException): { message: string; reason?: string } {
  const res = exception.getResponse();
  if (typeof res === 'string') return { message: res };
  if (isObject(res)) {
    const message = res.message;
    const error = res.error;
    if (Array.isArray(message)) {
      return { message: message.join('\n'), reason: typeof error === 'string' ? error : undefined };
    }
    if (typeof message === 'string') {
      return { message, reason: typeof error === 'string' ? error : undefined };
    }
  }
  return { message: exception.message };
}

export function toErrorEnvelope(exception: unknown, requestId: string | null): ErrorEnvelope {
  let status: number;
  let errors: ApiError[];

  if (exception instanceof ZodError) {
    status = HttpStatus.BAD_REQUEST;
    errors = exception.issues.map((i) => ({
      code: HttpStatus.BAD_REQUEST,
      message: i.message,
      reason: i.path.length ? i.path.join('.') : 'validation',
    }));
    if (errors.length === 0) errors = [{ code: status, message: 'Invalid request', reason: 'validation' }];
  } else if (exception instanceof HttpException) {
    status = exception.getStatus();
    errors = [{ code: status, ...extractHttpMessage(exception) }];
  } else if (exception instanceof RemoteError) {
    status = HttpStatus.BAD_GATEWAY;
    errors = [{ code: status, message: exception.message, reason: `remote_${exception.service}` }];
  } else {
    status = HttpStatus.INTERNAL_SERVER_ERROR;
    errors = [{ code: status, message: 'Internal server error', reason: 'internal_error' }];
  }

  return { meta: { status, errors, ...(requestId ? { requestId } : {}) } };
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('API');

  catch(exception: unknown, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    const header = res.getHeader(REQUEST_ID_HEADER);
    const requestId = typeof header === 'string' && header ? header : null;

    const payload = toErrorEnvelope(exception, requestId);
    if (payload.meta.status >= 500) {
      // Still return a safe envelope, but keep the underlying error in the logs.
      this.logger.error(
        `Unhandled exception${requestId ? ` rid=${requestId}` : ''}: ${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }
    return res.status(payload.meta.status).json(payload);
  }
}
