import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { ZodError } from 'zod';
import { AuthenticationRequiredException } from '../errors/authentication-required.exception';
import type { RequestWithId } from '../middleware/request-id.middleware';

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
  redirect?: string;
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

function requestIdOf(req: RequestWithId | undefined): string | null {
  if (req?.requestId) return req.requestId;
  const header = req?.headers?.['x-request-id'];
  return typeof header === 'string' && header.trim() ? header.trim() : null;
}

function envelope(status: number, errors: ApiError[], requestId: string | null): ErrorEnvelope {
  return {
    meta: {
      status,
      errors,
      ...(requestId ? { requestId } : {}),
    },
  };
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger('API');

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<RequestWithId | undefined>();
    const requestId = requestIdOf(req);

    // Form validation (zod)
    if (exception instanceof ZodError) {
      const errors: ApiError[] = exception.issues.map((i) => ({
        code: HttpStatus.BAD_REQUEST,
        message: i.message,
        reason: i.path.length ? i.path.join('.') : 'validation',
      }));
      const payload = envelope(
        HttpStatus.BAD_REQUEST,
        errors.length ? errors : [{ code: HttpStatus.BAD_REQUEST, message: 'Invalid request', reason: 'validation' }],
        requestId,
      );
      return res.status(HttpStatus.BAD_REQUEST).json(payload);
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const { message, reason } = extractHttpMessage(exception);
      const payload = envelope(status, [{ code: status, message, reason }], requestId);
      if (exception instanceof AuthenticationRequiredException) {
        res.setHeader('Location', exception.loginUrl);
        payload.redirect = exception.loginUrl;
      }
      return res.status(status).json(payload);
    }

    // Unknown: keep the envelope generic, log the real error.
    this.logger.error(
      `Unhandled exception${requestId ? ` rid=${requestId}` : ''}`,
      exception instanceof Error ? exception.stack : String(exception),
    );
    const payload = envelope(
      HttpStatus.INTERNAL_SERVER_ERROR,
      [{ code: HttpStatus.INTERNAL_SERVER_ERROR, message: 'Internal server error', reason: 'internal_error' }],
      requestId,
    );
    return res.status(HttpStatus.INTERNAL_SERVER_ERROR).json(payload);
  }
}
