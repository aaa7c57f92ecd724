import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import type { Request, Response } from 'express';
import { ZodError } from 'zod';
import type { DailyErrorCode } from '../dto/daily.dto';
import { errorMessage } from '../errors/error-message';
import { resolveIstDay } from '../time/ist-day';
import { buildErrorResponse } from '../../modules/daily-content/daily-response';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function extractHttpMessage(exception: HttpException): string {
  const res = exception.getResponse();
  if (typeof res === 'string') return res;
  if (isObject(res)) {
    const message = res.message;
    if (Array.isArray(message)) return message.join('\n');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

export function errorCodeForStatus(status: number): DailyErrorCode {
  if (status === HttpStatus.UNAUTHORIZED || status === HttpStatus.FORBIDDEN) return 'unauthorized';
  if (status === HttpStatus.TOO_MANY_REQUESTS) return 'rate_limited';
  if (status === HttpStatus.BAD_REQUEST) return 'invalid_request';
  if (status === HttpStatus.NOT_FOUND) return 'not_found';
  return 'internal_error';
}

function requestIdOf(req: Request | undefined): string | null {
  const header = req?.headers?.['x-request-id'];
  return typeof header === 'string' && header ? header : null;
}

/**
 * Every failure, on every route, becomes the daily error envelope with HTTP 200:
 * the automation client reads `success` and never inspects status codes.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  constructor(private readonly clock: () => Date = () => new Date()) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const res = ctx.getResponse<Response>();
    const req = ctx.getRequest<Request | undefined>();
    const day = resolveIstDay(this.clock());

    // Zod validation errors
    if (exception instanceof ZodError) {
      const issue = exception.issues[0];
      const message = issue ? `${issue.path.length ? `${issue.path.join('.')}: ` : ''}${issue.message}` : 'Invalid request';
      return res.status(HttpStatus.OK).json(buildErrorResponse(day, 'invalid_request', message));
    }

    // Nest HTTP exceptions (guards, throttler, unknown routes)
    if (exception instanceof HttpException) {
      const code = errorCodeForStatus(exception.getStatus());
      if (code === 'internal_error') {
        this.logger.error(`[api] ${extractHttpMessage(exception)} rid=${requestIdOf(req) ?? '-'}`);
      }
      return res.status(HttpStatus.OK).json(buildErrorResponse(day, code, extractHttpMessage(exception)));
    }

    // Unknown: log the underlying error, return a safe envelope.
    this.logger.error(
      `[api] Unhandled exception rid=${requestIdOf(req) ?? '-'}: ${errorMessage(exception)}`,
      exception instanceof Error ? exception.stack : undefined,
    );
    return res.status(HttpStatus.OK).json(buildErrorResponse(day, 'internal_error', 'Internal server error'));
  }
}
