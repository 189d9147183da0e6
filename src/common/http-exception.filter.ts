// File overview:
// - Purpose: Global exception filter rendering every error as `{ error, message }`.
// - Reached from: Registered as APP_FILTER in `AppModule`; also sees router-level errors (404, malformed JSON).
// - Policy: 5xx are logged with stack and answered with a generic message; 4xx never expose internals.
import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { ErrorKind, ErrorResponse } from './dto/responses';

const INTERNAL_MESSAGE = 'Internal server error';

export function errorKindFor(status: number): ErrorKind {
  switch (status) {
    case HttpStatus.BAD_REQUEST:
      return 'BadRequest';
    case HttpStatus.UNAUTHORIZED:
    case HttpStatus.FORBIDDEN:
      return 'Unauthorized';
    case HttpStatus.NOT_FOUND:
      return 'NotFound';
    case HttpStatus.METHOD_NOT_ALLOWED:
      return 'MethodNotAllowed';
    case HttpStatus.CONFLICT:
      return 'Conflict';
    case HttpStatus.SERVICE_UNAVAILABLE:
      return 'ServiceUnavailable';
    default:
      return status >= 500 ? 'Internal' : 'BadRequest';
  }
}

function messageOf(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') return response;
  if ('message' in response) {
    const { message } = response;
    if (Array.isArray(message)) return message.map(String).join('; ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}

// http-errors objects (body parser rejections) that are safe to show the client
function exposedClientStatus(error: Error): number | undefined {
  if (!('expose' in error) || error.expose !== true) return undefined;
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function toErrorResponse(exception: unknown): { status: number; body: ErrorResponse } {
  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const error = errorKindFor(status);
    const message = error === 'Internal' ? INTERNAL_MESSAGE : messageOf(exception);
    return { status, body: { error, message } };
  }
  if (exception instanceof Error) {
    const status = exposedClientStatus(exception);
    if (status !== undefined) {
      return { status, body: { error: errorKindFor(status), message: exception.message } };
    }
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { error: 'Internal', message: INTERNAL_MESSAGE },
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const request = ctx.getRequest();
    const { status, body } = toErrorResponse(exception);

    if (status >= 500) {
      const method = httpAdapter.getRequestMethod(request);
      const url = httpAdapter.getRequestUrl(request);
      this.logger.error(
        `${method} ${url} failed: ${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    httpAdapter.reply(ctx.getResponse(), body, status);
  }
}
