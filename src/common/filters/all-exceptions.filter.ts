import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { DomainError, ValidationError } from '../errors';
import { extractRequestLogContext } from '../logging/http-log-context';
import { logWarn, logError } from '../logging/structured-logger';
import { ensureRequestId, REQUEST_ID_HEADER } from '../request-id';

const DOMAIN_STATUS: Record<DomainError['kind'], HttpStatus> = {
  adapter: HttpStatus.SERVICE_UNAVAILABLE,
  persistence: HttpStatus.INTERNAL_SERVER_ERROR,
  validation: HttpStatus.BAD_REQUEST,
  export: HttpStatus.INTERNAL_SERVER_ERROR
};

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<{
      method?: string;
      query?: Record<string, unknown>;
      body?: unknown;
      headers?: Record<string, string | string[] | undefined>;
      requestId?: string;
      requestStartedAtNs?: bigint;
    }>();
    const response = ctx.getResponse<{
      setHeader: (name: string, value: string) => void;
      headersSent?: boolean;
      destroy?: (error?: Error) => void;
    }>();
    const requestId = ensureRequestId(request);

    const httpStatus = resolveStatus(exception);
    const kind = resolveKind(exception, httpStatus);
    const path = httpAdapter.getRequestUrl(request);
    const startedAt = request.requestStartedAtNs;
    const durationMs =
      typeof startedAt === 'bigint'
        ? Number(process.hrtime.bigint() - startedAt) / 1_000_000
        : undefined;
    const logFields = {
      method: request.method ?? 'UNKNOWN',
      path,
      statusCode: httpStatus,
      kind,
      durationMs: durationMs !== undefined ? Number(durationMs.toFixed(2)) : undefined,
      message: getExceptionMessage(exception),
      ...extractRequestLogContext(request)
    };
    if (httpStatus >= 500) {
      logError('http.request.error', logFields);
    } else {
      logWarn('http.request.error', logFields);
    }

    // A streamed response that already started cannot switch to a JSON error.
    if (response.headersSent) {
      response.destroy?.();
      return;
    }
    response.setHeader(REQUEST_ID_HEADER, requestId);

    const baseResponse = {
      statusCode: httpStatus,
      kind,
      timestamp: new Date().toISOString(),
      path,
      requestId
    };

    if (exception instanceof ValidationError) {
      httpAdapter.reply(
        ctx.getResponse(),
        { ...baseResponse, message: exception.message, fields: exception.fields },
        httpStatus
      );
      return;
    }

    if (exception instanceof DomainError) {
      httpAdapter.reply(ctx.getResponse(), { ...baseResponse, message: exception.message }, httpStatus);
      return;
    }

    if (exception instanceof HttpException) {
      const body = exception.getResponse();
      if (typeof body === 'string') {
        httpAdapter.reply(ctx.getResponse(), { ...baseResponse, message: body }, httpStatus);
        return;
      }

      if (body && typeof body === 'object') {
        httpAdapter.reply(
          ctx.getResponse(),
          { ...baseResponse, message: getExceptionMessage(exception) },
          httpStatus
        );
        return;
      }
    }

    httpAdapter.reply(
      ctx.getResponse(),
      { ...baseResponse, message: 'Internal server error' },
      httpStatus
    );
  }
}

function resolveStatus(exception: unknown): number {
  if (exception instanceof DomainError) {
    return DOMAIN_STATUS[exception.kind];
  }
  if (exception instanceof HttpException) {
    return exception.getStatus();
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
}

function resolveKind(exception: unknown, status: number): string {
  if (exception instanceof DomainError) {
    return exception.kind;
  }
  if (exception instanceof HttpException) {
    const name = HttpStatus[status];
    return typeof name === 'string' ? name.toLowerCase() : 'http_error';
  }
  return 'internal';
}

function getExceptionMessage(exception: unknown): string {
  if (exception instanceof HttpException) {
    const response = exception.getResponse();
    if (typeof response === 'string') {
      return response;
    }
    if (response && typeof response === 'object' && 'message' in response) {
      const message = response.message;
      if (typeof message === 'string') {
        return message;
      }
      if (Array.isArray(message)) {
        return message.map(String).join('; ');
      }
    }
    return exception.message;
  }
  if (exception instanceof Error) {
    return exception.message;
  }
  return String(exception);
}
