import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { ensureCorrelationId, jsonLogLine } from '@hotel-reviews/shared';
import { isReviewApiError } from '../../../application/common/api-error';

interface HttpRequestLike {
  headers: Record<string, string | string[] | undefined>;
  originalUrl?: string;
  url?: string;
  method: string;
}

interface HttpResponseLike {
  setHeader(name: string, value: string): void;
  status(code: number): HttpResponseLike;
  json(body: unknown): void;
}

export interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
  statusCode: number;
  path: string;
  method: string;
  timestamp: string;
  correlationId: string;
}

const CORRELATION_HEADER = 'x-correlation-id';

/**
 * Renders every failure as `ErrorResponseBody`.
 *
 * Exceptions raised by the application carry a `ReviewApiError` body and keep its code and details.
 * Other HTTP exceptions (missing reviews and hotels, unknown routes) are named after their status.
 * Anything else is a 500 whose cause only reaches the log.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const request = http.getRequest<HttpRequestLike>();
    const response = http.getResponse<HttpResponseLike>();

    const statusCode = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const body: ErrorResponseBody = {
      error: describeError(exception, statusCode),
      statusCode,
      path: request.originalUrl ?? request.url ?? '/',
      method: request.method,
      timestamp: new Date().toISOString(),
      correlationId: ensureCorrelationId(firstHeaderValue(request.headers[CORRELATION_HEADER])),
    };

    response.setHeader(CORRELATION_HEADER, body.correlationId);
    response.status(statusCode).json(body);
    this.log(body, exception);
  }

  private log(body: ErrorResponseBody, exception: unknown): void {
    const serverFault = body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR;
    const line = jsonLogLine({
      level: serverFault ? 'error' : 'warn',
      service: 'review-service',
      message: `${body.method} ${body.path} failed with ${body.error.code}.`,
      correlationId: body.correlationId,
      metadata: { statusCode: body.statusCode, ...body.error.details },
      error: serverFault ? exception : undefined,
    });

    if (serverFault) {
      this.logger.error(line);
    } else {
      this.logger.warn(line);
    }
  }
}

function describeError(exception: unknown, statusCode: number): ErrorResponseBody['error'] {
  if (!(exception instanceof HttpException)) {
    return { code: 'INTERNAL_SERVER_ERROR', message: 'Unexpected server error.' };
  }

  const response = exception.getResponse();
  if (isReviewApiError(response)) {
    return response.details === undefined
      ? { code: response.code, message: response.message }
      : { code: response.code, message: response.message, details: response.details };
  }

  return { code: HttpStatus[statusCode] ?? 'HTTP_ERROR', message: exception.message };
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
