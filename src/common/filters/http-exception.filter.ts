import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { ErrorResponseBody } from '../interfaces/error-response.interface';

/**
 * Renders every error as an ErrorResponseBody.
 * Anything that is not an HttpException becomes a logged 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(private readonly adapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.adapterHost;
    const ctx = host.switchToHttp();
    const body = this.toResponse(exception);
    body.path = String(httpAdapter.getRequestUrl(ctx.getRequest()));

    httpAdapter.reply(ctx.getResponse(), body, body.statusCode);
  }

  toResponse(exception: unknown): ErrorResponseBody {
    const timestamp = new Date().toISOString();

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const payload = exception.getResponse();
      let message: string | string[] = exception.message;
      let error: string | undefined;

      if (typeof payload === 'object' && payload !== null) {
        if ('message' in payload && (typeof payload.message === 'string' || Array.isArray(payload.message))) {
          message = payload.message;
        }
        if ('error' in payload && typeof payload.error === 'string') {
          error = payload.error;
        }
      }

      return { statusCode, message, error, timestamp };
    }

    this.logger.error(
      'Unhandled exception',
      exception instanceof Error ? exception.stack : String(exception),
    );
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'Internal Server Error',
      timestamp,
    };
  }
}
