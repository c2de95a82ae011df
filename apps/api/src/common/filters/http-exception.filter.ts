import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

/**
 * Global HTTP exception filter that normalizes error responses
 * and logs request failures. Engine rejections keep their code and
 * message list.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status =
      exception instanceof HttpException
        ? exception.getStatus()
        : HttpStatus.INTERNAL_SERVER_ERROR;

    const errorResponse = {
      statusCode: status,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
      message: this.extractMessage(exception),
      ...this.extractDetails(exception),
    };

    this.logger.error(
      `${request.method} ${request.url} - ${status}`,
      exception instanceof Error ? exception.stack : undefined,
    );

    response.status(status).json(errorResponse);
  }

  private extractMessage(exception: unknown): string | string[] {
    if (exception instanceof HttpException) {
      const res = exception.getResponse();
      if (typeof res === 'string') {
        return res;
      }
      if ('message' in res && (typeof res.message === 'string' || Array.isArray(res.message))) {
        return res.message;
      }
      return exception.message;
    }

    return 'Internal server error';
  }

  /** Engine error code and per-problem messages, when the exception carries them. */
  private extractDetails(exception: unknown): { code?: string; errors?: unknown[] } {
    if (!(exception instanceof HttpException)) {
      return {};
    }
    const res = exception.getResponse();
    if (typeof res !== 'object') {
      return {};
    }
    return {
      ...('code' in res && typeof res.code === 'string' ? { code: res.code } : {}),
      ...('errors' in res && Array.isArray(res.errors) ? { errors: res.errors } : {}),
    };
  }
}
