import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

/**
 * Logs every HTTP request with its status and duration. Client errors are
 * warnings; anything else that fails is an error.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const { method, originalUrl } = http.getRequest<Request>();
    const started = Date.now();
    const elapsed = () => `${Date.now() - started}ms`;

    return next.handle().pipe(
      tap({
        next: () => {
          const { statusCode } = http.getResponse<Response>();
          this.logger.log(`${method} ${originalUrl} ${statusCode} - ${elapsed()}`);
        },
        error: (error: unknown) => {
          const status = error instanceof HttpException ? error.getStatus() : 500;
          const message = error instanceof Error ? error.message : String(error);
          const line = `${method} ${originalUrl} ${status} - ${elapsed()} - ${message}`;
          if (status < 500) {
            this.logger.warn(line);
          } else {
            this.logger.error(line);
          }
        },
      }),
    );
  }
}
