import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const { method, url } = http.getRequest<Request>();
    const startTime = Date.now();

    const line = () => {
      const { statusCode } = http.getResponse<Response>();
      return `${method} ${url} - Status: ${statusCode} - Response Time: ${Date.now() - startTime}ms`;
    };

    return next.handle().pipe(
      tap({
        next: () => this.logger.log(line()),
        error: () => this.logger.error(line()),
      }),
    );
  }
}
