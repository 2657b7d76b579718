import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { Request } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

const SLOW_REQUEST_MS = 500; // 느린 요청 기준

@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RequestLoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url } = request;
    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = Date.now() - startTime;
          if (duration > SLOW_REQUEST_MS) {
            this.logger.warn(`Slow request: ${method} ${url} - ${duration}ms`);
          }
        },
        error: (error: unknown) => {
          const duration = Date.now() - startTime;
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.warn(`Request failed: ${method} ${url} - ${duration}ms - ${reason}`);
        },
      }),
    );
  }
}
