import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';

@Injectable()
export class TimingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(TimingInterceptor.name);
  private readonly slowRequestThreshold: number;

  constructor(configService: ConfigService) {
    this.slowRequestThreshold =
      configService.get<number>('app.slowRequestThreshold') ?? 500;
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const { method, url } = request;
    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = Date.now() - startTime;

          // 느린 요청 로깅
          if (duration > this.slowRequestThreshold) {
            this.logger.warn(`Slow request: ${method} ${url} - ${duration}ms`);
          }
        },
        error: (error: unknown) => {
          const duration = Date.now() - startTime;
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error(
            `Request error: ${method} ${url} - ${duration}ms - ${message}`,
          );
        },
      }),
    );
  }
}
