import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Observable, tap } from 'rxjs';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const request = http.getRequest<{ method: string; url: string }>();
    const startedAt = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          const { statusCode } = http.getResponse<{ statusCode: number }>();
          this.logger.log(`${request.method} ${request.url} ${statusCode} +${Date.now() - startedAt}ms`);
        },
        error: (error: unknown) => {
          this.logger.warn(
            `${request.method} ${request.url} failed +${Date.now() - startedAt}ms: ${error instanceof Error ? error.message : String(error)}`,
          );
        },
      }),
    );
  }
}
