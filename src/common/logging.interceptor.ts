import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Observable, throwError } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { clientIp } from './client-ip';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') return next.handle();

    const http = context.switchToHttp();
    const req = http.getRequest<Request>();
    const res = http.getResponse<Response>();
    const handler = context.getHandler().name;
    const started = performance.now();

    const elapsed = () => ((performance.now() - started) / 1000).toFixed(3);

    return next.handle().pipe(
      tap(() => {
        this.logger.log(
          `${req.method} ${req.originalUrl} → ${res.statusCode} ${handler} completed in ${elapsed()}s (client ${clientIp(req)})`,
        );
      }),
      catchError((error: unknown) => {
        const status = error instanceof HttpException ? error.getStatus() : 500;
        this.logger.warn(
          `${req.method} ${req.originalUrl} → ${status} ${handler} failed in ${elapsed()}s (client ${clientIp(req)})`,
        );
        return throwError(() => error);
      }),
    );
  }
}
