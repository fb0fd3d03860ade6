import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { classifyDatabaseError } from './database-errors';

export interface ErrorBody {
  statusCode: number;
  message: string | string[];
  path: string;
  timestamp: string;
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger('ExceptionsFilter');

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    const { status, message } = this.resolve(exception, req);

    const body: ErrorBody = {
      statusCode: status,
      message,
      path: req.url,
      timestamp: new Date().toISOString(),
    };
    res.status(status).json(body);
  }

  resolve(
    exception: unknown,
    req: Pick<Request, 'method' | 'url'>,
  ): { status: number; message: string | string[] } {
    if (exception instanceof HttpException) {
      return {
        status: exception.getStatus(),
        message: this.httpMessage(exception),
      };
    }

    const route = `${req.method} ${req.url}`;
    switch (classifyDatabaseError(exception)) {
      case 'integrity':
        this.logger.error(`Integrity error in ${route}`, this.stack(exception));
        return {
          status: HttpStatus.BAD_REQUEST,
          message: 'Data integrity error occurred',
        };
      case 'database':
        this.logger.error(`Database error in ${route}`, this.stack(exception));
        return {
          status: HttpStatus.INTERNAL_SERVER_ERROR,
          message: 'Database error occurred',
        };
      default:
        this.logger.error(`Unexpected error in ${route}`, this.stack(exception));
        return {
          status: HttpStatus.INTERNAL_SERVER_ERROR,
          message: 'Internal server error',
        };
    }
  }

  private httpMessage(exception: HttpException): string | string[] {
    const response = exception.getResponse();
    if (typeof response === 'string') return response;

    const message: unknown = Reflect.get(response, 'message');
    if (typeof message === 'string') return message;
    if (Array.isArray(message) && message.every((m) => typeof m === 'string')) {
      return message;
    }
    return exception.message;
  }

  private stack(exception: unknown): string {
    return exception instanceof Error
      ? (exception.stack ?? exception.message)
      : String(exception);
  }
}
