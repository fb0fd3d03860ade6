import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { ShutdownService } from './shutdown.service';

@Injectable()
export class ShutdownMiddleware implements NestMiddleware {
  constructor(private readonly shutdown: ShutdownService) {}

  use(req: Request, res: Response, next: NextFunction): void {
    if (this.shutdown.isShuttingDown) {
      res.status(503).json({ statusCode: 503, message: 'Service is shutting down' });
      return;
    }
    next();
  }
}
