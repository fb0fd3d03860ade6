import { BeforeApplicationShutdown, Injectable, Logger } from '@nestjs/common';

@Injectable()
export class ShutdownService implements BeforeApplicationShutdown {
  private readonly logger = new Logger(ShutdownService.name);
  private requested = false;

  get isShuttingDown(): boolean {
    return this.requested;
  }

  request(reason: string): void {
    if (this.requested) return;
    this.requested = true;
    this.logger.log(`Received ${reason}, initiating graceful shutdown...`);
  }

  beforeApplicationShutdown(signal?: string): void {
    this.request(signal ?? 'shutdown');
  }
}
