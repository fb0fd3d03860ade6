import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { cpus, freemem, totalmem } from 'node:os';
import { DatabaseService, type PoolStatus } from '../database/database.service';
import { RateLimiterService } from '../rate-limit/rate-limiter.service';
import type { RateLimitStats } from '../rate-limit/rate-limit.types';
import { ShutdownService } from './shutdown.service';

export interface StatusReport {
  status: 'healthy';
  database_pool: PoolStatus;
  rate_limits: RateLimitStats;
  workers: number;
}

export interface MetricsReport {
  database_pool: PoolStatus;
  requests: RateLimitStats;
  system: {
    memory_usage_percent: number;
    memory_available_gb: number;
    cpu_count: number;
  };
  application: {
    uptime_seconds: number;
    shutdown_requested: boolean;
  };
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);
  private readonly startedAt = Date.now();

  constructor(
    private readonly config: ConfigService,
    private readonly database: DatabaseService,
    private readonly limiter: RateLimiterService,
    private readonly shutdown: ShutdownService,
  ) {}

  get shutdownRequested(): boolean {
    return this.shutdown.isShuttingDown;
  }

  /** True when the database answers a single `SELECT 1`. */
  async databaseReachable(): Promise<boolean> {
    try {
      await this.database.ping(1);
      return true;
    } catch (error) {
      this.logger.error(`Health check failed: ${(error as Error).message}`);
      return false;
    }
  }

  status(): StatusReport {
    return {
      status: 'healthy',
      database_pool: this.database.poolStatus(),
      rate_limits: this.limiter.stats(),
      workers: Number(this.config.get('WORKERS') ?? 1),
    };
  }

  metrics(): MetricsReport {
    const total = totalmem();
    const free = freemem();
    return {
      database_pool: this.database.poolStatus(),
      requests: this.limiter.stats(),
      system: {
        memory_usage_percent: Math.round(((total - free) / total) * 1000) / 10,
        memory_available_gb: Math.round((free / 1024 ** 3) * 100) / 100,
        cpu_count: cpus().length,
      },
      application: {
        uptime_seconds: Math.round((Date.now() - this.startedAt) / 1000),
        shutdown_requested: this.shutdown.isShuttingDown,
      },
    };
  }
}
