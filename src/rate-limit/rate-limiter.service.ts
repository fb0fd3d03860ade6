import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type {
  RateLimitClass,
  RateLimitDecision,
  RateLimitStats,
} from './rate-limit.types';

const SWEEP_INTERVAL_MS = 60_000;

/**
 * Sliding-window log per client address. Every endpoint class records into
 * the same log and applies its own limit to it. Pruning, the limit test and
 * the append run in one synchronous step, so concurrent requests on the
 * event loop never interleave inside a check.
 */
@Injectable()
export class RateLimiterService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly ledgers = new Map<string, number[]>();
  private readonly limits: Record<RateLimitClass, number>;
  private readonly windowMs: number;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(private readonly config: ConfigService) {
    this.windowMs =
      Number(this.config.get('RATE_LIMIT_WINDOW_SECONDS') ?? 3600) * 1000;
    this.limits = {
      crud: Number(this.config.get('RATE_LIMIT_CRUD') ?? 100),
      ai: Number(this.config.get('RATE_LIMIT_AI') ?? 50),
    };
  }

  onModuleInit(): void {
    this.sweeper = setInterval(() => this.sweep(), SWEEP_INTERVAL_MS);
    this.sweeper.unref();
  }

  onModuleDestroy(): void {
    if (this.sweeper) clearInterval(this.sweeper);
    this.sweeper = null;
  }

  limitFor(kind: RateLimitClass): number {
    return this.limits[kind];
  }

  checkClass(
    client: string,
    kind: RateLimitClass,
    now = Date.now(),
  ): RateLimitDecision {
    return this.check(client, this.limits[kind], now);
  }

  stats(): RateLimitStats {
    // A client is limited once it is at the highest class limit.
    const ceiling = Math.max(...Object.values(this.limits));
    let active = 0;
    let limited = 0;
    let total = 0;

    for (const timestamps of this.ledgers.values()) {
      if (timestamps.length === 0) continue;
      active++;
      total += timestamps.length;
      if (timestamps.length >= ceiling) limited++;
    }

    return {
      total_requests: total,
      active_clients: active,
      rate_limited_clients: limited,
    };
  }

  /** Drops ledgers whose every entry has left the window. */
  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [client, timestamps] of this.ledgers) {
      if (timestamps.every((t) => now - t >= this.windowMs)) {
        this.ledgers.delete(client);
        removed++;
      }
    }
    return removed;
  }

  private check(
    client: string,
    limit: number,
    now: number,
  ): RateLimitDecision {
    const timestamps = (this.ledgers.get(client) ?? []).filter(
      (t) => now - t < this.windowMs,
    );
    this.ledgers.set(client, timestamps);

    if (timestamps.length >= limit) {
      const oldest = timestamps[0] ?? now;
      this.logger.warn(`Rate limit exceeded for ${client}`);
      return {
        allowed: false,
        limit,
        remaining: 0,
        retryAfter: Math.max(1, Math.ceil((oldest + this.windowMs - now) / 1000)),
      };
    }

    timestamps.push(now);
    return {
      allowed: true,
      limit,
      remaining: limit - timestamps.length,
      retryAfter: 0,
    };
  }
}
