export type RateLimitClass = 'crud' | 'ai';

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the oldest request in the window expires. */
  retryAfter: number;
}

export interface RateLimitStats {
  total_requests: number;
  active_clients: number;
  rate_limited_clients: number;
}
