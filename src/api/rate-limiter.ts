// ── Sliding-window Rate Limiter ─────────────────────────────────────────────

export interface RateLimiterConfig {
  readonly limit: number;
  readonly windowMs: number;
}

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  limit: 100,
  windowMs: 60_000,
};

export interface RateLimitDecision {
  readonly allowed: boolean;
  readonly limit: number;
  readonly remaining: number;
  /** Seconds until a slot frees up; 0 when allowed. */
  readonly retryAfterSeconds: number;
}

/**
 * Per-client request log over a sliding window. Rejected requests are not
 * recorded, so a client that keeps retrying is not locked out indefinitely.
 * Clients idle for a full window are swept at most once per window.
 */
export class RateLimiter {
  private readonly hits = new Map<string, number[]>();
  private readonly config: RateLimiterConfig;
  private readonly now: () => number;
  private lastSweepAt: number;

  constructor(config?: Partial<RateLimiterConfig>, now: () => number = Date.now) {
    this.config = { ...DEFAULT_RATE_LIMITER_CONFIG, ...config };
    this.now = now;
    this.lastSweepAt = now();
  }

  get limit(): number {
    return this.config.limit;
  }

  check(clientKey: string): RateLimitDecision {
    const now = this.now();
    if (now - this.lastSweepAt >= this.config.windowMs) {
      this.sweep(now);
    }
    const recent = this.prune(clientKey, now);

    if (recent.length >= this.config.limit) {
      const oldest = recent[0] ?? now;
      const waitMs = oldest + this.config.windowMs - now;
      return {
        allowed: false,
        limit: this.config.limit,
        remaining: 0,
        retryAfterSeconds: Math.max(1, Math.ceil(waitMs / 1000)),
      };
    }

    recent.push(now);
    this.hits.set(clientKey, recent);
    return {
      allowed: true,
      limit: this.config.limit,
      remaining: this.config.limit - recent.length,
      retryAfterSeconds: 0,
    };
  }

  remaining(clientKey: string): number {
    return Math.max(0, this.config.limit - this.prune(clientKey, this.now()).length);
  }

  reset(): void {
    this.hits.clear();
  }

  trackedClients(): number {
    return this.hits.size;
  }

  private sweep(now: number): void {
    const cutoff = now - this.config.windowMs;
    for (const [key, times] of this.hits) {
      const newest = times[times.length - 1];
      if (newest === undefined || newest <= cutoff) {
        this.hits.delete(key);
      }
    }
    this.lastSweepAt = now;
  }

  private prune(clientKey: string, now: number): number[] {
    const cutoff = now - this.config.windowMs;
    const recent = (this.hits.get(clientKey) ?? []).filter((t) => t > cutoff);
    if (recent.length === 0) {
      this.hits.delete(clientKey);
    } else {
      this.hits.set(clientKey, recent);
    }
    return recent;
  }
}

// ── Client Identification ───────────────────────────────────────────────────

export interface ClientHints {
  readonly forwardedFor?: string | null;
  readonly realIp?: string | null;
  readonly remoteAddress?: string | null;
}

export function clientKeyFrom(hints: ClientHints): string {
  const forwarded = hints.forwardedFor?.split(",")[0]?.trim();
  if (forwarded) return forwarded;
  const realIp = hints.realIp?.trim();
  if (realIp) return realIp;
  return hints.remoteAddress || "unknown";
}
