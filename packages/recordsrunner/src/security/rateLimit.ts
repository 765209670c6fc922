import type { Redis } from 'ioredis';
import { SUBMISSION_LIMITS } from '../config/rateLimits.js';
import { utcStamp } from '../lib/timestamps.js';

// ─── Counter Backends ──────────────────────────────────────────────

/**
 * Fixed-window counter storage. `incrementWithTtl` bumps the counter and
 * returns the new value; the TTL is applied when the key is created.
 */
export interface CounterBackend {
  incrementWithTtl(key: string, ttlSeconds: number): Promise<number>;
  peek(key: string): Promise<number>;
}

// INCR and EXPIRE in one round trip so a crash between them cannot leave a
// counter without a TTL.
const INCR_WITH_TTL_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 then
  redis.call('EXPIRE', KEYS[1], ARGV[1])
end
return count
`;

export class RedisCounterBackend implements CounterBackend {
  constructor(private readonly redis: Pick<Redis, 'eval' | 'get'>) {}

  async incrementWithTtl(key: string, ttlSeconds: number): Promise<number> {
    const result = await this.redis.eval(INCR_WITH_TTL_SCRIPT, 1, key, String(ttlSeconds));
    if (typeof result !== 'number') {
      throw new Error(`Unexpected counter reply for ${key}: ${String(result)}`);
    }
    return result;
  }

  async peek(key: string): Promise<number> {
    const value = await this.redis.get(key);
    return value === null ? 0 : Number.parseInt(value, 10) || 0;
  }
}

/** Single-process counter for development and tests. */
export class MemoryCounterBackend implements CounterBackend {
  private readonly counters = new Map<string, { count: number; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async incrementWithTtl(key: string, ttlSeconds: number): Promise<number> {
    const now = this.now();
    const entry = this.counters.get(key);
    if (!entry || entry.expiresAt <= now) {
      this.counters.set(key, { count: 1, expiresAt: now + ttlSeconds * 1000 });
      return 1;
    }
    entry.count++;
    return entry.count;
  }

  async peek(key: string): Promise<number> {
    const entry = this.counters.get(key);
    if (!entry || entry.expiresAt <= this.now()) return 0;
    return entry.count;
  }
}

// ─── Submission Rate Limiter ───────────────────────────────────────

export class RateLimitExceededError extends Error {
  readonly kind = 'rate_limit_exceeded' as const;

  constructor(
    public readonly windowKey: string,
    public readonly limit: number,
  ) {
    super(`Submission budget of ${limit} exhausted for window ${windowKey}`);
    this.name = 'RateLimitExceededError';
  }
}

export interface SubmissionRateLimiterOptions {
  backend: CounterBackend;
  /** Submissions allowed per hourly window */
  limit?: number;
  keyPrefix?: string;
  clock?: () => Date;
}

/**
 * Caps portal submissions per UTC clock hour, shared by every worker that
 * points at the same backend.
 */
export class SubmissionRateLimiter {
  readonly limit: number;
  private readonly backend: CounterBackend;
  private readonly keyPrefix: string;
  private readonly clock: () => Date;
  private readonly ttlSeconds = Math.ceil(SUBMISSION_LIMITS.windows.hourly / 1000);

  constructor(options: SubmissionRateLimiterOptions) {
    this.backend = options.backend;
    this.limit = options.limit ?? SUBMISSION_LIMITS.perHour;
    this.keyPrefix = options.keyPrefix ?? 'worker:requests';
    this.clock = options.clock ?? (() => new Date());
  }

  /** Current window identifier, `YYYYMMDDHH` in UTC. */
  currentWindow(): string {
    return utcStamp(this.clock(), 'hour');
  }

  /**
   * Consume one unit of budget. Returns false once the window's count passes
   * the limit; a refused call still counts, which only hastens refusal.
   */
  async tryAcquire(windowKey: string = this.currentWindow()): Promise<boolean> {
    const count = await this.backend.incrementWithTtl(this.key(windowKey), this.ttlSeconds);
    return count <= this.limit;
  }

  /** Like tryAcquire, but throws RateLimitExceededError on refusal. */
  async acquire(windowKey: string = this.currentWindow()): Promise<void> {
    if (!(await this.tryAcquire(windowKey))) {
      throw new RateLimitExceededError(windowKey, this.limit);
    }
  }

  async remaining(windowKey: string = this.currentWindow()): Promise<number> {
    const used = await this.backend.peek(this.key(windowKey));
    return Math.max(0, this.limit - used);
  }

  private key(windowKey: string): string {
    return `${this.keyPrefix}:${windowKey}`;
  }
}
