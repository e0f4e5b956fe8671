import type { Clock } from '../types/index.js';

export interface RateLimiterOptions {
  /** Maximum tokens, i.e. the largest burst a client may send */
  capacity: number;
  /** Seconds needed to refill an empty bucket */
  windowSeconds: number;
  now?: Clock;
}

interface ClientBucket {
  tokens: number;
  lastRefill: number;
}

/**
 * Token bucket rate limiter, one bucket per client identifier (usually the client IP).
 *
 * Every operation is synchronous, so a bucket is never observed half-updated: the event
 * loop runs each call to completion before the next one touches the same bucket, and
 * calls for other clients never wait on it.
 */
export class RateLimiter {
  private readonly capacity: number;
  private readonly refillRate: number;
  private readonly now: Clock;
  private readonly buckets = new Map<string, ClientBucket>();

  constructor(options: RateLimiterOptions) {
    if (!Number.isFinite(options.capacity) || options.capacity < 0) {
      throw new RangeError(`Rate limit capacity must be a non-negative number, got ${options.capacity}`);
    }
    if (!Number.isFinite(options.windowSeconds) || options.windowSeconds <= 0) {
      throw new RangeError(`Rate limit window must be positive, got ${options.windowSeconds}`);
    }

    this.capacity = options.capacity;
    this.refillRate = options.capacity / options.windowSeconds; // tokens per second
    this.now = options.now ?? Date.now;
  }

  get limit(): number {
    return this.capacity;
  }

  /**
   * Consumes one token if available.
   * A refused request leaves the balance untouched.
   */
  admit(clientId: string): boolean {
    const bucket = this.refill(clientId);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return true;
    }

    return false;
  }

  remaining(clientId: string): number {
    return Math.floor(this.refill(clientId).tokens);
  }

  /**
   * Seconds until the client's bucket is full again.
   */
  resetEta(clientId: string): number {
    const bucket = this.refill(clientId);
    if (this.refillRate === 0) return 0;

    const tokensNeeded = this.capacity - bucket.tokens;
    return tokensNeeded > 0 ? tokensNeeded / this.refillRate : 0;
  }

  private bucketFor(clientId: string, now: number): ClientBucket {
    let bucket = this.buckets.get(clientId);
    if (!bucket) {
      bucket = { tokens: this.capacity, lastRefill: now };
      this.buckets.set(clientId, bucket);
    }
    return bucket;
  }

  private refill(clientId: string): ClientBucket {
    const now = this.now();
    const bucket = this.bucketFor(clientId, now);

    // Clock going backwards must not drain the bucket
    const elapsedSeconds = Math.max(0, now - bucket.lastRefill) / 1000;
    bucket.tokens = Math.min(this.capacity, bucket.tokens + elapsedSeconds * this.refillRate);
    bucket.lastRefill = now;

    return bucket;
  }
}
