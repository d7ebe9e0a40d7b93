/**
 * Per-key token buckets guarding tool invocations. State lives in memory for
 * the lifetime of the limiter instance and is never persisted.
 *
 * {@link TokenBucketLimiter.admit} is synchronous: the refill, the comparison
 * and the decrement for a key complete within one turn of the event loop, so
 * concurrent invocations can neither lose an update nor spend the same token
 * twice, and buckets of different keys never wait on each other.
 */
import { performance } from "node:perf_hooks";

/** Mutable bucket owned by the limiter. */
export interface RateLimitState {
  readonly key: string;
  readonly capacity: number;
  readonly refillIntervalMs: number;
  tokens: number;
  lastRefill: number;
}

/** Outcome of one admission check. */
export interface RateLimitDecision {
  readonly admitted: boolean;
  readonly key: string;
  /** Whole tokens left after the decision. */
  readonly remaining: number;
  /** Delay until one token is available again, `null` when admitted. */
  readonly retryAfterMs: number | null;
}

export interface TokenBucketOptions {
  /** Tokens available per interval for keys without an override. */
  readonly capacity: number;
  /** Length of the window over which a full bucket refills. */
  readonly refillIntervalMs: number;
  /** Capacity overrides keyed by rate-limit key; the interval stays global. */
  readonly overrides?: Readonly<Record<string, number>>;
  /** Monotonic millisecond clock, `performance.now` unless a test injects its own. */
  readonly now?: () => number;
}

function assertPositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${label} must be a positive number (received ${value})`);
  }
}

export class TokenBucketLimiter {
  private readonly buckets = new Map<string, RateLimitState>();
  private readonly capacity: number;
  private readonly refillIntervalMs: number;
  private readonly overrides: Readonly<Record<string, number>>;
  private readonly now: () => number;

  constructor(options: TokenBucketOptions) {
    assertPositive(options.capacity, "capacity");
    assertPositive(options.refillIntervalMs, "refillIntervalMs");
    for (const [key, capacity] of Object.entries(options.overrides ?? {})) {
      assertPositive(capacity, `capacity override for ${key}`);
    }
    this.capacity = options.capacity;
    this.refillIntervalMs = options.refillIntervalMs;
    this.overrides = { ...options.overrides };
    this.now = options.now ?? (() => performance.now());
  }

  /** Capacity applied to {@link key}, honouring overrides. */
  capacityFor(key: string): number {
    return Object.hasOwn(this.overrides, key) ? (this.overrides[key] ?? this.capacity) : this.capacity;
  }

  /**
   * Refills the bucket of {@link key} for the elapsed time, then consumes one
   * token when at least one is available. A rejection leaves the balance
   * untouched.
   */
  admit(key: string): RateLimitDecision {
    const bucket = this.refill(this.bucketFor(key));

    if (bucket.tokens < 1) {
      const rate = bucket.capacity / bucket.refillIntervalMs;
      return {
        admitted: false,
        key,
        remaining: 0,
        retryAfterMs: Math.ceil((1 - bucket.tokens) / rate),
      };
    }

    bucket.tokens -= 1;
    return { admitted: true, key, remaining: Math.floor(bucket.tokens), retryAfterMs: null };
  }

  /** Read-only snapshot of a bucket, `undefined` before its first use. */
  inspect(key: string): Readonly<RateLimitState> | undefined {
    const bucket = this.buckets.get(key);
    return bucket ? { ...bucket } : undefined;
  }

  /** Drops every bucket. Called when the owning runtime shuts down. */
  reset(): void {
    this.buckets.clear();
  }

  private bucketFor(key: string): RateLimitState {
    let bucket = this.buckets.get(key);
    if (!bucket) {
      const capacity = this.capacityFor(key);
      bucket = {
        key,
        capacity,
        refillIntervalMs: this.refillIntervalMs,
        tokens: capacity,
        lastRefill: this.now(),
      };
      this.buckets.set(key, bucket);
    }
    return bucket;
  }

  private refill(bucket: RateLimitState): RateLimitState {
    const now = this.now();
    const elapsed = now - bucket.lastRefill;
    if (elapsed <= 0) {
      // A clock that went backwards restarts the refill window from here.
      bucket.lastRefill = now;
      return bucket;
    }
    bucket.tokens = Math.min(bucket.capacity, bucket.tokens + (elapsed / bucket.refillIntervalMs) * bucket.capacity);
    bucket.lastRefill = now;
    return bucket;
  }
}
