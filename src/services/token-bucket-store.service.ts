import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BucketSnapshot,
  IBucketState,
  TokenBucketOptions,
} from '../interfaces/bucket.interface';
import { InvalidBucketConfigError } from '../exceptions/invalid-bucket-config.error';
import { KEY_ADMISSION_CONFIG } from '../utils/constants';
import { maskKey } from '../utils/mask-key';

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidBucketConfigError(
      `${name} must be a positive integer, got ${value}`,
    );
  }
}

/**
 * In-memory token buckets keyed by API key.
 *
 * Every bucket holds at most `capacity` whole tokens and regains `capacity`
 * tokens per `windowSeconds`. Refill happens lazily on access.
 *
 * All public methods are synchronous. Each call runs to completion on the
 * event loop, so the registry and its buckets are never observed mid-update
 * by another request; nothing in here may await.
 */
@Injectable()
export class TokenBucketStore {
  private readonly logger = new Logger(TokenBucketStore.name);
  private readonly buckets: Map<string, IBucketState> = new Map();
  private readonly capacity: number;
  private readonly windowMs: number;
  private readonly maxKeys?: number;

  constructor(@Inject(KEY_ADMISSION_CONFIG) options: TokenBucketOptions) {
    assertPositiveInteger('capacity', options.capacity);
    assertPositiveInteger('windowSeconds', options.windowSeconds);
    if (options.maxKeys !== undefined) {
      assertPositiveInteger('maxKeys', options.maxKeys);
    }

    this.capacity = options.capacity;
    this.windowMs = options.windowSeconds * 1000;
    this.maxKeys = options.maxKeys;

    this.logger.log(
      `Token buckets: ${this.capacity} tokens per ${options.windowSeconds}s`,
    );
  }

  /**
   * Number of keys currently tracked
   */
  get size(): number {
    return this.buckets.size;
  }

  /**
   * Decide whether a request billed to `key` is admitted, consuming one token if so.
   * A key seen for the first time is always admitted.
   */
  allow(key: string): boolean {
    const now = Date.now();
    const bucket = this.buckets.get(key);

    if (!bucket) {
      this.makeRoom(now);
      this.buckets.set(key, {
        tokenCount: this.capacity - 1,
        lastRefillTime: now,
      });
      this.logger.debug(
        `New bucket for key ${maskKey(key)}, ${this.capacity - 1} remaining`,
      );
      return true;
    }

    this.refill(bucket, now);

    if (bucket.tokenCount > 0) {
      bucket.tokenCount -= 1;
      this.logger.debug(
        `Consumed 1 token for key ${maskKey(key)}, ${bucket.tokenCount} remaining`,
      );
      return true;
    }

    this.logger.debug(`Bucket empty for key ${maskKey(key)}`);
    return false;
  }

  /**
   * Current state of a bucket, without refilling or creating it
   */
  peek(key: string): BucketSnapshot | null {
    const bucket = this.buckets.get(key);
    if (!bucket) {
      return null;
    }
    return {
      key,
      tokenCount: bucket.tokenCount,
      lastRefillTime: bucket.lastRefillTime,
    };
  }

  /**
   * Milliseconds until `allow(key)` would next admit a request
   */
  getWaitTimeMs(key: string): number {
    const bucket = this.buckets.get(key);
    if (!bucket || bucket.tokenCount > 0) {
      return 0;
    }

    const msPerToken = Math.ceil(this.windowMs / this.capacity);
    const elapsedMs = Date.now() - bucket.lastRefillTime;
    return Math.max(0, msPerToken - elapsedMs);
  }

  /**
   * Drop buckets that have gone a full window without a refill.
   * Such a bucket would be back at capacity on its next access, exactly like
   * a newly created one, so removing it changes no admission decision.
   *
   * @returns Number of evicted buckets
   */
  evictIdle(now: number = Date.now()): number {
    let evicted = 0;
    for (const [key, bucket] of this.buckets) {
      if (now - bucket.lastRefillTime >= this.windowMs) {
        this.buckets.delete(key);
        evicted++;
      }
    }
    return evicted;
  }

  delete(key: string): boolean {
    return this.buckets.delete(key);
  }

  clear(): void {
    this.buckets.clear();
  }

  /**
   * Add whole tokens for the time elapsed since the last refill.
   * When less than one token has accrued, lastRefillTime stays put so the
   * partial interval keeps counting toward the next token.
   */
  private refill(bucket: IBucketState, now: number): void {
    const elapsedMs = now - bucket.lastRefillTime;
    if (elapsedMs <= 0) {
      return;
    }

    // Integer arithmetic: floor(elapsed * rate) with rate = capacity / window
    const tokensToAdd = Math.floor((elapsedMs * this.capacity) / this.windowMs);
    if (tokensToAdd > 0) {
      bucket.tokenCount = Math.min(
        this.capacity,
        bucket.tokenCount + tokensToAdd,
      );
      bucket.lastRefillTime = now;
    }
  }

  private makeRoom(now: number): void {
    if (this.maxKeys === undefined || this.buckets.size < this.maxKeys) {
      return;
    }

    const evicted = this.evictIdle(now);
    if (evicted > 0) {
      this.logger.log(`Evicted ${evicted} idle buckets at key limit`);
      return;
    }

    let oldestKey: string | undefined;
    let oldestTime = Infinity;
    for (const [key, bucket] of this.buckets) {
      if (bucket.lastRefillTime < oldestTime) {
        oldestKey = key;
        oldestTime = bucket.lastRefillTime;
      }
    }
    if (oldestKey !== undefined) {
      this.buckets.delete(oldestKey);
      this.logger.warn(
        `Key limit ${this.maxKeys} reached, dropped bucket for ${maskKey(oldestKey)}`,
      );
    }
  }
}
