/**
 * Mutable token bucket state kept per API key
 */
export interface IBucketState {
  tokenCount: number;
  lastRefillTime: number; // Timestamp in milliseconds (Date.now())
}

/**
 * Read-only copy of a bucket, handed out by TokenBucketStore.peek
 */
export interface BucketSnapshot extends Readonly<IBucketState> {
  readonly key: string;
}

/**
 * Options for a TokenBucketStore
 */
export interface TokenBucketOptions {
  /**
   * Maximum tokens per bucket (burst size)
   */
  capacity: number;

  /**
   * Seconds over which an empty bucket refills to capacity
   */
  windowSeconds: number;

  /**
   * Upper bound on the number of tracked keys.
   * When reached, idle buckets are evicted first, then the least recently refilled one.
   */
  maxKeys?: number;
}
