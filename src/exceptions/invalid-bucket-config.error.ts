/**
 * Raised when a TokenBucketStore is constructed with unusable limits
 */
export class InvalidBucketConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = InvalidBucketConfigError.name;
  }
}
