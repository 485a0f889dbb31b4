/**
 * Delivered as a carried error when a request names a bucket the storage
 * backend does not have.
 */
export class BucketNotFoundError extends Error {
  constructor(public readonly bucket: string) {
    super(`bucket "${bucket}" not found`);
    this.name = 'BucketNotFoundError';
  }
}

/**
 * Delivered as a carried error when a download names a key that is not
 * stored in the bucket.
 */
export class ObjectNotFoundError extends Error {
  constructor(
    public readonly bucket: string,
    public readonly key: string,
  ) {
    super(`object "${key}" not found in bucket "${bucket}"`);
    this.name = 'ObjectNotFoundError';
  }
}

/** Wraps a thrown value that is not an `Error`. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
