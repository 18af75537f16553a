/**
 * Thrown by a payment store when an insertion could not complete. The store
 * is left unchanged.
 */
export class StorageFailureError extends Error {
  constructor(
    message: string,
    readonly idempotencyKey: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StorageFailureError';
  }
}

/**
 * Thrown when committing a record would break index consistency: an
 * identifier collision, a record filed under the wrong key, or indices that
 * have drifted apart. Signals a defect, never retried.
 */
export class InvariantViolationError extends Error {
  constructor(
    message: string,
    readonly idempotencyKey: string,
    readonly paymentId?: string,
  ) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}
