export enum PaymentStatus {
  PENDING = 'PENDING',
  SUCCEEDED = 'SUCCEEDED',
  FAILED = 'FAILED',
}

/**
 * A payment admitted for one idempotency key. Records are frozen on insert;
 * only later status transitions would ever replace one.
 */
export interface PaymentEntity {
  readonly id: string;
  readonly idempotencyKey: string;
  readonly orderId: string;
  /** Smallest currency unit, e.g. cents. */
  readonly amountMinor: number;
  readonly currency: string;
  readonly status: PaymentStatus;
  readonly metadata: Readonly<Record<string, string>>;
  /** ISO 8601 instant of admission, UTC. */
  readonly createdAt: string;
}
