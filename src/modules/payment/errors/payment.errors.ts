import { InvariantViolationError, StorageFailureError } from '../repository/payment-store.errors';

export type PaymentAdmissionError =
  | { kind: 'NOT_FOUND'; paymentId: string }
  | {
      kind: 'IDEMPOTENCY_CONFLICT';
      idempotencyKey: string;
      paymentId: string;
      mismatchedFields: string[];
    }
  | { kind: 'STORAGE_FAILURE'; message: string }
  | { kind: 'INVARIANT_VIOLATION'; message: string };

/**
 * Maps anything thrown by the payment store onto an admission error. Unknown
 * throwables count as storage failures.
 */
export function mapStoreErrorToAdmission(error: unknown): PaymentAdmissionError {
  if (error instanceof InvariantViolationError) {
    return { kind: 'INVARIANT_VIOLATION', message: error.message };
  }

  if (error instanceof StorageFailureError) {
    return { kind: 'STORAGE_FAILURE', message: error.message };
  }

  return {
    kind: 'STORAGE_FAILURE',
    message: error instanceof Error ? error.message : String(error),
  };
}
