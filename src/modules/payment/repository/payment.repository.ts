import { PaymentEntity } from '../entities/payment.entity';

export type PaymentFactory = () => PaymentEntity | Promise<PaymentEntity>;

export interface InsertIfAbsentResult {
  payment: PaymentEntity;
  inserted: boolean;
}

/**
 * Storage port for admitted payments, indexed by payment id and by
 * idempotency key. Also the Nest injection token for the active store.
 */
export abstract class PaymentRepository {
  abstract findById(id: string): Promise<PaymentEntity | null>;

  abstract findByIdempotencyKey(idempotencyKey: string): Promise<PaymentEntity | null>;

  /**
   * Returns the payment stored under `idempotencyKey`, or builds one with
   * `factory` and stores it under both indices. For a given key at most one
   * factory result is ever stored, and every caller receives that record.
   *
   * @throws StorageFailureError when `factory` fails; nothing is stored.
   * @throws InvariantViolationError when the new record would collide with
   * an existing id or does not carry `idempotencyKey`.
   */
  abstract insertIfAbsent(
    idempotencyKey: string,
    factory: PaymentFactory,
  ): Promise<InsertIfAbsentResult>;

  abstract count(): Promise<number>;
}
