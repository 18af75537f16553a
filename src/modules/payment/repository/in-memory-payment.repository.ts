import { Injectable } from '@nestjs/common';
import { PaymentEntity } from '../entities/payment.entity';
import { InvariantViolationError, StorageFailureError } from './payment-store.errors';
import { InsertIfAbsentResult, PaymentFactory, PaymentRepository } from './payment.repository';

/**
 * Process-local payment store.
 *
 * Both indices are written in one synchronous block, so a record shows up in
 * both at once. Insertions for the same key are single-flighted through
 * `pending`: while a factory runs, later callers for that key wait on it
 * instead of building their own record. Callers with other keys never wait.
 */
@Injectable()
export class InMemoryPaymentRepository extends PaymentRepository {
  private readonly paymentsById = new Map<string, PaymentEntity>();
  private readonly idsByIdempotencyKey = new Map<string, string>();
  private readonly pending = new Map<string, Promise<PaymentEntity>>();

  async findById(id: string): Promise<PaymentEntity | null> {
    return this.paymentsById.get(id) ?? null;
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<PaymentEntity | null> {
    return this.lookupByKey(idempotencyKey);
  }

  async insertIfAbsent(
    idempotencyKey: string,
    factory: PaymentFactory,
  ): Promise<InsertIfAbsentResult> {
    for (;;) {
      const existing = this.lookupByKey(idempotencyKey);
      if (existing) {
        return { payment: existing, inserted: false };
      }

      const inFlight = this.pending.get(idempotencyKey);
      if (!inFlight) break;

      // The owner of the in-flight insertion handles its failure; on failure
      // the loop comes round and this caller tries to insert itself.
      await Promise.allSettled([inFlight]);
    }

    const insertion = this.build(idempotencyKey, factory);
    this.pending.set(idempotencyKey, insertion);
    try {
      return { payment: await insertion, inserted: true };
    } finally {
      if (this.pending.get(idempotencyKey) === insertion) {
        this.pending.delete(idempotencyKey);
      }
    }
  }

  async count(): Promise<number> {
    return this.paymentsById.size;
  }

  private lookupByKey(idempotencyKey: string): PaymentEntity | null {
    const id = this.idsByIdempotencyKey.get(idempotencyKey);
    if (id === undefined) return null;

    const payment = this.paymentsById.get(id);
    if (!payment) {
      throw new InvariantViolationError(
        `Index desynchronized: key ${idempotencyKey} points at missing payment ${id}`,
        idempotencyKey,
        id,
      );
    }
    return payment;
  }

  private async build(idempotencyKey: string, factory: PaymentFactory): Promise<PaymentEntity> {
    let candidate: PaymentEntity;
    try {
      candidate = await factory();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StorageFailureError(
        `Failed to build payment for idempotency key ${idempotencyKey}: ${reason}`,
        idempotencyKey,
        error,
      );
    }

    return this.commit(idempotencyKey, candidate);
  }

  // Synchronous on purpose: nothing may interleave between the checks and
  // the two index writes.
  private commit(idempotencyKey: string, candidate: PaymentEntity): PaymentEntity {
    if (candidate.idempotencyKey !== idempotencyKey) {
      throw new InvariantViolationError(
        `Payment ${candidate.id} carries idempotency key ${candidate.idempotencyKey}, expected ${idempotencyKey}`,
        idempotencyKey,
        candidate.id,
      );
    }
    if (this.idsByIdempotencyKey.has(idempotencyKey)) {
      throw new InvariantViolationError(
        `Idempotency key ${idempotencyKey} was admitted outside the single-flight path`,
        idempotencyKey,
        candidate.id,
      );
    }
    if (this.paymentsById.has(candidate.id)) {
      throw new InvariantViolationError(
        `Duplicate payment identifier ${candidate.id}`,
        idempotencyKey,
        candidate.id,
      );
    }

    const payment: PaymentEntity = Object.freeze({
      ...candidate,
      metadata: Object.freeze({ ...candidate.metadata }),
    });

    this.paymentsById.set(payment.id, payment);
    this.idsByIdempotencyKey.set(idempotencyKey, payment.id);
    return payment;
  }
}
