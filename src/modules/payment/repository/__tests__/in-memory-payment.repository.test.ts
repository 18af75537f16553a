/**
 * Unit tests for the in-memory payment store
 */

import { Gate, flushMicrotasks } from '@test/utils/test-helpers';
import { PaymentEntity, PaymentStatus } from '../../entities/payment.entity';
import { InMemoryPaymentRepository } from '../in-memory-payment.repository';
import { InvariantViolationError, StorageFailureError } from '../payment-store.errors';

const createPayment = (overrides: Partial<PaymentEntity> = {}): PaymentEntity => ({
  id: 'payment-1',
  idempotencyKey: 'idem-key-12345678',
  orderId: 'order-123',
  amountMinor: 1250,
  currency: 'USD',
  status: PaymentStatus.PENDING,
  metadata: { customerId: 'customer-789' },
  createdAt: '2025-01-15T10:30:00.000Z',
  ...overrides,
});

describe('InMemoryPaymentRepository', () => {
  let repo: InMemoryPaymentRepository;

  beforeEach(() => {
    repo = new InMemoryPaymentRepository();
  });

  describe('insertIfAbsent', () => {
    it('should insert a new payment into both indices', async () => {
      const result = await repo.insertIfAbsent('idem-key-12345678', () => createPayment());

      expect(result.inserted).toBe(true);
      expect(result.payment.id).toBe('payment-1');
      expect(await repo.findById('payment-1')).toBe(result.payment);
      expect(await repo.findByIdempotencyKey('idem-key-12345678')).toBe(result.payment);
      expect(await repo.count()).toBe(1);
    });

    it('should return the existing payment without calling the factory again', async () => {
      const first = await repo.insertIfAbsent('idem-key-12345678', () => createPayment());
      const factory = jest.fn(() => createPayment({ id: 'payment-2' }));

      const second = await repo.insertIfAbsent('idem-key-12345678', factory);

      expect(second.inserted).toBe(false);
      expect(second.payment).toBe(first.payment);
      expect(factory).not.toHaveBeenCalled();
      expect(await repo.count()).toBe(1);
    });

    it('should accept asynchronous factories', async () => {
      const result = await repo.insertIfAbsent('idem-key-12345678', async () => createPayment());

      expect(result).toEqual({ payment: createPayment(), inserted: true });
    });

    it('should run exactly one factory for concurrent callers sharing a key', async () => {
      let built = 0;
      const factory = async () => {
        built += 1;
        await flushMicrotasks();
        return createPayment({ id: `payment-${built}`, idempotencyKey: 'idem-key-shared-1' });
      };

      const results = await Promise.all(
        Array.from({ length: 50 }, () => repo.insertIfAbsent('idem-key-shared-1', factory)),
      );

      expect(built).toBe(1);
      expect(results.filter((r) => r.inserted)).toHaveLength(1);
      expect(new Set(results.map((r) => r.payment.id))).toEqual(new Set(['payment-1']));
      expect(await repo.count()).toBe(1);
    });

    it('should not make callers with other keys wait on a slow insertion', async () => {
      const gate = new Gate();
      const slow = repo.insertIfAbsent('idem-key-slow-0001', async () => {
        await gate.opened;
        return createPayment({ id: 'payment-slow', idempotencyKey: 'idem-key-slow-0001' });
      });

      const fast = await repo.insertIfAbsent('idem-key-fast-0001', () =>
        createPayment({ id: 'payment-fast', idempotencyKey: 'idem-key-fast-0001' }),
      );

      expect(fast.inserted).toBe(true);
      expect(await repo.count()).toBe(1);

      gate.open();
      expect((await slow).inserted).toBe(true);
      expect(await repo.count()).toBe(2);
    });

    it('should never expose a record in one index but not the other while it is being built', async () => {
      const gate = new Gate();
      const pending = repo.insertIfAbsent('idem-key-12345678', async () => {
        await gate.opened;
        return createPayment();
      });

      await flushMicrotasks();
      expect(await repo.findById('payment-1')).toBeNull();
      expect(await repo.findByIdempotencyKey('idem-key-12345678')).toBeNull();
      expect(await repo.count()).toBe(0);

      gate.open();
      const { payment } = await pending;

      expect(await repo.findById('payment-1')).toBe(payment);
      expect(await repo.findByIdempotencyKey('idem-key-12345678')).toBe(payment);
    });

    it('should hand waiting callers the record once the first insertion completes', async () => {
      const gate = new Gate();
      const first = repo.insertIfAbsent('idem-key-12345678', async () => {
        await gate.opened;
        return createPayment();
      });
      const waiterFactory = jest.fn(() => createPayment({ id: 'payment-2' }));
      const waiter = repo.insertIfAbsent('idem-key-12345678', waiterFactory);

      gate.open();
      const [created, replayed] = await Promise.all([first, waiter]);

      expect(created.inserted).toBe(true);
      expect(replayed).toEqual({ payment: created.payment, inserted: false });
      expect(waiterFactory).not.toHaveBeenCalled();
    });

    it('should leave the store unchanged when the factory throws', async () => {
      await expect(
        repo.insertIfAbsent('idem-key-12345678', () => {
          throw new Error('id generator unavailable');
        }),
      ).rejects.toThrow(StorageFailureError);

      expect(await repo.count()).toBe(0);
      expect(await repo.findByIdempotencyKey('idem-key-12345678')).toBeNull();
    });

    it('should report the factory failure message', async () => {
      await expect(
        repo.insertIfAbsent('idem-key-12345678', async () => {
          throw new Error('id generator unavailable');
        }),
      ).rejects.toThrow(
        'Failed to build payment for idempotency key idem-key-12345678: id generator unavailable',
      );
    });

    it('should let a waiting caller insert after the in-flight factory fails', async () => {
      const gate = new Gate();
      const failing = repo.insertIfAbsent('idem-key-12345678', async () => {
        await gate.opened;
        throw new Error('boom');
      });
      const waiter = repo.insertIfAbsent('idem-key-12345678', () => createPayment({ id: 'payment-2' }));

      gate.open();

      await expect(failing).rejects.toThrow(StorageFailureError);
      const result = await waiter;
      expect(result.inserted).toBe(true);
      expect(result.payment.id).toBe('payment-2');
      expect(await repo.count()).toBe(1);
    });

    it('should refuse a duplicate identifier without overwriting the existing payment', async () => {
      const original = await repo.insertIfAbsent('idem-key-aaaaaaaa', () =>
        createPayment({ id: 'payment-1', idempotencyKey: 'idem-key-aaaaaaaa' }),
      );

      await expect(
        repo.insertIfAbsent('idem-key-bbbbbbbb', () =>
          createPayment({ id: 'payment-1', idempotencyKey: 'idem-key-bbbbbbbb', orderId: 'order-999' }),
        ),
      ).rejects.toThrow(InvariantViolationError);

      expect(await repo.findById('payment-1')).toBe(original.payment);
      expect(await repo.findByIdempotencyKey('idem-key-bbbbbbbb')).toBeNull();
      expect(await repo.count()).toBe(1);
    });

    it('should refuse a record filed under a different idempotency key', async () => {
      await expect(
        repo.insertIfAbsent('idem-key-aaaaaaaa', () =>
          createPayment({ idempotencyKey: 'idem-key-bbbbbbbb' }),
        ),
      ).rejects.toThrow(
        'Payment payment-1 carries idempotency key idem-key-bbbbbbbb, expected idem-key-aaaaaaaa',
      );

      expect(await repo.count()).toBe(0);
    });
  });

  describe('stored records', () => {
    it('should be frozen, including metadata', async () => {
      const { payment } = await repo.insertIfAbsent('idem-key-12345678', () => createPayment());

      expect(Object.isFrozen(payment)).toBe(true);
      expect(Object.isFrozen(payment.metadata)).toBe(true);
    });

    it('should not follow later changes to the factory result', async () => {
      const source = createPayment();
      const mutableMetadata: Record<string, string> = { customerId: 'customer-789' };

      const { payment } = await repo.insertIfAbsent('idem-key-12345678', () => ({
        ...source,
        metadata: mutableMetadata,
      }));
      mutableMetadata.customerId = 'someone-else';

      const stored = await repo.findById('payment-1');
      expect(stored?.metadata).toEqual({ customerId: 'customer-789' });
      expect(stored).toBe(payment);
    });
  });

  describe('lookups', () => {
    it('should return null for unknown ids and keys', async () => {
      expect(await repo.findById('nonexistent-id')).toBeNull();
      expect(await repo.findByIdempotencyKey('unknown-key-0001')).toBeNull();
    });
  });
});
