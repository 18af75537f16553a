import { Inject, Injectable } from '@nestjs/common';
import { ConflictPolicy } from '@/shared/constants/conflict-policy.constant';
import { AppConfigService } from '@/shared/services/config.service';
import { LoggerService } from '@/shared/services/logger.service';
import { RequestPaymentDto } from '../dto';
import { PaymentEntity, PaymentStatus } from '../entities/payment.entity';
import { PaymentAdmissionError, mapStoreErrorToAdmission } from '../errors/payment.errors';
import { CLOCK, Clock } from '../identity/clock';
import { ID_GENERATOR, IdGenerator } from '../identity/id-generator';
import { PaymentRepository } from '../repository/payment.repository';

export type RequestPaymentResult =
  | { ok: true; payment: PaymentEntity; isNew: boolean }
  | { ok: false; error: PaymentAdmissionError };

export type GetPaymentResult =
  | { ok: true; payment: PaymentEntity }
  | { ok: false; error: PaymentAdmissionError };

/**
 * Idempotent payment admission. The first request for an idempotency key
 * creates a PENDING payment; every later request for that key gets the same
 * record back. Failures come back as typed results, never as exceptions.
 */
@Injectable()
export class PaymentAdmissionService {
  private readonly conflictPolicy: ConflictPolicy;

  constructor(
    private readonly repo: PaymentRepository,
    @Inject(ID_GENERATOR) private readonly ids: IdGenerator,
    @Inject(CLOCK) private readonly clock: Clock,
    configService: AppConfigService,
    private readonly logger: LoggerService,
  ) {
    logger.setContext(PaymentAdmissionService.name);
    this.conflictPolicy = configService.idempotencyConfig.conflictPolicy;
  }

  async requestPayment(dto: RequestPaymentDto): Promise<RequestPaymentResult> {
    const violation = this.checkPreconditions(dto);
    if (violation) {
      this.logger.error(
        `Rejected payment request for idempotency key "${dto.idempotencyKey}": ${violation}`,
      );
      return { ok: false, error: { kind: 'INVARIANT_VIOLATION', message: violation } };
    }

    let payment: PaymentEntity;
    let inserted: boolean;
    try {
      ({ payment, inserted } = await this.repo.insertIfAbsent(dto.idempotencyKey, () =>
        this.buildPayment(dto),
      ));
    } catch (error) {
      const mapped = mapStoreErrorToAdmission(error);
      this.logger.error(
        `Payment admission failed for idempotency key ${dto.idempotencyKey}: ${mapped.kind}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { ok: false, error: mapped };
    }

    if (inserted) {
      this.logger.info(
        `Payment admitted: paymentId=${payment.id}, orderId=${payment.orderId}, amountMinor=${payment.amountMinor}, currency=${payment.currency}`,
      );
      return { ok: true, payment, isNew: true };
    }

    const mismatchedFields = diffPayload(payment, dto);
    if (mismatchedFields.length > 0 && this.conflictPolicy === 'reject') {
      this.logger.warn(
        `Idempotency conflict for key ${dto.idempotencyKey}: ${mismatchedFields.join(', ')} differ from payment ${payment.id}`,
      );
      return {
        ok: false,
        error: {
          kind: 'IDEMPOTENCY_CONFLICT',
          idempotencyKey: dto.idempotencyKey,
          paymentId: payment.id,
          mismatchedFields,
        },
      };
    }

    this.logger.info(`Returning existing payment ${payment.id} for idempotency key ${dto.idempotencyKey}`);
    return { ok: true, payment, isNew: false };
  }

  async getPayment(paymentId: string): Promise<GetPaymentResult> {
    let payment: PaymentEntity | null;
    try {
      payment = await this.repo.findById(paymentId);
    } catch (error) {
      const mapped = mapStoreErrorToAdmission(error);
      this.logger.error(
        `Payment lookup failed for ${paymentId}: ${mapped.kind}`,
        error instanceof Error ? error.stack : undefined,
      );
      return { ok: false, error: mapped };
    }

    if (!payment) {
      this.logger.debug(`Payment not found: ${paymentId}`);
      return { ok: false, error: { kind: 'NOT_FOUND', paymentId } };
    }

    return { ok: true, payment };
  }

  private async buildPayment(dto: RequestPaymentDto): Promise<PaymentEntity> {
    const id = await this.ids.generate();
    return {
      id,
      idempotencyKey: dto.idempotencyKey,
      orderId: dto.orderId,
      amountMinor: dto.amountMinor,
      currency: dto.currency,
      status: PaymentStatus.PENDING,
      metadata: { ...dto.metadata },
      createdAt: this.clock.now().toISOString(),
    };
  }

  private checkPreconditions(dto: RequestPaymentDto): string | null {
    if (!Number.isInteger(dto.amountMinor) || dto.amountMinor <= 0) {
      return `amountMinor must be a positive integer, got ${dto.amountMinor}`;
    }
    if (!dto.idempotencyKey) {
      return 'idempotencyKey must not be empty';
    }
    if (!dto.orderId) {
      return 'orderId must not be empty';
    }
    return null;
  }
}

function diffPayload(payment: PaymentEntity, dto: RequestPaymentDto): string[] {
  const mismatched: string[] = [];
  if (payment.amountMinor !== dto.amountMinor) mismatched.push('amountMinor');
  if (payment.currency !== dto.currency) mismatched.push('currency');
  if (payment.orderId !== dto.orderId) mismatched.push('orderId');
  if (!sameMetadata(payment.metadata, dto.metadata)) mismatched.push('metadata');
  return mismatched;
}

function sameMetadata(a: Readonly<Record<string, string>>, b: Record<string, string>): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}
