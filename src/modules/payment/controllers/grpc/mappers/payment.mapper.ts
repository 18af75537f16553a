import { PaymentEntity } from '../../../entities/payment.entity';
import { PaymentResponse, ProtoTimestamp } from '../payment.grpc';
import { PaymentStatusMapper } from './status.mapper';

export function toProtoTimestamp(date: Date): ProtoTimestamp {
  const millis = date.getTime();
  const seconds = Math.floor(millis / 1000);
  return { seconds, nanos: (millis - seconds * 1000) * 1_000_000 };
}

export function toPaymentResponse(payment: PaymentEntity): PaymentResponse {
  return {
    paymentId: payment.id,
    status: PaymentStatusMapper.toProto(payment.status),
    amountMinor: payment.amountMinor,
    currency: payment.currency,
    orderId: payment.orderId,
    idempotencyKey: payment.idempotencyKey,
    metadata: { ...payment.metadata },
    createdAt: toProtoTimestamp(new Date(payment.createdAt)),
    message: PaymentStatusMapper.toMessage(payment.status),
  };
}
