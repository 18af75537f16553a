import { PaymentStatus } from '../../../entities/payment.entity';
import { ProtoPaymentStatus } from '../payment.grpc';

export class PaymentStatusMapper {
  private static domainToProtoMap = new Map<PaymentStatus, ProtoPaymentStatus>([
    [PaymentStatus.PENDING, ProtoPaymentStatus.PENDING],
    [PaymentStatus.SUCCEEDED, ProtoPaymentStatus.SUCCEEDED],
    [PaymentStatus.FAILED, ProtoPaymentStatus.FAILED],
  ]);

  private static messages = new Map<PaymentStatus, string>([
    [PaymentStatus.PENDING, 'Payment initiated'],
    [PaymentStatus.SUCCEEDED, 'Payment succeeded'],
    [PaymentStatus.FAILED, 'Payment failed'],
  ]);

  static toMessage(status: PaymentStatus): string {
    const message = this.messages.get(status);
    if (!message) {
      throw new Error(`Unknown PaymentStatus: ${status}`);
    }
    return message;
  }

  static toProto(status: PaymentStatus): ProtoPaymentStatus {
    const protoStatus = this.domainToProtoMap.get(status);
    if (!protoStatus) {
      throw new Error(`Unknown PaymentStatus: ${status}`);
    }
    return protoStatus;
  }
}
