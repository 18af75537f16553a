/**
 * Message shapes of `protos/payment.proto` as delivered by @grpc/proto-loader
 * with `keepCase: false`, `longs: Number` and `enums: String`.
 */
export const PAYMENT_PACKAGE_NAME = 'payments';
export const PAYMENT_SERVICE_NAME = 'PaymentService';

export enum ProtoPaymentStatus {
  UNSPECIFIED = 'PAYMENT_STATUS_UNSPECIFIED',
  PENDING = 'PAYMENT_STATUS_PENDING',
  SUCCEEDED = 'PAYMENT_STATUS_SUCCEEDED',
  FAILED = 'PAYMENT_STATUS_FAILED',
}

export interface ProtoTimestamp {
  seconds: number;
  nanos: number;
}

export interface RequestPaymentRequest {
  amountMinor: number;
  currency: string;
  orderId: string;
  idempotencyKey: string;
  metadata?: Record<string, string>;
}

export interface GetPaymentRequest {
  paymentId: string;
}

export interface PaymentResponse {
  paymentId: string;
  status: ProtoPaymentStatus;
  amountMinor: number;
  currency: string;
  orderId: string;
  idempotencyKey: string;
  metadata: Record<string, string>;
  createdAt: ProtoTimestamp;
  message: string;
}

export interface HealthResponse {
  status: string;
}
