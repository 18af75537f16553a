import { status as GrpcStatus } from '@grpc/grpc-js';

export enum ErrorCodeEnum {
  PaymentNotFound = 20000,
  IdempotencyConflict = 20001,

  StorageFailure = 29000,
  InvariantViolation = 29001,
}

export const ErrorCode = Object.freeze<Record<ErrorCodeEnum, [string, GrpcStatus]>>({
  [ErrorCodeEnum.PaymentNotFound]: ['Payment not found', GrpcStatus.NOT_FOUND],
  [ErrorCodeEnum.IdempotencyConflict]: [
    'Idempotency key already used with a different payload',
    GrpcStatus.ALREADY_EXISTS,
  ],

  [ErrorCodeEnum.StorageFailure]: ['Internal error processing payment', GrpcStatus.INTERNAL],
  [ErrorCodeEnum.InvariantViolation]: ['Internal error processing payment', GrpcStatus.INTERNAL],
});
