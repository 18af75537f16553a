import { Controller } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import { RpcBusinessException } from '@/common/exceptions/rpc-business.exception';
import { ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { LoggerService } from '@/shared/services/logger.service';
import { PaymentAdmissionError } from '../../errors/payment.errors';
import { PaymentAdmissionService } from '../../services/payment-admission.service';
import { GetPaymentDto, RequestPaymentDto } from './dto';
import { toPaymentResponse } from './mappers/payment.mapper';
import { HealthResponse, PAYMENT_SERVICE_NAME, PaymentResponse } from './payment.grpc';

@Controller()
export class GrpcPaymentController {
  constructor(
    private readonly paymentAdmissionService: PaymentAdmissionService,
    private readonly logger: LoggerService,
  ) {
    logger.setContext(GrpcPaymentController.name);
  }

  @GrpcMethod(PAYMENT_SERVICE_NAME, 'RequestPayment')
  async requestPayment(dto: RequestPaymentDto): Promise<PaymentResponse> {
    this.logger.info(
      `GrpcPaymentController.requestPayment called: orderId=${dto.orderId}, idempotencyKey=${dto.idempotencyKey}`,
    );
    const result = await this.paymentAdmissionService.requestPayment(dto.toServiceDto());
    if (!result.ok) {
      throw toRpcException(result.error);
    }
    this.logger.info(
      `GrpcPaymentController.requestPayment completed: paymentId=${result.payment.id}, isNew=${result.isNew}`,
    );

    // Replays get exactly the payload of the original admission.
    return toPaymentResponse(result.payment);
  }

  @GrpcMethod(PAYMENT_SERVICE_NAME, 'GetPayment')
  async getPayment(dto: GetPaymentDto): Promise<PaymentResponse> {
    this.logger.info(`GrpcPaymentController.getPayment called: paymentId=${dto.paymentId}`);
    const result = await this.paymentAdmissionService.getPayment(dto.paymentId);
    if (!result.ok) {
      throw toRpcException(result.error);
    }
    this.logger.info(`GrpcPaymentController.getPayment completed.`);

    return toPaymentResponse(result.payment);
  }

  @GrpcMethod(PAYMENT_SERVICE_NAME, 'Health')
  health(): HealthResponse {
    this.logger.debug('GrpcPaymentController.health called.');
    return { status: 'ok' };
  }
}

export function toRpcException(error: PaymentAdmissionError): RpcBusinessException {
  switch (error.kind) {
    case 'NOT_FOUND':
      return new RpcBusinessException(ErrorCodeEnum.PaymentNotFound, error.paymentId);
    case 'IDEMPOTENCY_CONFLICT':
      return new RpcBusinessException(
        ErrorCodeEnum.IdempotencyConflict,
        `${error.mismatchedFields.join(', ')} differ from payment ${error.paymentId}`,
      );
    case 'STORAGE_FAILURE':
      return new RpcBusinessException(ErrorCodeEnum.StorageFailure);
    case 'INVARIANT_VIOLATION':
      return new RpcBusinessException(ErrorCodeEnum.InvariantViolation);
  }
}
