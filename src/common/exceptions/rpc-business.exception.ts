import { ErrorCode, ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { RpcException } from '@nestjs/microservices';

export class RpcBusinessException extends RpcException {
  constructor(
    readonly errorCode: ErrorCodeEnum,
    detail?: string,
  ) {
    const [message, code] = ErrorCode[errorCode];
    super({
      code,
      message: detail ? `${errorCode} - ${message}: ${detail}` : `${errorCode} - ${message}`,
    });
  }
}
