import { ValidationPipe } from '@nestjs/common';
import { RpcValidationException } from '../exceptions/rpc-validation.exception';

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    transform: true,
    exceptionFactory: (errors) => RpcValidationException.fromValidationErrors(errors),
  });
}
