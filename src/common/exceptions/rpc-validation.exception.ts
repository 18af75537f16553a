import { status } from '@grpc/grpc-js';
import { RpcException } from '@nestjs/microservices';
import { ValidationError } from 'class-validator';

export class RpcValidationException extends RpcException {
  constructor(message: string, details?: string | object) {
    super({
      code: status.INVALID_ARGUMENT,
      message,
      details,
    });
  }

  /**
   * Builds the exception raised by the global ValidationPipe, with one
   * `property: reason` entry per failed constraint.
   */
  static fromValidationErrors(errors: ValidationError[]): RpcValidationException {
    const reasons = flattenValidationErrors(errors);
    return new RpcValidationException(`Validation failed: ${reasons.join('; ')}`, reasons);
  }
}

export function flattenValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((reason) => `${path}: ${reason}`);
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}
