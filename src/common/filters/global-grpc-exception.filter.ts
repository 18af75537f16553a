import { LoggerService } from '@/shared/services/logger.service';
import { status } from '@grpc/grpc-js';
import { Catch, RpcExceptionFilter } from '@nestjs/common';
import { RpcException } from '@nestjs/microservices';
import { Observable, throwError } from 'rxjs';

export interface GrpcErrorPayload {
  code: status;
  message: string;
  details?: unknown;
}

@Catch()
export class GlobalGrpcExceptionFilter implements RpcExceptionFilter<unknown> {
  constructor(private readonly logger: LoggerService) {
    this.logger.setContext(GlobalGrpcExceptionFilter.name);
  }

  catch(exception: unknown): Observable<never> {
    if (exception instanceof RpcException) {
      const error = exception.getError();
      this.logger.warn(`Rpc exception: ${typeof error === 'string' ? error : JSON.stringify(error)}`);
      return throwError(() => error);
    }

    const err = exception instanceof Error ? exception : new Error(String(exception));
    this.logger.error(`Unhandled exception: ${err.message}`, err.stack);
    const payload: GrpcErrorPayload = { code: status.INTERNAL, message: 'Internal server error' };
    return throwError(() => payload);
  }
}
