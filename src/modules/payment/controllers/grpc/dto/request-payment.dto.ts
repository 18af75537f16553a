import { RequestPaymentDto as ServiceRequestPaymentDto } from '@/modules/payment/dto';
import {
  MIN_IDEMPOTENCY_KEY_LENGTH,
  SUPPORTED_CURRENCIES,
} from '@/shared/constants/currency.constant';
import { Transform, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsPositive,
  IsString,
  Max,
  MinLength,
} from 'class-validator';
import { RequestPaymentRequest } from '../payment.grpc';
import { IsStringRecord } from './is-string-record.decorator';

export class RequestPaymentDto implements RequestPaymentRequest {
  toServiceDto(): ServiceRequestPaymentDto {
    return {
      amountMinor: this.amountMinor,
      currency: this.currency,
      orderId: this.orderId,
      idempotencyKey: this.idempotencyKey,
      metadata: { ...(this.metadata ?? {}) },
    };
  }

  // int64 on the wire; proto-loader rounds anything past 2^53 to a double.
  @IsInt()
  @IsPositive()
  @Max(Number.MAX_SAFE_INTEGER)
  @Type(() => Number)
  amountMinor!: number;

  @IsNotEmpty()
  @IsString()
  @IsIn(SUPPORTED_CURRENCIES, {
    message: `currency must be one of: ${SUPPORTED_CURRENCIES.join(', ')}`,
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  currency!: string;

  @IsNotEmpty()
  @IsString()
  orderId!: string;

  @IsString()
  @MinLength(MIN_IDEMPOTENCY_KEY_LENGTH)
  idempotencyKey!: string;

  @IsOptional()
  @IsStringRecord()
  metadata?: Record<string, string>;
}
