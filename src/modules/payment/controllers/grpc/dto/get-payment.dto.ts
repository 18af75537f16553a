import { IsNotEmpty, IsString } from 'class-validator';
import { GetPaymentRequest } from '../payment.grpc';

export class GetPaymentDto implements GetPaymentRequest {
  @IsNotEmpty()
  @IsString()
  paymentId!: string;
}
