import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { GlobalGrpcExceptionFilter } from './common/filters/global-grpc-exception.filter';
import { PaymentModule } from './modules/payment/payment.module';
import { SharedModule } from './shared.module';

@Module({
  imports: [SharedModule, PaymentModule],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GlobalGrpcExceptionFilter,
    },
  ],
})
export class AppModule {}
