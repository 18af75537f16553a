import { Module } from '@nestjs/common';
import { GrpcPaymentController } from './controllers/grpc/payment.controller';
import { CLOCK, SystemClock } from './identity/clock';
import { ID_GENERATOR, UuidIdGenerator } from './identity/id-generator';
import { InMemoryPaymentRepository } from './repository/in-memory-payment.repository';
import { PaymentRepository } from './repository/payment.repository';
import { PaymentAdmissionService } from './services/payment-admission.service';

@Module({
  controllers: [GrpcPaymentController],
  providers: [
    PaymentAdmissionService,
    { provide: PaymentRepository, useClass: InMemoryPaymentRepository },
    { provide: ID_GENERATOR, useClass: UuidIdGenerator },
    { provide: CLOCK, useClass: SystemClock },
  ],
})
export class PaymentModule {}
