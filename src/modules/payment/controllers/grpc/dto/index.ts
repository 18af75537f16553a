export * from './get-payment.dto';
export * from './request-payment.dto';
