export * from './request-payment.dto';
