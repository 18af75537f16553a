/**
 * Input to payment admission. Fields are expected to have passed the
 * transport validators already.
 */
export interface RequestPaymentDto {
  amountMinor: number;
  currency: string;
  orderId: string;
  idempotencyKey: string;
  metadata: Record<string, string>;
}
