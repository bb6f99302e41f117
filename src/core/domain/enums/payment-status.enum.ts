/**
 * Payment statuses reported by the merchant API
 */
export enum PaymentStatus {
  PENDING = 'pending',
  PAID = 'paid',
  UNDERPAID = 'underpaid',
  EXPIRED = 'expired',
  CLOSED = 'closed',
  ERROR = 'error',
}
