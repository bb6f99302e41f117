/**
 * Deposit notification pushed by the merchant API to the webhook endpoint
 */
export interface NotificationEvent {
  address: string;
  amount: string | number;
  newStatus: string;
  merchantCredential: string;
}

/**
 * Outcome of delivering one notification to every enrolled operator
 */
export interface FanOutResult {
  recipients: number;
  delivered: string[];
  failed: Array<{ identity: string; error: Error }>;
}
