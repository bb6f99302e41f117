/**
 * Merchant API request options and response narrowing.
 *
 * Responses are kept as unknown and narrowed field by field where they are
 * rendered; the API may omit any field.
 */

export interface PaymentHistoryQuery {
  limit?: number;
  withClosed?: boolean;
}

/**
 * Narrow an untyped API value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
