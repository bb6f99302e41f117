import { InputValidationError } from '../errors';

/**
 * TRON base58check address: "T" followed by 33 characters of the base58
 * alphabet (no 0, I, O or l)
 */
export const TRON_ADDRESS_PATTERN = /^T[1-9A-HJ-NP-Za-km-z]{33}$/;

export function isTronAddress(value: string): boolean {
  return TRON_ADDRESS_PATTERN.test(value);
}

/**
 * Trim and validate a withdrawal destination
 */
export function requireTronAddress(input: string | undefined): string {
  const address = (input ?? '').trim();
  if (!isTronAddress(address)) {
    throw new InputValidationError('address', 'not a TRON address');
  }
  return address;
}

/**
 * Trim and validate a payment id or address to look up
 */
export function requirePaymentQuery(input: string | undefined): string {
  const query = (input ?? '').trim();
  if (!query) {
    throw new InputValidationError('payment query', 'empty');
  }
  return query;
}
