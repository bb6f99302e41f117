import { escapeHtml, toText } from './html';

export const EXAMPLE_TRON_ADDRESS = 'TKTgEtjonYPdCWDs7bUb9dUUwYikceDabx';

/**
 * Fixed operator-facing texts (Telegram HTML)
 */
export const Messages = {
  notAuthorized: 'No API token found for your account.',
  serviceUnavailable:
    'The service is temporarily unavailable. Please try again later.',
  dataRefreshed: 'Data refreshed.',
  noPayments: 'No payments found.',
  paymentQueryPrompt:
    'Send a <b>payment ID</b> or a <b>TRON address</b>.\n' +
    'Example: <code>7747b8f0-6970-4f38-bcfd-95e6560e49db</code>',
  emptyPaymentQuery: 'Send the ID or address in a single message.',
  withdrawPrompt:
    'Enter the <b>address to withdraw to</b> (USDT TRC-20, TRON address).',
  invalidAddress:
    'Invalid TRON address.\n' +
    `Expected format: <b>${EXAMPLE_TRON_ADDRESS}</b>\n` +
    'Send the address again.',
  withdrawBelowMinimum:
    '❕ The available amount is below the minimum withdrawal. ' +
    'Withdraw once the balance exceeds the threshold.',
  withdrawFailed:
    '❌ The withdrawal could not be completed. Please contact support.',

  requestFailed(status: number, payload: unknown): string {
    return `Request failed: ${status}\nResponse:\n${escapeHtml(toText(payload))}`;
  },

  paymentNotFound(query: string): string {
    return `Payment <b>${escapeHtml(query)}</b> not found.`;
  },

  withdrawSuccess(address: string): string {
    return (
      `✅ Withdrawal created. Expect the funds at ${escapeHtml(address)} ` +
      '<b>(within an hour)</b>.'
    );
  },
} as const;
