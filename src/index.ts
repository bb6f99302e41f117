/**
 * Merchant desk bot
 *
 * Chat front end for a merchant payments API: account summary, payment
 * history and lookup, withdrawals, and deposit notifications relayed from
 * the API webhook.
 */

export * from './core';
export * from './adapters';
export * from './_shared';

// Request factory for webhook tests
export { DepositWebhookFactory } from './testing/deposit-webhook-factory';
export type {
  DepositWebhookOptions,
  DepositWebhookRequest,
} from './testing/deposit-webhook-factory';

export * from './modules';
export * from './config';
export * from './app.setup';
