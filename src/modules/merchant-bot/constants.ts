/**
 * Injection tokens for the merchant bot module
 */

export const MERCHANT_BOT_CONFIG = Symbol('MERCHANT_BOT_CONFIG');
export const CREDENTIAL_DIRECTORY = Symbol('CREDENTIAL_DIRECTORY');
export const MERCHANT_API_CLIENT = Symbol('MERCHANT_API_CLIENT');
export const MERCHANT_API_SERVICE = Symbol('MERCHANT_API_SERVICE');
export const CONVERSATION_STATE_MACHINE = Symbol('CONVERSATION_STATE_MACHINE');
export const CONVERSATION_STORE = Symbol('CONVERSATION_STORE');
export const TELEGRAF_BOT = Symbol('TELEGRAF_BOT');
export const CHAT_TRANSPORT = Symbol('CHAT_TRANSPORT');
export const ACTION_ROUTER = Symbol('ACTION_ROUTER');
export const DEPOSIT_NOTIFIER = Symbol('DEPOSIT_NOTIFIER');
export const WEBHOOK_INGRESS = Symbol('WEBHOOK_INGRESS');
