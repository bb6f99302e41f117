import type { MerchantBotModuleConfig } from '../modules/merchant-bot/merchant-bot.config';
import type { EnvironmentVariables } from './env.validation';

/**
 * Variables the merchant bot module is built from; logging and the listen
 * address are applied by the HTTP entry point
 */
export type ModuleEnvironment = Pick<
  EnvironmentVariables,
  | 'BOT_TOKEN'
  | 'USER_TOKENS_FILE'
  | 'SKIP_VERIFY'
  | 'WEBHOOK_API_KEY'
  | 'MERCHANT_API_URL_START'
  | 'MERCHANT_API_TIMEOUT_MS'
>;

/**
 * Module configuration for the Telegram-backed deployment
 */
export function buildModuleConfig(env: ModuleEnvironment): MerchantBotModuleConfig {
  return {
    credentials: { type: 'file', path: env.USER_TOKENS_FILE },
    api: {
      baseUrl: env.MERCHANT_API_URL_START,
      verifyTls: !env.SKIP_VERIFY,
      timeoutMs: env.MERCHANT_API_TIMEOUT_MS,
    },
    transport: { type: 'telegraf', botToken: env.BOT_TOKEN },
    webhook: { secret: env.WEBHOOK_API_KEY },
  };
}
