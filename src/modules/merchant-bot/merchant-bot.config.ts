import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { Dispatcher } from 'undici';
import {
  ChatTransport,
  ConversationStore,
  CredentialDirectory,
  DEFAULT_API_TIMEOUT_MS,
} from '../../core';

/**
 * Merchant Bot Module Configuration
 */
export interface MerchantBotModuleConfig {
  /**
   * Where the credential table comes from
   * - file: JSON document `{ "<credential>": ["<identity>", ...] }`
   * - inline: the same table as an object
   * - custom: a prebuilt directory
   */
  credentials:
    | { type: 'file'; path: string }
    | { type: 'inline'; table: Record<string, readonly (string | number)[]> }
    | { type: 'custom'; directory: CredentialDirectory };

  /**
   * Remote merchant API
   */
  api: {
    baseUrl: string;
    /**
     * Default: true. Disabling is meant for test environments only.
     */
    verifyTls?: boolean;
    /**
     * Default outbound timeout in milliseconds
     */
    timeoutMs?: number;
    /**
     * undici dispatcher to send requests through (e.g. a MockAgent in tests)
     */
    dispatcher?: Dispatcher;
  };

  /**
   * Chat transport
   * - telegraf: Telegram long polling, started with the application
   * - custom: any ChatTransport; chat updates are then fed to the router by the caller
   */
  transport:
    | { type: 'telegraf'; botToken: string }
    | { type: 'custom'; transport: ChatTransport };

  webhook: {
    /**
     * Shared secret expected in the X-API-Key header
     */
    secret: string;
  };

  /**
   * Default: in-memory store
   */
  conversationStore?: ConversationStore;
}

/**
 * Async configuration factory
 */
export interface MerchantBotModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<
    Promise<MerchantBotModuleConfig> | MerchantBotModuleConfig
  >['useFactory'];
}

export const defaultApiConfig = {
  verifyTls: true,
  timeoutMs: DEFAULT_API_TIMEOUT_MS,
} satisfies Partial<MerchantBotModuleConfig['api']>;
