import { DynamicModule, Global, Module, Provider } from '@nestjs/common';
import { Telegraf } from 'telegraf';
import {
  ActionRouter,
  ChatTransport,
  ConversationStateMachine,
  ConversationStore,
  CredentialDirectory,
  DepositNotifier,
  MerchantApiClient,
  MerchantApiService,
  WebhookIngress,
  loadCredentialDirectory,
} from '../../core';
import { MemoryConversationStore, TelegrafChatTransport } from '../../adapters';
import {
  MerchantBotModuleAsyncConfig,
  MerchantBotModuleConfig,
  defaultApiConfig,
} from './merchant-bot.config';
import {
  ACTION_ROUTER,
  CHAT_TRANSPORT,
  CONVERSATION_STATE_MACHINE,
  CONVERSATION_STORE,
  CREDENTIAL_DIRECTORY,
  DEPOSIT_NOTIFIER,
  MERCHANT_API_CLIENT,
  MERCHANT_API_SERVICE,
  MERCHANT_BOT_CONFIG,
  TELEGRAF_BOT,
  WEBHOOK_INGRESS,
} from './constants';
import { HealthController, WebhookController } from './controllers';
import { BotLifecycleService } from './services/bot-lifecycle.service';
import { ConfigurationService } from './services/configuration.service';

const EXPORTED_TOKENS = [
  MERCHANT_BOT_CONFIG,
  CREDENTIAL_DIRECTORY,
  MERCHANT_API_SERVICE,
  CHAT_TRANSPORT,
  ACTION_ROUTER,
  DEPOSIT_NOTIFIER,
  WEBHOOK_INGRESS,
];

/**
 * Merchant Bot Module
 *
 * Builds the core collaborators from one configuration object, exposes the
 * webhook and health endpoints and runs Telegram polling with the app.
 */
@Global()
@Module({})
export class MerchantBotModule {
  /**
   * Configure synchronously
   */
  static forRoot(config: MerchantBotModuleConfig): DynamicModule {
    return {
      module: MerchantBotModule,
      providers: [
        { provide: MERCHANT_BOT_CONFIG, useValue: config },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure asynchronously, e.g. from ConfigService
   */
  static forRootAsync(options: MerchantBotModuleAsyncConfig): DynamicModule {
    return {
      module: MerchantBotModule,
      imports: options.imports ?? [],
      providers: [
        {
          provide: MERCHANT_BOT_CONFIG,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        ...this.createProviders(),
      ],
      controllers: [WebhookController, HealthController],
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Providers shared by both registration styles; all read MERCHANT_BOT_CONFIG
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: CREDENTIAL_DIRECTORY,
        useFactory: (config: MerchantBotModuleConfig): CredentialDirectory => {
          switch (config.credentials.type) {
            case 'file':
              return loadCredentialDirectory(config.credentials.path);
            case 'inline':
              return CredentialDirectory.fromObject(config.credentials.table);
            case 'custom':
              return config.credentials.directory;
          }
        },
        inject: [MERCHANT_BOT_CONFIG],
      },
      {
        provide: MERCHANT_API_CLIENT,
        useFactory: (config: MerchantBotModuleConfig) => {
          const api = { ...defaultApiConfig, ...config.api };
          return new MerchantApiClient({
            baseUrl: api.baseUrl,
            verifyTls: api.verifyTls,
            timeoutMs: api.timeoutMs,
            dispatcher: api.dispatcher,
          });
        },
        inject: [MERCHANT_BOT_CONFIG],
      },
      {
        provide: MERCHANT_API_SERVICE,
        useFactory: (client: MerchantApiClient) => new MerchantApiService(client),
        inject: [MERCHANT_API_CLIENT],
      },
      {
        provide: CONVERSATION_STATE_MACHINE,
        useFactory: () => new ConversationStateMachine(),
      },
      {
        provide: CONVERSATION_STORE,
        useFactory: (config: MerchantBotModuleConfig): ConversationStore =>
          config.conversationStore ?? new MemoryConversationStore(),
        inject: [MERCHANT_BOT_CONFIG],
      },
      {
        provide: TELEGRAF_BOT,
        useFactory: (config: MerchantBotModuleConfig): Telegraf | null =>
          config.transport.type === 'telegraf'
            ? new Telegraf(config.transport.botToken)
            : null,
        inject: [MERCHANT_BOT_CONFIG],
      },
      {
        provide: CHAT_TRANSPORT,
        useFactory: (
          config: MerchantBotModuleConfig,
          bot: Telegraf | null,
        ): ChatTransport => {
          if (config.transport.type === 'custom') {
            return config.transport.transport;
          }
          if (!bot) {
            throw new Error('Telegram bot was not created');
          }
          return new TelegrafChatTransport(bot.telegram);
        },
        inject: [MERCHANT_BOT_CONFIG, TELEGRAF_BOT],
      },
      {
        provide: ACTION_ROUTER,
        useFactory: (
          transport: ChatTransport,
          directory: CredentialDirectory,
          store: ConversationStore,
          api: MerchantApiService,
          stateMachine: ConversationStateMachine,
        ) => new ActionRouter({ transport, directory, store, api, stateMachine }),
        inject: [
          CHAT_TRANSPORT,
          CREDENTIAL_DIRECTORY,
          CONVERSATION_STORE,
          MERCHANT_API_SERVICE,
          CONVERSATION_STATE_MACHINE,
        ],
      },
      {
        provide: DEPOSIT_NOTIFIER,
        useFactory: (directory: CredentialDirectory, transport: ChatTransport) =>
          new DepositNotifier(directory, transport),
        inject: [CREDENTIAL_DIRECTORY, CHAT_TRANSPORT],
      },
      {
        provide: WEBHOOK_INGRESS,
        useFactory: (config: MerchantBotModuleConfig, notifier: DepositNotifier) =>
          new WebhookIngress({ secret: config.webhook.secret, notifier }),
        inject: [MERCHANT_BOT_CONFIG, DEPOSIT_NOTIFIER],
      },
      ConfigurationService,
      BotLifecycleService,
    ];
  }
}
