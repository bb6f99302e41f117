import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { ActionRouter, MerchantApiClient } from '../../../core';
import { toInboundEvent } from '../../../adapters';
import { ACTION_ROUTER, MERCHANT_API_CLIENT, TELEGRAF_BOT } from '../constants';
import { ConfigurationService } from './configuration.service';

/**
 * Starts Telegram long polling with the application and stops it on shutdown.
 *
 * Every update is mapped to an InboundEvent and handed to the router;
 * updates the router does not understand are dropped.
 */
@Injectable()
export class BotLifecycleService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(BotLifecycleService.name);
  private polling?: Promise<void>;

  constructor(
    @Inject(TELEGRAF_BOT)
    private readonly bot: Telegraf | null,
    @Inject(ACTION_ROUTER)
    private readonly router: ActionRouter,
    @Inject(MERCHANT_API_CLIENT)
    private readonly client: MerchantApiClient,
    private readonly configuration: ConfigurationService,
  ) {}

  onApplicationBootstrap(): void {
    this.logger.log(
      `Merchant API at ${this.configuration.getApiBaseUrl()} ` +
        `(TLS verification ${this.configuration.isTlsVerificationEnabled() ? 'on' : 'off'}), ` +
        `credentials from ${this.configuration.getCredentialSource()} source`,
    );

    if (!this.bot) {
      this.logger.log('Custom chat transport configured; Telegram polling not started');
      return;
    }

    this.bot.use(async (ctx) => {
      const event = toInboundEvent(ctx.update);
      if (event) {
        await this.router.handle(event);
      }
    });

    this.bot.catch((error, ctx) => {
      this.logger.error(
        `Unhandled error for update ${ctx.update.update_id}: ${error instanceof Error ? error.message : String(error)}`,
      );
    });

    this.polling = this.bot
      .launch(() => this.logger.log('Telegram polling started'))
      .catch((error: unknown) => {
        this.logger.error(
          `Telegram polling failed: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
      });
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    if (this.bot && this.polling) {
      try {
        this.bot.stop(signal);
      } catch (error) {
        this.logger.debug(
          `Telegram polling already stopped: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      await this.polling;
      this.logger.log('Telegram polling stopped');
    }

    await this.client.close();
  }
}
