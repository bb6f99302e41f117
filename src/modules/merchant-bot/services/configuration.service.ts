import { Inject, Injectable } from '@nestjs/common';
import type { MerchantBotModuleConfig } from '../merchant-bot.config';
import { MERCHANT_BOT_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Read access to the module configuration without exposing secrets
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(MERCHANT_BOT_CONFIG)
    private readonly config: MerchantBotModuleConfig,
  ) {}

  getApiBaseUrl(): string {
    return this.config.api.baseUrl;
  }

  isTlsVerificationEnabled(): boolean {
    return this.config.api.verifyTls !== false;
  }

  /**
   * "telegraf" or "custom"
   */
  getTransportType(): MerchantBotModuleConfig['transport']['type'] {
    return this.config.transport.type;
  }

  getCredentialSource(): MerchantBotModuleConfig['credentials']['type'] {
    return this.config.credentials.type;
  }
}
