import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MerchantBotModule } from './modules';
import { EnvironmentVariables, buildModuleConfig, validate } from './config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate,
    }),
    MerchantBotModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvironmentVariables, true>) =>
        buildModuleConfig({
          BOT_TOKEN: config.get('BOT_TOKEN', { infer: true }),
          USER_TOKENS_FILE: config.get('USER_TOKENS_FILE', { infer: true }),
          SKIP_VERIFY: config.get('SKIP_VERIFY', { infer: true }),
          WEBHOOK_API_KEY: config.get('WEBHOOK_API_KEY', { infer: true }),
          MERCHANT_API_URL_START: config.get('MERCHANT_API_URL_START', { infer: true }),
          MERCHANT_API_TIMEOUT_MS: config.get('MERCHANT_API_TIMEOUT_MS', { infer: true }),
        }),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
