export * from './merchant-bot.module';
export * from './merchant-bot.config';
export * from './constants';
export * from './controllers';
export * from './services/configuration.service';
export * from './services/bot-lifecycle.service';
