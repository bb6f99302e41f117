export * from './merchant-api.errors';
export * from './bot.errors';
