export * from './telegraf-chat.transport';
export * from './telegraf-update.mapper';
