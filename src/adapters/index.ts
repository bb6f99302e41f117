export * from './conversation-store/memory';
export * from './transport/mock';
export * from './transport/telegraf';
