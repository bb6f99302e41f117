export * from './merchant-bot';
