export * from './deposit-notifier';
