export * from './deposit-notification.dto';
export * from './health.dto';
