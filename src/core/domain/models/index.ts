export * from './merchant.model';
export * from './notification-event.model';
