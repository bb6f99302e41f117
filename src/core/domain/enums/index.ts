export * from './conversation-state.enum';
export * from './conversation-trigger.enum';
export * from './callback-action.enum';
export * from './withdrawal-outcome.enum';
export * from './payment-status.enum';
