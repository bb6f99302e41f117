export * from './conversation-state-machine';
export * from './types';
export * from './transition-rules';
