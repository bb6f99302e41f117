export * from './env.validation';
export * from './log-level';
export * from './module-config.factory';
