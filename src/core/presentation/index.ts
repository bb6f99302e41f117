export * from './html';
export * from './keyboards';
export * from './messages';
export * from './formatters';
