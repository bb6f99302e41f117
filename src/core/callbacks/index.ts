export * from './callback-codec';
