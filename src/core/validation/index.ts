export * from './input.validators';
