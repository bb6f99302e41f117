export * from './enums';
export * from './models';
