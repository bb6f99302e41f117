export * from './credential-directory';
export * from './credential-loader';
