export * from './action-router';
export * from './api-failure';
