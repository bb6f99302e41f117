export * from './merchant-api.client';
export * from './merchant-api.service';
