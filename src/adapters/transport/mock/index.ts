export * from './mock-chat.transport';
