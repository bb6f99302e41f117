export * from './chat-transport.interface';
export * from './inbound-event.interface';
export * from './conversation-store.interface';
