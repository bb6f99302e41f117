export * from './memory-conversation.store';
