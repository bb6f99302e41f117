/**
 * Testing utilities: in-memory adapters and request factories
 */

export * from '../adapters/transport/mock';
export * from '../adapters/conversation-store/memory';
export * from './deposit-webhook-factory';

// Re-export core for convenience in tests
export * from '../core';
