import {
  ChatIdentity,
  ConversationState,
  ConversationStore,
} from '../../../core';

/**
 * In-process conversation store.
 *
 * IDLE is never stored, so only identities with a pending prompt occupy
 * memory. State is lost on restart.
 */
export class MemoryConversationStore implements ConversationStore {
  private readonly states = new Map<ChatIdentity, ConversationState>();

  async get(identity: ChatIdentity): Promise<ConversationState> {
    return this.states.get(identity) ?? ConversationState.IDLE;
  }

  async set(identity: ChatIdentity, state: ConversationState): Promise<void> {
    if (state === ConversationState.IDLE) {
      this.states.delete(identity);
      return;
    }
    this.states.set(identity, state);
  }

  async clear(identity: ChatIdentity): Promise<void> {
    this.states.delete(identity);
  }

  /**
   * Number of conversations with a pending prompt
   */
  get size(): number {
    return this.states.size;
  }
}
