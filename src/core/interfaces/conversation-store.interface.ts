import { ConversationState } from '../domain/enums';
import { ChatIdentity } from './chat-transport.interface';

/**
 * Per-identity conversation state.
 *
 * Unknown identities read as IDLE. Implementations may be in-memory or
 * persistent; the router does not depend on which.
 */
export interface ConversationStore {
  get(identity: ChatIdentity): Promise<ConversationState>;
  set(identity: ChatIdentity, state: ConversationState): Promise<void>;
  /**
   * Same as set(identity, IDLE)
   */
  clear(identity: ChatIdentity): Promise<void>;
}
