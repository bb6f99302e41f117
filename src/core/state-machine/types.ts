import { ConversationState, ConversationTrigger } from '../domain/enums';

/**
 * Conversation transition definition
 */
export interface ConversationTransition {
  from: ConversationState;
  to: ConversationState;
  trigger: ConversationTrigger;
  metadata?: {
    description?: string;
  };
}

/**
 * Transition result
 */
export type TransitionResult =
  | { allowed: true; from: ConversationState; to: ConversationState }
  | { allowed: false; from: ConversationState; reason: string };

/**
 * State machine configuration
 */
export interface ConversationStateMachineConfig {
  transitions: readonly ConversationTransition[];
}
