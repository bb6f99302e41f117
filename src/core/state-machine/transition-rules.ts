import {
  ALL_CONVERSATION_STATES,
  ConversationState,
  ConversationTrigger,
} from '../domain/enums';
import { ConversationTransition } from './types';

/**
 * Same trigger from every state to a fixed target
 */
function fromAnyState(
  trigger: ConversationTrigger,
  to: ConversationState,
  metadata: ConversationTransition['metadata'],
): ConversationTransition[] {
  return ALL_CONVERSATION_STATES.map((from) => ({ from, to, trigger, metadata }));
}

/**
 * Same trigger from every state back to itself
 */
function selfLoops(
  trigger: ConversationTrigger,
  metadata: ConversationTransition['metadata'],
): ConversationTransition[] {
  return ALL_CONVERSATION_STATES.map((state) => ({
    from: state,
    to: state,
    trigger,
    metadata,
  }));
}

/**
 * Operator conversation transitions.
 *
 * - Menu buttons stay usable while a prompt is pending; read-only ones keep
 *   the state, prompt-opening ones replace the pending prompt.
 * - Every submitted input returns to IDLE whatever the remote outcome; only a
 *   locally rejected input keeps the prompt armed.
 * - Free text has no transition out of IDLE and is ignored there.
 */
export const TRANSITION_RULES: readonly ConversationTransition[] = [
  ...fromAnyState(ConversationTrigger.START, ConversationState.IDLE, {
    description: 'Show the account summary',
  }),

  ...selfLoops(ConversationTrigger.SHOW_BALANCE, {
    description: 'Refresh the account summary',
  }),

  ...selfLoops(ConversationTrigger.SHOW_PAYMENTS, {
    description: 'List recent payments',
  }),

  ...fromAnyState(
    ConversationTrigger.BEGIN_PAYMENT_QUERY,
    ConversationState.AWAITING_PAYMENT_QUERY,
    { description: 'Ask for a payment id or address' },
  ),

  ...fromAnyState(
    ConversationTrigger.BEGIN_WITHDRAWAL,
    ConversationState.AWAITING_WITHDRAW_ADDRESS,
    { description: 'Ask for a withdrawal address' },
  ),

  {
    from: ConversationState.AWAITING_PAYMENT_QUERY,
    to: ConversationState.IDLE,
    trigger: ConversationTrigger.SUBMIT_PAYMENT_QUERY,
    metadata: { description: 'Look up the payment' },
  },

  {
    from: ConversationState.AWAITING_PAYMENT_QUERY,
    to: ConversationState.AWAITING_PAYMENT_QUERY,
    trigger: ConversationTrigger.REJECT_INPUT,
    metadata: { description: 'Ask again for a non-empty query' },
  },

  {
    from: ConversationState.AWAITING_WITHDRAW_ADDRESS,
    to: ConversationState.IDLE,
    trigger: ConversationTrigger.SUBMIT_WITHDRAW_ADDRESS,
    metadata: { description: 'Submit the withdrawal' },
  },

  {
    from: ConversationState.AWAITING_WITHDRAW_ADDRESS,
    to: ConversationState.AWAITING_WITHDRAW_ADDRESS,
    trigger: ConversationTrigger.REJECT_INPUT,
    metadata: { description: 'Ask again for a well-formed address' },
  },

  ...fromAnyState(ConversationTrigger.CANCEL, ConversationState.IDLE, {
    description: 'Abandon the pending prompt',
  }),

  ...fromAnyState(ConversationTrigger.DELETE_MESSAGE, ConversationState.IDLE, {
    description: 'Hide a message',
  }),
];

/**
 * States in which free text is consumed as input
 */
export function isAwaitingInput(state: ConversationState): boolean {
  return (
    state === ConversationState.AWAITING_PAYMENT_QUERY ||
    state === ConversationState.AWAITING_WITHDRAW_ADDRESS
  );
}
