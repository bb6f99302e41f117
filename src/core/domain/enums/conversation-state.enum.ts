/**
 * Step of a multi-message input flow for one operator.
 * Conversations start (and restart after a process restart) in IDLE.
 */
export enum ConversationState {
  IDLE = 'idle',

  /**
   * Waiting for the destination address of a withdrawal
   */
  AWAITING_WITHDRAW_ADDRESS = 'awaiting_withdraw_address',

  /**
   * Waiting for a payment id or deposit address to look up
   */
  AWAITING_PAYMENT_QUERY = 'awaiting_payment_query',
}

export const ALL_CONVERSATION_STATES: readonly ConversationState[] =
  Object.values(ConversationState);
