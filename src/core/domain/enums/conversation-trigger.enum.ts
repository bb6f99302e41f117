/**
 * Inputs that can move a conversation between states
 */
export enum ConversationTrigger {
  START = 'start',
  SHOW_BALANCE = 'show_balance',
  SHOW_PAYMENTS = 'show_payments',
  BEGIN_PAYMENT_QUERY = 'begin_payment_query',
  BEGIN_WITHDRAWAL = 'begin_withdrawal',
  SUBMIT_PAYMENT_QUERY = 'submit_payment_query',
  SUBMIT_WITHDRAW_ADDRESS = 'submit_withdraw_address',
  REJECT_INPUT = 'reject_input',
  CANCEL = 'cancel',
  DELETE_MESSAGE = 'delete_message',
}
