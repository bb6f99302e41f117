/**
 * Action names carried in inline keyboard callback tokens
 */
export enum CallbackActionName {
  BALANCE = 'balance',
  PAYMENTS_LAST = 'payments_last',
  WITHDRAW = 'withdraw',
  CHECK_PAYMENT = 'check_payment',
  DELETE_MESSAGE = 'delete_message',
  CANCEL = 'cancel',
}
