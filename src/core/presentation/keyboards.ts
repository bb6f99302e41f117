import { CallbackActionName } from '../domain/enums';
import { encodeCallback } from '../callbacks';
import { InlineButton, InlineKeyboard } from '../interfaces';

function button(text: string, action: CallbackActionName): InlineButton {
  return { text, action: encodeCallback(action) };
}

export function mainMenuKeyboard(): InlineKeyboard {
  return [
    [button('Check balance', CallbackActionName.BALANCE)],
    [button('Latest payments', CallbackActionName.PAYMENTS_LAST)],
    [button('Find payment', CallbackActionName.CHECK_PAYMENT)],
    [button('Withdraw', CallbackActionName.WITHDRAW)],
  ];
}

export function cancelKeyboard(): InlineKeyboard {
  return [[button('Cancel', CallbackActionName.CANCEL)]];
}

export function hideKeyboard(): InlineKeyboard {
  return [[button('Hide', CallbackActionName.DELETE_MESSAGE)]];
}
