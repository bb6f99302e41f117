import type { Update } from 'telegraf/types';
import { InboundEvent } from '../../../core';

const START_COMMAND = /^\/start(@\w+)?(\s|$)/;

/**
 * Map a Telegram update to a router event.
 *
 * Returns undefined for updates the bot does not act on: non-text messages,
 * messages without a sender, edits, channel posts and so on.
 */
export function toInboundEvent(update: Update): InboundEvent | undefined {
  if ('callback_query' in update) {
    const query = update.callback_query;
    const identity = String(query.from.id);
    const message = query.message
      ? { chatId: String(query.message.chat.id), messageId: query.message.message_id }
      : undefined;

    return {
      kind: 'callback',
      identity,
      chatId: message?.chatId ?? identity,
      callbackId: query.id,
      token: 'data' in query ? query.data : undefined,
      message,
    };
  }

  if ('message' in update) {
    const message = update.message;
    if (!('text' in message)) {
      return undefined;
    }
    const sender = message.from;
    if (!sender) {
      return undefined;
    }

    const identity = String(sender.id);
    const chatId = String(message.chat.id);
    const ref = { chatId, messageId: message.message_id };

    if (START_COMMAND.test(message.text)) {
      return { kind: 'command', command: 'start', identity, chatId, message: ref };
    }

    return { kind: 'text', text: message.text, identity, chatId, message: ref };
  }

  return undefined;
}
