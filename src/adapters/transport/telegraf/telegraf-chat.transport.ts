import { Logger } from '@nestjs/common';
import { Telegram, TelegramError } from 'telegraf';
import type { InlineKeyboardMarkup } from 'telegraf/types';
import {
  AnswerCallbackOptions,
  ChatId,
  ChatTransport,
  InlineKeyboard,
  MessageRef,
} from '../../../core';

/**
 * Telegram limit for callback answer texts
 */
export const CALLBACK_ANSWER_MAX_LENGTH = 200;

const NOT_MODIFIED = 'message is not modified';
const ALREADY_DELETED = 'message to delete not found';

export function toInlineKeyboardMarkup(
  keyboard: InlineKeyboard | undefined,
): InlineKeyboardMarkup | undefined {
  if (!keyboard) {
    return undefined;
  }
  return {
    inline_keyboard: keyboard.map((row) =>
      row.map((button) => ({ text: button.text, callback_data: button.action })),
    ),
  };
}

function truncate(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength - 1)}…`;
}

function isTelegramError(error: unknown, fragment: string): boolean {
  return error instanceof TelegramError && error.description.includes(fragment);
}

/**
 * ChatTransport over the Telegram Bot API. Messages are sent as HTML.
 */
export class TelegrafChatTransport implements ChatTransport {
  private readonly logger = new Logger(TelegrafChatTransport.name);

  constructor(private readonly telegram: Telegram) {}

  async sendMessage(
    chatId: ChatId,
    text: string,
    keyboard?: InlineKeyboard,
  ): Promise<MessageRef> {
    const message = await this.telegram.sendMessage(chatId, text, {
      parse_mode: 'HTML',
      reply_markup: toInlineKeyboardMarkup(keyboard),
    });
    return { chatId, messageId: message.message_id };
  }

  async editMessage(ref: MessageRef, text: string, keyboard?: InlineKeyboard): Promise<void> {
    try {
      await this.telegram.editMessageText(ref.chatId, ref.messageId, undefined, text, {
        parse_mode: 'HTML',
        reply_markup: toInlineKeyboardMarkup(keyboard),
      });
    } catch (error) {
      if (!isTelegramError(error, NOT_MODIFIED)) throw error;
      this.logger.debug(`Message ${ref.messageId} in ${ref.chatId} already up to date`);
    }
  }

  async deleteMessage(ref: MessageRef): Promise<void> {
    try {
      await this.telegram.deleteMessage(ref.chatId, ref.messageId);
    } catch (error) {
      if (!isTelegramError(error, ALREADY_DELETED)) throw error;
      this.logger.debug(`Message ${ref.messageId} in ${ref.chatId} already deleted`);
    }
  }

  async answerCallback(
    callbackId: string,
    text?: string,
    options: AnswerCallbackOptions = {},
  ): Promise<void> {
    await this.telegram.answerCbQuery(
      callbackId,
      text === undefined ? undefined : truncate(text, CALLBACK_ANSWER_MAX_LENGTH),
      { show_alert: options.alert ?? false },
    );
  }
}
