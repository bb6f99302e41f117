import {
  AnswerCallbackOptions,
  ChatId,
  ChatTransport,
  InlineKeyboard,
  MessageRef,
} from '../../../core';

export interface SendMessageCall {
  method: 'sendMessage';
  chatId: ChatId;
  text: string;
  keyboard?: InlineKeyboard;
  /**
   * Undefined when the send was made to fail
   */
  ref?: MessageRef;
}

export interface EditMessageCall {
  method: 'editMessage';
  ref: MessageRef;
  text: string;
  keyboard?: InlineKeyboard;
}

export interface DeleteMessageCall {
  method: 'deleteMessage';
  ref: MessageRef;
}

export interface AnswerCallbackCall {
  method: 'answerCallback';
  callbackId: string;
  text?: string;
  options?: AnswerCallbackOptions;
}

export type TransportCall =
  | SendMessageCall
  | EditMessageCall
  | DeleteMessageCall
  | AnswerCallbackCall;

/**
 * Recording chat transport for tests and local runs
 *
 * Every call is appended to `calls` in order. Sends to a chat registered
 * with failFor() are recorded and then rejected.
 */
export class MockChatTransport implements ChatTransport {
  readonly calls: TransportCall[] = [];
  private readonly failures = new Map<ChatId, Error>();
  private nextMessageId = 1;

  failFor(chatId: ChatId, error: Error = new Error(`Delivery to ${chatId} failed`)): void {
    this.failures.set(chatId, error);
  }

  reset(): void {
    this.calls.length = 0;
    this.failures.clear();
  }

  get sent(): SendMessageCall[] {
    return this.calls.filter(
      (call): call is SendMessageCall => call.method === 'sendMessage',
    );
  }

  get edited(): EditMessageCall[] {
    return this.calls.filter(
      (call): call is EditMessageCall => call.method === 'editMessage',
    );
  }

  get deleted(): DeleteMessageCall[] {
    return this.calls.filter(
      (call): call is DeleteMessageCall => call.method === 'deleteMessage',
    );
  }

  get answered(): AnswerCallbackCall[] {
    return this.calls.filter(
      (call): call is AnswerCallbackCall => call.method === 'answerCallback',
    );
  }

  /**
   * Texts delivered to one chat, oldest first
   */
  messagesTo(chatId: ChatId): string[] {
    return this.sent
      .filter((call) => call.chatId === chatId && call.ref !== undefined)
      .map((call) => call.text);
  }

  async sendMessage(
    chatId: ChatId,
    text: string,
    keyboard?: InlineKeyboard,
  ): Promise<MessageRef> {
    const failure = this.failures.get(chatId);
    if (failure) {
      this.calls.push({ method: 'sendMessage', chatId, text, keyboard });
      throw failure;
    }

    const ref: MessageRef = { chatId, messageId: this.nextMessageId++ };
    this.calls.push({ method: 'sendMessage', chatId, text, keyboard, ref });
    return ref;
  }

  async editMessage(ref: MessageRef, text: string, keyboard?: InlineKeyboard): Promise<void> {
    this.calls.push({ method: 'editMessage', ref, text, keyboard });
  }

  async deleteMessage(ref: MessageRef): Promise<void> {
    this.calls.push({ method: 'deleteMessage', ref });
  }

  async answerCallback(
    callbackId: string,
    text?: string,
    options?: AnswerCallbackOptions,
  ): Promise<void> {
    this.calls.push({ method: 'answerCallback', callbackId, text, options });
  }
}
