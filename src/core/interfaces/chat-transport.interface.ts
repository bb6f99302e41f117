/**
 * Chat transport port
 *
 * The router only speaks to the chat platform through this interface, so
 * the Telegram adapter can be swapped for the in-memory one in tests.
 */

/**
 * Opaque identifier of a chat participant
 */
export type ChatIdentity = string;

/**
 * Chat that a message is delivered to (equals the identity in private chats)
 */
export type ChatId = string;

export interface InlineButton {
  text: string;
  /**
   * Callback token produced by the callback codec
   */
  action: string;
}

export type InlineKeyboard = ReadonlyArray<ReadonlyArray<InlineButton>>;

export interface MessageRef {
  chatId: ChatId;
  messageId: number;
}

export interface AnswerCallbackOptions {
  /**
   * Show the text as a modal alert instead of a toast
   */
  alert?: boolean;
}

export interface ChatTransport {
  sendMessage(
    chatId: ChatId,
    text: string,
    keyboard?: InlineKeyboard,
  ): Promise<MessageRef>;

  /**
   * Replace text and keyboard. An edit that changes nothing resolves normally.
   */
  editMessage(
    ref: MessageRef,
    text: string,
    keyboard?: InlineKeyboard,
  ): Promise<void>;

  /**
   * Remove a message. A message that no longer exists resolves normally.
   */
  deleteMessage(ref: MessageRef): Promise<void>;

  answerCallback(
    callbackId: string,
    text?: string,
    options?: AnswerCallbackOptions,
  ): Promise<void>;
}
