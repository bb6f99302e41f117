import { ChatId, ChatIdentity, MessageRef } from './chat-transport.interface';

interface InboundEventBase {
  identity: ChatIdentity;
  chatId: ChatId;
}

export interface CommandEvent extends InboundEventBase {
  kind: 'command';
  command: 'start';
  message: MessageRef;
}

export interface CallbackEvent extends InboundEventBase {
  kind: 'callback';
  callbackId: string;
  /**
   * Raw callback token; absent for game or inline-mode callbacks
   */
  token?: string;
  /**
   * Message carrying the pressed button, when the platform still has it
   */
  message?: MessageRef;
}

export interface TextEvent extends InboundEventBase {
  kind: 'text';
  text: string;
  message: MessageRef;
}

/**
 * Chat update as seen by the action router
 */
export type InboundEvent = CommandEvent | CallbackEvent | TextEvent;
