import { Logger } from '@nestjs/common';
import {
  CallbackActionName,
  ConversationState,
  ConversationTrigger,
  WithdrawalOutcome,
} from '../domain/enums';
import { isRecord } from '../domain/models';
import { InputValidationError, NotAuthorizedError, RemoteApiError } from '../errors';
import {
  CallbackEvent,
  ChatId,
  ChatIdentity,
  ChatTransport,
  CommandEvent,
  ConversationStore,
  InboundEvent,
  TextEvent,
} from '../interfaces';
import { parseCallbackAction } from '../callbacks';
import { Credential, CredentialDirectory, maskCredential } from '../credentials';
import { MerchantApiService, interpretWithdrawal } from '../client';
import { ConversationStateMachine, isAwaitingInput } from '../state-machine';
import { requirePaymentQuery, requireTronAddress } from '../validation';
import {
  Messages,
  cancelKeyboard,
  escapeHtml,
  formatMerchantSummary,
  formatPaymentDetails,
  formatPaymentList,
  hideKeyboard,
  mainMenuKeyboard,
  toText,
} from '../presentation';
import { describeApiFailure, isApiFailure } from './api-failure';

export interface ActionRouterDeps {
  transport: ChatTransport;
  directory: CredentialDirectory;
  store: ConversationStore;
  api: MerchantApiService;
  stateMachine?: ConversationStateMachine;
}

/**
 * Action Router
 *
 * Single entry point for chat updates. For every event it
 * 1. resolves the action (command, callback action, or free-text input),
 * 2. runs the authorization guard for privileged actions,
 * 3. checks the transition against the conversation state machine,
 * 4. runs the action and writes the next state back to the store.
 *
 * Events are serialized per identity, so a state read and the write that
 * follows it are never interleaved with another event of the same operator.
 * handle() never rejects; failures are logged and the event is dropped.
 */
export class ActionRouter {
  private readonly logger = new Logger(ActionRouter.name);
  private readonly transport: ChatTransport;
  private readonly directory: CredentialDirectory;
  private readonly store: ConversationStore;
  private readonly api: MerchantApiService;
  private readonly stateMachine: ConversationStateMachine;
  private readonly queues = new Map<ChatIdentity, Promise<void>>();

  constructor(deps: ActionRouterDeps) {
    this.transport = deps.transport;
    this.directory = deps.directory;
    this.store = deps.store;
    this.api = deps.api;
    this.stateMachine = deps.stateMachine ?? new ConversationStateMachine();
  }

  async handle(event: InboundEvent): Promise<void> {
    // Events of one identity run one at a time, in arrival order
    const previous = this.queues.get(event.identity) ?? Promise.resolve();
    const current = previous.then(() => this.process(event));
    this.queues.set(event.identity, current);

    try {
      await current;
    } finally {
      if (this.queues.get(event.identity) === current) {
        this.queues.delete(event.identity);
      }
    }
  }

  private async process(event: InboundEvent): Promise<void> {
    try {
      await this.dispatch(event);
    } catch (error) {
      if (error instanceof NotAuthorizedError) {
        await this.replyNotAuthorized(event);
        return;
      }

      this.logger.error(
        `Failed to handle ${event.kind} event from ${event.identity}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );

      if (event.kind === 'callback') {
        await this.acknowledge(event);
      }
    }
  }

  private async dispatch(event: InboundEvent): Promise<void> {
    switch (event.kind) {
      case 'command':
        return this.start(event);
      case 'callback':
        return this.dispatchCallback(event);
      case 'text':
        return this.dispatchText(event);
    }
  }

  private async dispatchCallback(event: CallbackEvent): Promise<void> {
    const action = parseCallbackAction(event.token);

    switch (action.kind) {
      case CallbackActionName.BALANCE:
        return this.showBalance(event);
      case CallbackActionName.PAYMENTS_LAST:
        return this.showPayments(event);
      case CallbackActionName.CHECK_PAYMENT:
        return this.openPrompt(
          event,
          ConversationTrigger.BEGIN_PAYMENT_QUERY,
          Messages.paymentQueryPrompt,
        );
      case CallbackActionName.WITHDRAW:
        return this.openPrompt(
          event,
          ConversationTrigger.BEGIN_WITHDRAWAL,
          Messages.withdrawPrompt,
        );
      case CallbackActionName.CANCEL:
        return this.cancel(event);
      case CallbackActionName.DELETE_MESSAGE:
        return this.hideMessage(event);
      case 'unknown':
        this.logger.debug(
          `Ignoring unknown callback "${action.name}" from ${event.identity}`,
        );
        return this.acknowledge(event);
      default: {
        const unhandled: never = action;
        throw new Error(`Unhandled callback action: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async dispatchText(event: TextEvent): Promise<void> {
    const state = await this.store.get(event.identity);

    if (!isAwaitingInput(state)) {
      this.logger.debug(`Ignoring text from ${event.identity} in state ${state}`);
      return;
    }

    const credential = this.requireCredential(event.identity);

    if (state === ConversationState.AWAITING_PAYMENT_QUERY) {
      return this.lookupPayment(event, credential);
    }
    return this.submitWithdrawal(event, credential);
  }

  // ==================== Actions ====================

  private async start(event: CommandEvent): Promise<void> {
    const credential = this.requireCredential(event.identity);

    if (await this.applyTrigger(event.identity, ConversationTrigger.START)) {
      await this.sendSummary(event.chatId, credential);
    }
  }

  private async showBalance(event: CallbackEvent): Promise<void> {
    const credential = this.requireCredential(event.identity);

    if (!(await this.applyTrigger(event.identity, ConversationTrigger.SHOW_BALANCE))) {
      return this.acknowledge(event);
    }

    let info: unknown;
    try {
      info = await this.api.getMerchantInfo(credential);
    } catch (error) {
      if (!isApiFailure(error)) throw error;
      await this.transport.answerCallback(event.callbackId, describeApiFailure(error), {
        alert: true,
      });
      return;
    }

    const text = formatMerchantSummary(info);
    if (event.message) {
      await this.transport.editMessage(event.message, text, mainMenuKeyboard());
    } else {
      await this.transport.sendMessage(event.chatId, text, mainMenuKeyboard());
    }
    await this.transport.answerCallback(event.callbackId, Messages.dataRefreshed);
  }

  private async showPayments(event: CallbackEvent): Promise<void> {
    const credential = this.requireCredential(event.identity);
    await this.acknowledge(event);

    if (!(await this.applyTrigger(event.identity, ConversationTrigger.SHOW_PAYMENTS))) {
      return;
    }

    let history: unknown;
    try {
      history = await this.api.getPaymentHistory(credential);
    } catch (error) {
      if (!isApiFailure(error)) throw error;
      await this.transport.sendMessage(event.chatId, describeApiFailure(error));
      return;
    }

    const text = formatPaymentList(history);
    if (!text) {
      await this.transport.sendMessage(event.chatId, Messages.noPayments);
      return;
    }

    await this.transport.sendMessage(event.chatId, text, cancelKeyboard());
    if (event.message) {
      await this.transport.deleteMessage(event.message);
    }
  }

  private async openPrompt(
    event: CallbackEvent,
    trigger: ConversationTrigger,
    prompt: string,
  ): Promise<void> {
    this.requireCredential(event.identity);
    await this.acknowledge(event);

    if (!(await this.applyTrigger(event.identity, trigger))) {
      return;
    }

    await this.transport.sendMessage(event.chatId, prompt, cancelKeyboard());
    if (event.message) {
      await this.transport.deleteMessage(event.message);
    }
  }

  private async cancel(event: CallbackEvent): Promise<void> {
    const credential = this.requireCredential(event.identity);
    await this.acknowledge(event);

    if (!(await this.applyTrigger(event.identity, ConversationTrigger.CANCEL))) {
      return;
    }

    const shown = await this.sendSummary(event.chatId, credential);
    if (shown && event.message) {
      await this.transport.deleteMessage(event.message);
    }
  }

  /**
   * Not privileged: anyone may hide a message the bot sent them
   */
  private async hideMessage(event: CallbackEvent): Promise<void> {
    await this.acknowledge(event);
    await this.applyTrigger(event.identity, ConversationTrigger.DELETE_MESSAGE);

    if (event.message) {
      await this.transport.deleteMessage(event.message);
    }
  }

  private async lookupPayment(event: TextEvent, credential: Credential): Promise<void> {
    await this.transport.deleteMessage(event.message);

    let query: string;
    try {
      query = requirePaymentQuery(event.text);
    } catch (error) {
      if (!(error instanceof InputValidationError)) throw error;
      if (await this.applyTrigger(event.identity, ConversationTrigger.REJECT_INPUT)) {
        await this.transport.sendMessage(
          event.chatId,
          Messages.emptyPaymentQuery,
          hideKeyboard(),
        );
      }
      return;
    }

    // Leave the prompt before calling out so a repeated delivery is a no-op
    if (!(await this.applyTrigger(event.identity, ConversationTrigger.SUBMIT_PAYMENT_QUERY))) {
      return;
    }

    let payment: unknown;
    try {
      payment = await this.api.getPayment(credential, query);
    } catch (error) {
      if (!isApiFailure(error)) throw error;
      if (error instanceof RemoteApiError && error.status === 404) {
        await this.transport.sendMessage(
          event.chatId,
          Messages.paymentNotFound(query),
          hideKeyboard(),
        );
      } else {
        await this.transport.sendMessage(
          event.chatId,
          describeApiFailure(error),
          cancelKeyboard(),
        );
      }
      return;
    }

    const text = isRecord(payment)
      ? formatPaymentDetails(payment)
      : escapeHtml(toText(payment));
    await this.transport.sendMessage(event.chatId, text, hideKeyboard());
  }

  private async submitWithdrawal(event: TextEvent, credential: Credential): Promise<void> {
    let address: string;
    try {
      address = requireTronAddress(event.text);
    } catch (error) {
      if (!(error instanceof InputValidationError)) throw error;
      if (await this.applyTrigger(event.identity, ConversationTrigger.REJECT_INPUT)) {
        await this.transport.sendMessage(
          event.chatId,
          Messages.invalidAddress,
          cancelKeyboard(),
        );
      }
      return;
    }

    // Leave the prompt before calling out so a repeated delivery is a no-op
    if (
      !(await this.applyTrigger(event.identity, ConversationTrigger.SUBMIT_WITHDRAW_ADDRESS))
    ) {
      return;
    }

    let decision: unknown;
    try {
      decision = await this.api.requestWithdrawal(credential, address);
    } catch (error) {
      if (!isApiFailure(error)) throw error;
      await this.transport.sendMessage(
        event.chatId,
        describeApiFailure(error),
        cancelKeyboard(),
      );
      return;
    }

    const outcome = interpretWithdrawal(decision);
    this.logger.log(
      `Withdrawal to ${address} for ${maskCredential(credential)} requested by ${event.identity}: ${outcome}`,
    );

    await this.transport.sendMessage(
      event.chatId,
      this.withdrawalMessage(outcome, address),
      hideKeyboard(),
    );
    await this.transport.deleteMessage(event.message);
  }

  // ==================== Helpers ====================

  /**
   * Authorization guard for privileged actions
   */
  private requireCredential(identity: ChatIdentity): Credential {
    const credential = this.directory.credentialFor(identity);
    if (!credential) {
      throw new NotAuthorizedError(identity);
    }
    return credential;
  }

  /**
   * Move the conversation along a trigger. Returns false, leaving the state
   * untouched, when the trigger is not legal in the current state.
   */
  private async applyTrigger(
    identity: ChatIdentity,
    trigger: ConversationTrigger,
  ): Promise<boolean> {
    const current = await this.store.get(identity);
    const result = this.stateMachine.transition(current, trigger);

    if (!result.allowed) {
      this.logger.debug(`Ignoring ${trigger} for ${identity}: ${result.reason}`);
      return false;
    }

    if (result.to !== current) {
      await this.store.set(identity, result.to);
    }
    return true;
  }

  /**
   * Send the account summary with the main menu; false when the API call failed
   */
  private async sendSummary(chatId: ChatId, credential: Credential): Promise<boolean> {
    let info: unknown;
    try {
      info = await this.api.getMerchantInfo(credential);
    } catch (error) {
      if (!isApiFailure(error)) throw error;
      await this.transport.sendMessage(chatId, describeApiFailure(error), mainMenuKeyboard());
      return false;
    }

    await this.transport.sendMessage(chatId, formatMerchantSummary(info), mainMenuKeyboard());
    return true;
  }

  private withdrawalMessage(outcome: WithdrawalOutcome, address: string): string {
    switch (outcome) {
      case WithdrawalOutcome.SUCCESS:
        return Messages.withdrawSuccess(address);
      case WithdrawalOutcome.BELOW_MINIMUM:
        return Messages.withdrawBelowMinimum;
      case WithdrawalOutcome.FAILED:
        return Messages.withdrawFailed;
    }
  }

  private async acknowledge(event: CallbackEvent): Promise<void> {
    try {
      await this.transport.answerCallback(event.callbackId);
    } catch (error) {
      this.logger.debug(
        `Could not answer callback ${event.callbackId}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async replyNotAuthorized(event: InboundEvent): Promise<void> {
    this.logger.warn(`Rejected ${event.kind} event from unenrolled identity ${event.identity}`);

    try {
      if (event.kind === 'callback' && !event.message) {
        await this.transport.answerCallback(event.callbackId, Messages.notAuthorized, {
          alert: true,
        });
        return;
      }

      await this.transport.sendMessage(event.chatId, Messages.notAuthorized);
      if (event.kind === 'callback') {
        await this.acknowledge(event);
      }
    } catch (error) {
      this.logger.error(
        `Could not notify ${event.identity} about missing authorization: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
