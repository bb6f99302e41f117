import {
  ALL_CONVERSATION_STATES,
  ConversationState,
  ConversationStateMachine,
  ConversationTrigger,
  isAwaitingInput,
} from '../../src';

describe('ConversationStateMachine', () => {
  let machine: ConversationStateMachine;

  beforeEach(() => {
    machine = new ConversationStateMachine();
  });

  describe('Menu triggers', () => {
    it.each(ALL_CONVERSATION_STATES)('should reset to IDLE on START from %s', (state) => {
      expect(machine.transition(state, ConversationTrigger.START)).toEqual({
        allowed: true,
        from: state,
        to: ConversationState.IDLE,
      });
    });

    it.each(ALL_CONVERSATION_STATES)('should keep %s for read-only actions', (state) => {
      for (const trigger of [ConversationTrigger.SHOW_BALANCE, ConversationTrigger.SHOW_PAYMENTS]) {
        expect(machine.transition(state, trigger)).toEqual({ allowed: true, from: state, to: state });
      }
    });

    it('should replace a pending prompt with the newly opened one', () => {
      expect(
        machine.transition(
          ConversationState.AWAITING_PAYMENT_QUERY,
          ConversationTrigger.BEGIN_WITHDRAWAL,
        ),
      ).toEqual({
        allowed: true,
        from: ConversationState.AWAITING_PAYMENT_QUERY,
        to: ConversationState.AWAITING_WITHDRAW_ADDRESS,
      });
    });

    it.each(ALL_CONVERSATION_STATES)('should return to IDLE on CANCEL and DELETE_MESSAGE from %s', (state) => {
      expect(machine.transition(state, ConversationTrigger.CANCEL).allowed).toBe(true);
      expect(machine.transition(state, ConversationTrigger.DELETE_MESSAGE).allowed).toBe(true);
    });
  });

  describe('Input triggers', () => {
    it('should accept a payment query only while awaiting one', () => {
      expect(
        machine.transition(
          ConversationState.AWAITING_PAYMENT_QUERY,
          ConversationTrigger.SUBMIT_PAYMENT_QUERY,
        ),
      ).toEqual({
        allowed: true,
        from: ConversationState.AWAITING_PAYMENT_QUERY,
        to: ConversationState.IDLE,
      });

      expect(
        machine.transition(ConversationState.IDLE, ConversationTrigger.SUBMIT_PAYMENT_QUERY),
      ).toEqual({
        allowed: false,
        from: ConversationState.IDLE,
        reason: 'Trigger submit_payment_query is not valid in state idle',
      });
    });

    it('should not accept a withdrawal address while awaiting a payment query', () => {
      expect(
        machine.transition(
          ConversationState.AWAITING_PAYMENT_QUERY,
          ConversationTrigger.SUBMIT_WITHDRAW_ADDRESS,
        ).allowed,
      ).toBe(false);
    });

    it('should keep the awaiting state on rejected input', () => {
      for (const state of [
        ConversationState.AWAITING_PAYMENT_QUERY,
        ConversationState.AWAITING_WITHDRAW_ADDRESS,
      ]) {
        expect(machine.transition(state, ConversationTrigger.REJECT_INPUT)).toEqual({
          allowed: true,
          from: state,
          to: state,
        });
      }
      expect(machine.transition(ConversationState.IDLE, ConversationTrigger.REJECT_INPUT).allowed).toBe(
        false,
      );
    });
  });

  it.each([
    ConversationTrigger.SUBMIT_PAYMENT_QUERY,
    ConversationTrigger.SUBMIT_WITHDRAW_ADDRESS,
    ConversationTrigger.REJECT_INPUT,
  ])('should reject %s in IDLE with a reason', (trigger) => {
    expect(machine.transition(ConversationState.IDLE, trigger)).toEqual({
      allowed: false,
      from: ConversationState.IDLE,
      reason: `Trigger ${trigger} is not valid in state idle`,
    });
  });

  it('should accept a custom transition table', () => {
    const locked = new ConversationStateMachine({
      transitions: [
        {
          from: ConversationState.IDLE,
          to: ConversationState.IDLE,
          trigger: ConversationTrigger.START,
        },
      ],
    });

    expect(locked.transition(ConversationState.IDLE, ConversationTrigger.START).allowed).toBe(true);
    expect(locked.transition(ConversationState.IDLE, ConversationTrigger.BEGIN_WITHDRAWAL).allowed).toBe(
      false,
    );
  });

  it('should report which states consume free text', () => {
    expect(isAwaitingInput(ConversationState.IDLE)).toBe(false);
    expect(isAwaitingInput(ConversationState.AWAITING_PAYMENT_QUERY)).toBe(true);
    expect(isAwaitingInput(ConversationState.AWAITING_WITHDRAW_ADDRESS)).toBe(true);
  });
});
