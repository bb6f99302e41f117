import { ConversationState, ConversationTrigger } from '../domain/enums';
import {
  ConversationStateMachineConfig,
  ConversationTransition,
  TransitionResult,
} from './types';
import { TRANSITION_RULES } from './transition-rules';

/**
 * Decides which conversation transitions are legal.
 *
 * Holds no per-conversation data; the current state comes from the
 * conversation store and the resulting state is written back by the router.
 */
export class ConversationStateMachine {
  private readonly config: ConversationStateMachineConfig;
  private readonly transitions: Map<string, ConversationTransition>;

  constructor(config?: Partial<ConversationStateMachineConfig>) {
    this.config = {
      transitions: TRANSITION_RULES,
      ...config,
    };

    this.transitions = new Map();
    for (const transition of this.config.transitions) {
      this.transitions.set(
        this.getTransitionKey(transition.from, transition.trigger),
        transition,
      );
    }
  }

  /**
   * Resolve the state reached by applying a trigger
   */
  transition(from: ConversationState, trigger: ConversationTrigger): TransitionResult {
    const transition = this.findTransition(from, trigger);

    if (!transition) {
      return {
        allowed: false,
        from,
        reason: `Trigger ${trigger} is not valid in state ${from}`,
      };
    }

    return { allowed: true, from, to: transition.to };
  }

  private findTransition(
    from: ConversationState,
    trigger: ConversationTrigger,
  ): ConversationTransition | undefined {
    return this.transitions.get(this.getTransitionKey(from, trigger));
  }

  private getTransitionKey(from: ConversationState, trigger: ConversationTrigger): string {
    return `${from}:${trigger}`;
  }
}
