import { EventEmitter } from 'node:events';
import { logger } from '@taskchat/shared';
import type { ConversationState } from './types.js';

const log = logger.child({ module: 'conversation-state' });

/**
 * Valid state transitions for one chat session.
 *
 * awaiting_input        → requesting_completion | terminated
 * requesting_completion → direct_reply | tool_calling_round | awaiting_input (failed turn)
 * direct_reply          → awaiting_input
 * tool_calling_round    → awaiting_input
 * terminated            → (terminal)
 */
const VALID_TRANSITIONS: Record<ConversationState, Set<ConversationState>> = {
  awaiting_input: new Set(['requesting_completion', 'terminated']),
  requesting_completion: new Set(['direct_reply', 'tool_calling_round', 'awaiting_input']),
  direct_reply: new Set(['awaiting_input']),
  tool_calling_round: new Set(['awaiting_input']),
  terminated: new Set(),
};

export class ConversationStateMachine extends EventEmitter {
  private _state: ConversationState = 'awaiting_input';

  get state(): ConversationState {
    return this._state;
  }

  canTransition(to: ConversationState): boolean {
    return VALID_TRANSITIONS[this._state].has(to);
  }

  transition(to: ConversationState): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid conversation state transition: ${this._state} -> ${to}`);
    }
    log.debug({ from: this._state, to }, 'state transition');
    this._state = to;
    this.emit('transition', to);
    this.emit(to);
  }
}
