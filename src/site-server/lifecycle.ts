/**
 * Server Lifecycle State Machine
 *
 * Manages server state transitions.
 */

import type { ServerState } from './types';
import { StateError } from './types';

// ============================================================================
// State Transitions
// ============================================================================

const VALID_TRANSITIONS: Record<ServerState, ServerState[]> = {
  unconfigured: ['configured'],
  configured: ['configured', 'finalized'],
  finalized: ['running'],
  running: ['stopped'],
  stopped: ['running'],
};

const FINALIZED_STATES: Set<ServerState> = new Set(['finalized', 'running', 'stopped']);

// ============================================================================
// State Machine
// ============================================================================

export class LifecycleStateMachine {
  /**
   * Check if transition is valid
   */
  canTransition(from: ServerState, to: ServerState): boolean {
    const allowed = VALID_TRANSITIONS[from];
    return allowed ? allowed.includes(to) : false;
  }

  /**
   * Attempt state transition
   */
  transition(from: ServerState, to: ServerState): ServerState {
    if (!this.canTransition(from, to)) {
      throw new StateError(`Invalid state transition: ${from} -> ${to}`);
    }

    return to;
  }

  /**
   * Check if the route table has been built for this state
   */
  isFinalized(state: ServerState): boolean {
    return FINALIZED_STATES.has(state);
  }

  /**
   * Get valid next states
   */
  getValidNextStates(state: ServerState): ServerState[] {
    return VALID_TRANSITIONS[state] || [];
  }
}

// ============================================================================
// Singleton
// ============================================================================

export const lifecycle = new LifecycleStateMachine();
