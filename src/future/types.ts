/**
 * @fileoverview Future states and transitions.
 *
 * @module future/types
 */

/**
 * Valid future states.
 * Terminal states: done, failed
 */
export type FutureState =
  | 'pending'   // Waiting for dependencies or a worker slot
  | 'running'   // Being computed
  | 'done'      // Value available
  | 'failed';   // Error available

/**
 * Terminal states - futures in these states will never change
 */
export const TERMINAL_FUTURE_STATES: readonly FutureState[] = ['done', 'failed'];

/**
 * Valid state transitions
 */
export const VALID_FUTURE_TRANSITIONS: Record<FutureState, readonly FutureState[]> = {
  'pending': ['running', 'done', 'failed'],
  'running': ['done', 'failed'],
  'done':    [],  // Terminal
  'failed':  [],  // Terminal
};

/**
 * Check if a state is terminal
 */
export function isTerminalFutureState(state: FutureState): boolean {
  return TERMINAL_FUTURE_STATES.includes(state);
}

/**
 * Check if a transition is valid
 */
export function isValidFutureTransition(from: FutureState, to: FutureState): boolean {
  return VALID_FUTURE_TRANSITIONS[from].includes(to);
}
