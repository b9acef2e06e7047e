/**
 * Wait Reducer
 * Layer: core
 *
 * Provided ports:
 *   - reducer.createWaitState
 *   - reducer.applyPollSuccess
 *   - reducer.applyPollFailure
 *
 * Pure state machine for waiting on a build: pending -> terminal | failed.
 *
 * Transitions (per poll):
 *   if phase is not pending:
 *     no change (terminal and failed are absorbing)
 *   else on success:
 *     if rank(observed) < rank(current): regression, keep current build
 *     else: take observed build, phase = terminal if observed is finished
 *     (terminal state or finished_at set)
 *     consecutive_failures = 0
 *   else on failure:
 *     consecutive_failures += 1
 *     phase = failed once consecutive_failures reaches the limit
 */

import type { Build, BuildState } from './types';
import { PENDING_BUILD_STATES, SUCCESSFUL_BUILD_STATES } from './types';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export type WaitPhase = 'pending' | 'terminal' | 'failed';

export interface WaitState {
  phase: WaitPhase;
  /** Latest accepted observation of the build */
  build: Build;
  /** Successful polls */
  poll_count: number;
  /** Failed polls in total */
  poll_failures: number;
  /** Failed polls since the last success */
  consecutive_failures: number;
  /** Observations that would have moved the state backwards */
  regressions: number;
  last_error: string | null;
}

// -----------------------------------------------------------------------------
// State classification
// -----------------------------------------------------------------------------

function isPendingState(state: string): boolean {
  return PENDING_BUILD_STATES.some((pending) => pending === state);
}

/**
 * Anything that is not known to be pending counts as terminal, so an
 * unrecognised state never keeps the loop alive.
 */
export function isTerminalState(state: string): boolean {
  return !isPendingState(state);
}

export function isSuccessfulState(state: string): boolean {
  return SUCCESSFUL_BUILD_STATES.some((ok) => ok === state);
}

const QUEUED_STATES: readonly BuildState[] = ['creating', 'scheduled', 'waiting'];

/**
 * Orders states by progress: queued (0) < running (1) < terminal (2).
 */
export function stateRank(state: string): number {
  if (isTerminalState(state)) return 2;
  if (QUEUED_STATES.some((queued) => queued === state)) return 0;
  return 1;
}

/**
 * A build is finished once its state is terminal or the API has stamped
 * `finished_at`, whichever is seen first.
 */
export function isBuildFinished(build: Build): boolean {
  return isTerminalState(build.state) || build.finished_at !== null;
}

function buildRank(build: Build): number {
  return isBuildFinished(build) ? 2 : stateRank(build.state);
}

// -----------------------------------------------------------------------------
// Port: reducer.createWaitState
// -----------------------------------------------------------------------------

export function createWaitState(build: Build): WaitState {
  return {
    phase: isBuildFinished(build) ? 'terminal' : 'pending',
    build,
    poll_count: 0,
    poll_failures: 0,
    consecutive_failures: 0,
    regressions: 0,
    last_error: null,
  };
}

// -----------------------------------------------------------------------------
// Port: reducer.applyPollSuccess
// -----------------------------------------------------------------------------

export function applyPollSuccess(state: WaitState, observed: Build): WaitState {
  if (state.phase !== 'pending') {
    return state;
  }

  const base: WaitState = {
    ...state,
    poll_count: state.poll_count + 1,
    consecutive_failures: 0,
  };

  if (buildRank(observed) < buildRank(state.build)) {
    return { ...base, regressions: state.regressions + 1 };
  }

  return {
    ...base,
    build: observed,
    phase: isBuildFinished(observed) ? 'terminal' : 'pending',
  };
}

// -----------------------------------------------------------------------------
// Port: reducer.applyPollFailure
// -----------------------------------------------------------------------------

export function applyPollFailure(
  state: WaitState,
  error: string,
  maxConsecutiveFailures: number,
): WaitState {
  if (state.phase !== 'pending') {
    return state;
  }

  const consecutive = state.consecutive_failures + 1;
  return {
    ...state,
    phase: consecutive >= maxConsecutiveFailures ? 'failed' : 'pending',
    poll_failures: state.poll_failures + 1,
    consecutive_failures: consecutive,
    last_error: error,
  };
}
