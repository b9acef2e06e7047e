/**
 * Single Poll
 *
 * Performs one poll cycle: fetch the build, then reduce the wait state.
 * Only transport failures are absorbed; auth and not-found errors are fatal
 * and propagate to the caller.
 */

import type { Build } from '../types';
import { TransportError } from '../errors';
import { applyPollFailure, applyPollSuccess } from '../reducer';
import type { WaitState } from '../reducer';

export type FetchBuildFn = (url: string, token: string) => Promise<Build>;

export interface PerformPollSuccess {
  success: true;
  state: WaitState;
  /** Build as returned by this poll, before the reducer accepts or rejects it */
  observed: Build;
}

export interface PerformPollFailure {
  success: false;
  state: WaitState;
  error: string;
}

export type PerformPollOutcome = PerformPollSuccess | PerformPollFailure;

/**
 * Polls the build once and returns the next wait state.
 */
export async function performPoll(
  state: WaitState,
  token: string,
  fetchBuild: FetchBuildFn,
  maxConsecutiveFailures: number,
): Promise<PerformPollOutcome> {
  try {
    const build = await fetchBuild(state.build.url, token);
    return { success: true, state: applyPollSuccess(state, build), observed: build };
  } catch (err) {
    if (!(err instanceof TransportError)) {
      throw err;
    }
    return {
      success: false,
      state: applyPollFailure(state, err.message, maxConsecutiveFailures),
      error: err.message,
    };
  }
}
