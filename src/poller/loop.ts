/**
 * Poll Loop
 *
 * Waits for a build to reach a terminal state by polling at a fixed interval.
 * Clock, sleep, HTTP and logging are injected so tests can drive the loop
 * deterministically.
 */

import * as core from '@actions/core';
import type { Build } from '../types';
import {
  MAX_CONSECUTIVE_POLL_FAILURES,
  POLL_INTERVAL_SECONDS,
  STATUS_REPORT_INTERVAL_MS,
} from '../types';
import { TransportError } from '../errors';
import { fetchBuild } from '../buildkite';
import { createWaitState } from '../reducer';
import { sleep } from '../utils';
import { performPoll } from './perform-poll';
import type { FetchBuildFn } from './perform-poll';

export interface WaitOptions {
  intervalSeconds: number;
  maxConsecutiveFailures: number;
}

/**
 * Dependency injection interface for waitForBuild.
 * Production defaults are used when not provided by tests.
 */
export interface LoopDeps {
  fetchBuild: FetchBuildFn;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
  log: (message: string) => void;
}

const defaultOptions: WaitOptions = {
  intervalSeconds: POLL_INTERVAL_SECONDS,
  maxConsecutiveFailures: MAX_CONSECUTIVE_POLL_FAILURES,
};

export const defaultLoopDeps: LoopDeps = {
  fetchBuild,
  sleep,
  now: () => Date.now(),
  log: (message) => core.info(message),
};

/**
 * Polls until the build is terminal and returns the final observation.
 *
 * Sequence per iteration:
 *   1. Sleep the fixed interval
 *   2. Log a "still waiting" line if a report is due
 *   3. Poll once and reduce
 *
 * A build that is already terminal is returned without sleeping.
 *
 * @throws TransportError after too many consecutive failed polls
 * @throws AuthError / NotFoundError from any single poll
 */
export async function waitForBuild(
  build: Build,
  token: string,
  options: Partial<WaitOptions> = {},
  deps: LoopDeps = defaultLoopDeps,
): Promise<Build> {
  const { intervalSeconds, maxConsecutiveFailures } = { ...defaultOptions, ...options };
  let state = createWaitState(build);

  if (state.phase === 'terminal') {
    return state.build;
  }

  deps.log('⌛ Waiting for build to finish');
  let lastReportMs = deps.now();

  while (state.phase === 'pending') {
    await deps.sleep(intervalSeconds * 1000);

    if (deps.now() - lastReportMs >= STATUS_REPORT_INTERVAL_MS) {
      deps.log(`⌛ Still waiting for build to finish (state: ${state.build.state})`);
      lastReportMs = deps.now();
    }

    const previous = state;
    const outcome = await performPoll(state, token, deps.fetchBuild, maxConsecutiveFailures);
    state = outcome.state;

    if (!outcome.success) {
      deps.log(
        `Poll failed (${state.consecutive_failures}/${maxConsecutiveFailures}): ${outcome.error}`,
      );
    } else if (state.regressions > previous.regressions) {
      deps.log(`Ignoring out-of-order build state '${outcome.observed.state}'`);
    } else if (state.build.state !== previous.build.state) {
      deps.log(`Build state changed: ${previous.build.state} → ${state.build.state}`);
    }
  }

  if (state.phase === 'failed') {
    throw new TransportError(
      `Gave up waiting for build after ${state.consecutive_failures} consecutive failed polls: ${state.last_error}`,
    );
  }

  return state.build;
}
