/**
 * Poller
 * Layer: poller
 *
 * Provided ports:
 *   - poller.waitForBuild
 *   - poller.performPoll
 */

export { waitForBuild, defaultLoopDeps } from './poller/loop';
export type { LoopDeps, WaitOptions } from './poller/loop';
export { performPoll } from './poller/perform-poll';
export type {
  FetchBuildFn,
  PerformPollOutcome,
  PerformPollSuccess,
  PerformPollFailure,
} from './poller/perform-poll';
