/**
 * Trigger handler
 * Layer: action
 *
 * Trigger stage followed by the optional poll stage.
 */

import * as core from '@actions/core';
import type { ActionConfig, Build } from './types';
import { MAX_CONSECUTIVE_POLL_FAILURES } from './types';
import { createBuild } from './buildkite';
import { waitForBuild, defaultLoopDeps } from './poller';
import type { LoopDeps } from './poller';
import { formatBuildState } from './output';

/**
 * Dependency injection interface for triggerPipeline.
 * `loop` is handed to waitForBuild unchanged.
 */
export interface TriggerDeps {
  createBuild: typeof createBuild;
  loop: LoopDeps;
}

export const defaultTriggerDeps: TriggerDeps = {
  createBuild,
  loop: defaultLoopDeps,
};

export async function triggerPipeline(
  config: ActionConfig,
  deps: TriggerDeps = defaultTriggerDeps,
): Promise<Build> {
  const { request } = config;

  core.info(
    `🪁 Triggering ${request.organization}/${request.pipeline} for ${request.branch}@${request.commit}`,
  );
  let build = await deps.createBuild(request, config.token);
  core.info(formatBuildState(build));

  if (config.async) {
    return build;
  }

  build = await waitForBuild(
    build,
    config.token,
    {
      intervalSeconds: config.poll_interval_seconds,
      maxConsecutiveFailures: MAX_CONSECUTIVE_POLL_FAILURES,
    },
    deps.loop,
  );
  core.info(formatBuildState(build));

  return build;
}
