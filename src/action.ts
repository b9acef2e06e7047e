/**
 * Action Runner
 * Layer: action
 *
 * Required ports:
 *   - config.load
 *   - trigger.triggerPipeline
 *   - output.setBuildOutputs
 *   - output.renderMarkdown
 */

import * as core from '@actions/core';
import { loadConfig } from './config';
import { triggerPipeline, defaultTriggerDeps } from './trigger';
import type { TriggerDeps } from './trigger';
import { setBuildOutputs, renderMarkdown, writeStepSummary } from './output';
import { isSuccessfulState } from './reducer';

export async function run(deps: TriggerDeps = defaultTriggerDeps): Promise<void> {
  try {
    const token = core.getInput('access_token');
    if (token) {
      // Mask token to prevent accidental exposure
      core.setSecret(token);
    }

    const { config, warnings } = loadConfig((name) => core.getInput(name), process.env);
    for (const warning of warnings) {
      core.warning(warning);
    }

    const build = await triggerPipeline(config, deps);

    setBuildOutputs(build);
    writeStepSummary(renderMarkdown(build, config.request));

    if (!isSuccessfulState(build.state)) {
      throw new Error(`Pipeline failed with state '${build.state}'`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    core.setFailed(message);
  }
}
