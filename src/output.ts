/**
 * Output Renderer
 * Layer: infra
 *
 * Provided ports:
 *   - output.setBuildOutputs
 *   - output.renderMarkdown
 *
 * Console status lines, step outputs and the step summary.
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import type { Build, BuildRequest } from './types';

export type OutputName = 'id' | 'number' | 'url' | 'web_url' | 'state' | 'data';

// -----------------------------------------------------------------------------
// Console
// -----------------------------------------------------------------------------

const STATE_EMOJI: Record<string, string> = {
  scheduled: '🔗️',
  running: '🏃',
  passed: '💚',
};

export function stateEmoji(state: string): string {
  return STATE_EMOJI[state] ?? '💔';
}

/**
 * One-line status, e.g. "🏃 Build running → https://buildkite.com/...".
 */
export function formatBuildState(build: Build): string {
  return `${stateEmoji(build.state)} Build ${build.state} → ${build.web_url}`;
}

// -----------------------------------------------------------------------------
// Port: output.setBuildOutputs
// -----------------------------------------------------------------------------

export function buildOutputs(build: Build): Record<OutputName, string> {
  return {
    id: build.id,
    number: String(build.number),
    url: build.url,
    web_url: build.web_url,
    state: build.state,
    data: JSON.stringify(build.raw),
  };
}

export function setBuildOutputs(build: Build): void {
  for (const [name, value] of Object.entries(buildOutputs(build))) {
    core.setOutput(name, value);
  }
}

// -----------------------------------------------------------------------------
// Port: output.renderMarkdown
// -----------------------------------------------------------------------------

/**
 * Renders the step summary for $GITHUB_STEP_SUMMARY.
 */
export function renderMarkdown(build: Build, request: BuildRequest): string {
  const lines: string[] = [];

  lines.push(`## Buildkite: ${request.organization}/${request.pipeline}`);
  lines.push('');
  lines.push('| Build | Branch | Commit | State |');
  lines.push('|-------|--------|--------|-------|');
  lines.push(
    `| [#${build.number}](${build.web_url}) | ${escapeCell(request.branch)} | \`${request.commit.slice(0, 12)}\` | ${stateEmoji(build.state)} ${build.state} |`,
  );
  lines.push('');

  return lines.join('\n');
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}

/**
 * Writes markdown to GitHub step summary.
 */
export function writeStepSummary(markdown: string): void {
  const summaryPath = process.env['GITHUB_STEP_SUMMARY'];
  if (summaryPath) {
    fs.appendFileSync(summaryPath, markdown + '\n');
  }
}
