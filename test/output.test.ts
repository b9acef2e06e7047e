/**
 * Output Renderer Tests
 *
 * Status lines, step outputs and step summary rendering.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  buildOutputs,
  formatBuildState,
  renderMarkdown,
  setBuildOutputs,
  stateEmoji,
  writeStepSummary,
} from '../src/output';
import type { BuildRequest } from '../src/types';
import { makeBuild } from './poller/helpers';

vi.mock('@actions/core');

import * as core from '@actions/core';

function makeRequest(overrides: Partial<BuildRequest> = {}): BuildRequest {
  return {
    organization: 'my-org',
    pipeline: 'my-pipeline',
    branch: 'main',
    commit: 'abc123',
    message: ':github: test',
    env: {},
    author: null,
    ...overrides,
  };
}

// -----------------------------------------------------------------------------
// Console
// -----------------------------------------------------------------------------

describe('stateEmoji', () => {
  it('maps known states', () => {
    expect(stateEmoji('scheduled')).toBe('🔗️');
    expect(stateEmoji('running')).toBe('🏃');
    expect(stateEmoji('passed')).toBe('💚');
  });

  it('uses a broken heart for everything else', () => {
    expect(stateEmoji('failed')).toBe('💔');
    expect(stateEmoji('canceled')).toBe('💔');
  });
});

describe('formatBuildState', () => {
  it('renders state and web URL', () => {
    expect(formatBuildState(makeBuild({ state: 'running' }))).toBe(
      '🏃 Build running → https://buildkite.com/my-org/my-pipeline/builds/7',
    );
  });
});

// -----------------------------------------------------------------------------
// Outputs
// -----------------------------------------------------------------------------

describe('buildOutputs', () => {
  it('stringifies every output', () => {
    const build = makeBuild({ state: 'passed', raw: { id: '42', number: 7, state: 'passed' } });

    expect(buildOutputs(build)).toEqual({
      id: '42',
      number: '7',
      url: 'https://api.buildkite.com/v2/organizations/my-org/pipelines/my-pipeline/builds/7',
      web_url: 'https://buildkite.com/my-org/my-pipeline/builds/7',
      state: 'passed',
      data: '{"id":"42","number":7,"state":"passed"}',
    });
  });
});

describe('setBuildOutputs', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('sets all six outputs', () => {
    setBuildOutputs(makeBuild({ state: 'passed' }));

    expect(core.setOutput).toHaveBeenCalledTimes(6);
    expect(core.setOutput).toHaveBeenCalledWith('id', '42');
    expect(core.setOutput).toHaveBeenCalledWith('number', '7');
    expect(core.setOutput).toHaveBeenCalledWith('state', 'passed');
    expect(core.setOutput).toHaveBeenCalledWith('data', '{"id":"42","number":7}');
  });
});

// -----------------------------------------------------------------------------
// Step summary
// -----------------------------------------------------------------------------

describe('renderMarkdown', () => {
  it('renders a one-row build table', () => {
    const markdown = renderMarkdown(makeBuild({ state: 'passed' }), makeRequest());

    expect(markdown.split('\n')).toEqual([
      '## Buildkite: my-org/my-pipeline',
      '',
      '| Build | Branch | Commit | State |',
      '|-------|--------|--------|-------|',
      '| [#7](https://buildkite.com/my-org/my-pipeline/builds/7) | main | `abc123` | 💚 passed |',
      '',
    ]);
  });

  it('shortens long commits and escapes pipes in branch names', () => {
    const markdown = renderMarkdown(
      makeBuild({ state: 'failed' }),
      makeRequest({ branch: 'a|b', commit: '0123456789abcdef0123' }),
    );

    expect(markdown).toContain('| a\\|b | `0123456789ab` | 💔 failed |');
  });
});

describe('writeStepSummary', () => {
  let tmpDir: string;
  let savedSummary: string | undefined;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trigger-summary-'));
    savedSummary = process.env['GITHUB_STEP_SUMMARY'];
  });

  afterEach(() => {
    if (savedSummary === undefined) {
      delete process.env['GITHUB_STEP_SUMMARY'];
    } else {
      process.env['GITHUB_STEP_SUMMARY'] = savedSummary;
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('appends markdown to the summary file', () => {
    const summaryPath = path.join(tmpDir, 'summary.md');
    fs.writeFileSync(summaryPath, 'existing\n');
    process.env['GITHUB_STEP_SUMMARY'] = summaryPath;

    writeStepSummary('## Build');

    expect(fs.readFileSync(summaryPath, 'utf-8')).toBe('existing\n## Build\n');
  });

  it('does nothing when GITHUB_STEP_SUMMARY is not set', () => {
    delete process.env['GITHUB_STEP_SUMMARY'];

    expect(() => writeStepSummary('## Build')).not.toThrow();
  });
});
