/**
 * Configuration
 * Layer: action
 *
 * Provided ports:
 *   - config.load
 *
 * Turns action inputs and runner environment into an ActionConfig.
 * Inputs and environment are passed in; nothing is read from globals.
 * Every validation failure happens here, before any network call.
 */

import * as fs from 'fs';
import type { ActionConfig, BuildAuthor, PipelineRef } from './types';
import { MAX_POLL_INTERVAL_SECONDS, POLL_INTERVAL_SECONDS } from './types';
import { ValidationError } from './errors';
import { isARealObject, parseBooleanFlag } from './utils';

export type InputReader = (name: string) => string;

export interface LoadConfigResult {
  config: ActionConfig;
  /** Non-fatal problems to surface as warnings */
  warnings: string[];
}

// -----------------------------------------------------------------------------
// Port: config.load
// -----------------------------------------------------------------------------

export function loadConfig(
  getInput: InputReader,
  env: NodeJS.ProcessEnv,
  readAuthor: (eventPath: string | undefined) => ReadAuthorOutcome = readEventAuthor,
): LoadConfigResult {
  const warnings: string[] = [];

  const token = requireInput(getInput, 'access_token');
  const ref = parsePipeline(requireInput(getInput, 'pipeline'));
  const branch = getInput('branch').trim() || resolveBranch(env);
  const commit = getInput('commit').trim() || resolveCommit(env);
  const message = requireInput(getInput, 'message');
  const buildEnv = parseEnvInput(getInput('env'));
  const isAsync = parseBooleanFlag(getInput('async'));
  const interval = parsePollInterval(getInput('poll_interval'));

  const authorResult = readAuthor(env['GITHUB_EVENT_PATH']);
  if (!authorResult.success) {
    warnings.push(`Build author unavailable: ${authorResult.error}`);
  }

  return {
    config: {
      token,
      request: {
        organization: ref.organization,
        pipeline: ref.pipeline,
        branch,
        commit,
        message,
        env: buildEnv,
        author: authorResult.success ? authorResult.author : null,
      },
      async: isAsync,
      poll_interval_seconds: interval,
    },
    warnings,
  };
}

// -----------------------------------------------------------------------------
// Input parsing
// -----------------------------------------------------------------------------

function requireInput(getInput: InputReader, name: string): string {
  const value = getInput(name).trim();
  if (!value) {
    throw new ValidationError(`Input required and not supplied: ${name}`);
  }
  return value;
}

/**
 * Parses "organization/pipeline".
 */
export function parsePipeline(raw: string): PipelineRef {
  const separator = raw.indexOf('/');
  const organization = separator === -1 ? '' : raw.slice(0, separator);
  const pipeline = separator === -1 ? '' : raw.slice(separator + 1);

  if (!organization || !pipeline || pipeline.includes('/')) {
    throw new ValidationError(
      `pipeline must be in the form 'organization/pipeline' (got '${raw}')`,
    );
  }
  return { organization, pipeline };
}

/**
 * Parses the env input: a JSON object of string values. Empty means none.
 */
export function parseEnvInput(raw: string): Record<string, string> {
  const text = raw.trim();
  if (!text) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`env must be valid JSON: ${reason}`);
  }

  if (!isARealObject(parsed)) {
    throw new ValidationError('env must be a JSON object');
  }

  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw new ValidationError(`env value for '${key}' must be a string`);
    }
    result[key] = value;
  }
  return result;
}

export function parsePollInterval(raw: string): number {
  const text = raw.trim();
  if (!text) return POLL_INTERVAL_SECONDS;

  const seconds = Number(text);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new ValidationError(`poll_interval must be a positive whole number of seconds (got '${raw}')`);
  }
  if (seconds > MAX_POLL_INTERVAL_SECONDS) {
    throw new ValidationError(
      `poll_interval must be at most ${MAX_POLL_INTERVAL_SECONDS} seconds (got '${raw}')`,
    );
  }
  return seconds;
}

// -----------------------------------------------------------------------------
// Runner environment defaults
// -----------------------------------------------------------------------------

/**
 * Branch of the invoking workflow: the PR head branch on pull requests,
 * otherwise GITHUB_REF without its refs/heads/ prefix.
 */
export function resolveBranch(env: NodeJS.ProcessEnv): string {
  const headRef = env['GITHUB_HEAD_REF'];
  if (headRef) return headRef;

  const gitRef = env['GITHUB_REF'];
  if (!gitRef) {
    throw new ValidationError('branch input not supplied and GITHUB_REF is not set');
  }

  const prefix = 'refs/heads/';
  return gitRef.startsWith(prefix) ? gitRef.slice(prefix.length) : gitRef;
}

export function resolveCommit(env: NodeJS.ProcessEnv): string {
  const sha = env['GITHUB_SHA'];
  if (!sha) {
    throw new ValidationError('commit input not supplied and GITHUB_SHA is not set');
  }
  return sha;
}

// -----------------------------------------------------------------------------
// Event payload
// -----------------------------------------------------------------------------

export type ReadAuthorOutcome =
  | { success: true; author: BuildAuthor | null }
  | { success: false; error: string };

/**
 * Reads the pusher from the GitHub event payload.
 * Events without a pusher (e.g. pull_request) yield a null author.
 */
export function readEventAuthor(eventPath: string | undefined): ReadAuthorOutcome {
  if (!eventPath) {
    return { success: false, error: 'GITHUB_EVENT_PATH is not set' };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(fs.readFileSync(eventPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: `Failed to read event payload: ${message}` };
  }

  if (!isARealObject(payload)) {
    return { success: true, author: null };
  }
  return { success: true, author: parseAuthor(payload['pusher']) };
}

function parseAuthor(raw: unknown): BuildAuthor | null {
  if (!isARealObject(raw)) return null;
  const { name, email } = raw;
  if (typeof name !== 'string' || typeof email !== 'string') return null;
  return { name, email };
}
