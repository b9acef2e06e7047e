/**
 * Boundary types for buildkite-trigger-action
 *
 * These types define the contracts between modules.
 */

// -----------------------------------------------------------------------------
// PipelineRef
// "organization/pipeline" identifier split into its parts
// -----------------------------------------------------------------------------

export interface PipelineRef {
  /** Buildkite organization slug */
  organization: string;
  /** Pipeline slug within the organization */
  pipeline: string;
}

// -----------------------------------------------------------------------------
// BuildRequest
// Everything needed to create one build; built once from configuration
// -----------------------------------------------------------------------------

export interface BuildAuthor {
  name: string;
  email: string;
}

export interface BuildRequest {
  readonly organization: string;
  readonly pipeline: string;
  readonly branch: string;
  readonly commit: string;
  readonly message: string;
  /** Environment variables passed to the build */
  readonly env: Readonly<Record<string, string>>;
  /** Pusher from the GitHub event payload (null if unavailable) */
  readonly author: Readonly<BuildAuthor> | null;
}

// -----------------------------------------------------------------------------
// Build
// A build as returned by the Buildkite REST API
// -----------------------------------------------------------------------------

export type BuildState =
  | 'creating'
  | 'scheduled'
  | 'running'
  | 'waiting'
  | 'blocked'
  | 'canceling'
  | 'failing'
  | 'passed'
  | 'failed'
  | 'canceled'
  | 'skipped'
  | 'not_run';

export interface Build {
  /** Build UUID */
  id: string;
  /** Per-pipeline build number */
  number: number;
  /** API URL of the build (used for polling) */
  url: string;
  /** Browser URL of the build */
  web_url: string;
  /** Current state; unknown values from the API are kept as-is */
  state: string;
  /** ISO timestamp when the build finished (null while pending) */
  finished_at: string | null;
  /** Full JSON object from the API */
  raw: Record<string, unknown>;
}

// -----------------------------------------------------------------------------
// Configuration
// -----------------------------------------------------------------------------

export interface ActionConfig {
  /** Buildkite API access token */
  token: string;
  request: BuildRequest;
  /** Skip waiting for the build to finish */
  async: boolean;
  /** Fixed interval between status polls in seconds */
  poll_interval_seconds: number;
}

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

export const API_BASE_URL = 'https://api.buildkite.com/v2';

/** States in which a build can still make progress */
export const PENDING_BUILD_STATES: readonly BuildState[] = [
  'creating',
  'scheduled',
  'running',
  'waiting',
  'canceling',
  'failing',
];

/** States the action reports as success */
export const SUCCESSFUL_BUILD_STATES: readonly BuildState[] = ['scheduled', 'running', 'passed'];

export const POLL_INTERVAL_SECONDS = 15;

/** Upper bound for the poll_interval input: the 6 hour job limit */
export const MAX_POLL_INTERVAL_SECONDS = 6 * 60 * 60;

/** Consecutive failed polls tolerated before giving up */
export const MAX_CONSECUTIVE_POLL_FAILURES = 3;

/** How often to log a "still waiting" line while polling (milliseconds) */
export const STATUS_REPORT_INTERVAL_MS = 60_000;

/** Timeout for fetch requests to the Buildkite API (milliseconds) */
export const FETCH_TIMEOUT_MS = 10000;
