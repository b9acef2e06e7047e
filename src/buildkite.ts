/**
 * Buildkite API Client
 * Layer: infra
 *
 * Provided ports:
 *   - buildkite.createBuild
 *   - buildkite.fetchBuild
 *
 * Thin wrapper over the Buildkite REST API. No retries happen here;
 * callers decide which failures are fatal.
 */

import type { Build, BuildRequest, PipelineRef } from './types';
import { API_BASE_URL, FETCH_TIMEOUT_MS } from './types';
import { AuthError, NotFoundError, TransportError } from './errors';
import { isARealObject, isNonEmptyString } from './utils';

// -----------------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------------

const USER_AGENT = 'buildkite-trigger-action';

type HttpMethod = 'GET' | 'POST';

/** Token scope each request needs; named in auth failures */
const REQUIRED_SCOPE: Record<HttpMethod, string> = {
  POST: 'write_builds',
  GET: 'read_builds',
};

// -----------------------------------------------------------------------------
// Port: buildkite.createBuild
// -----------------------------------------------------------------------------

/**
 * Returns the builds endpoint of a pipeline.
 */
export function pipelineBuildsUrl(ref: PipelineRef): string {
  const organization = encodeURIComponent(ref.organization);
  const pipeline = encodeURIComponent(ref.pipeline);
  return `${API_BASE_URL}/organizations/${organization}/pipelines/${pipeline}/builds`;
}

/**
 * Builds the JSON body for a create-build call.
 */
export function buildRequestBody(request: BuildRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    commit: request.commit,
    branch: request.branch,
    message: request.message,
    env: request.env,
  };
  if (request.author) {
    body['author'] = request.author;
  }
  return body;
}

/**
 * Creates a build. A failure here is always fatal.
 *
 * @throws AuthError when the token lacks `write_builds`
 * @throws NotFoundError when the pipeline does not exist
 * @throws TransportError on network failure or unexpected responses
 */
export async function createBuild(request: BuildRequest, token: string): Promise<Build> {
  const url = pipelineBuildsUrl(request);
  const raw = await sendRequest('POST', url, token, buildRequestBody(request));
  return toBuild(raw);
}

// -----------------------------------------------------------------------------
// Port: buildkite.fetchBuild
// -----------------------------------------------------------------------------

/**
 * Fetches the current status of a build by its API URL.
 */
export async function fetchBuild(url: string, token: string): Promise<Build> {
  const raw = await sendRequest('GET', url, token);
  return toBuild(raw);
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

async function sendRequest(
  method: HttpMethod,
  url: string,
  token: string,
  body?: Record<string, unknown>,
): Promise<unknown> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${token}`,
    Accept: 'application/json',
    'User-Agent': USER_AGENT,
  };
  if (body) {
    headers['Content-Type'] = 'application/json';
  }

  // The timeout covers the whole exchange, body included
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), FETCH_TIMEOUT_MS);

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        signal: controller.signal,
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (err) {
      if (isAbortError(err)) throw timeoutError();
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Network error: ${message}`);
    }

    if (!response.ok) {
      throw await toHttpError(method, url, response);
    }

    try {
      const raw: unknown = await response.json();
      return raw;
    } catch (err) {
      if (isAbortError(err)) throw timeoutError();
      const message = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Invalid JSON from Buildkite API: ${message}`, response.status);
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}

function timeoutError(): TransportError {
  return new TransportError(
    `Request timeout: Buildkite API did not respond within ${FETCH_TIMEOUT_MS}ms`,
  );
}

async function toHttpError(
  method: HttpMethod,
  url: string,
  response: Response,
): Promise<AuthError | NotFoundError | TransportError> {
  const message = await readErrorMessage(response);
  const statusText = response.statusText || 'Unknown error';
  const detail = message
    ? `HTTP ${response.status}: ${statusText} - ${message}`
    : `HTTP ${response.status}: ${statusText}`;

  if (response.status === 401 || response.status === 403) {
    return new AuthError(
      `${detail} (check the access token has the '${REQUIRED_SCOPE[method]}' scope)`,
      response.status,
    );
  }
  if (response.status === 404) {
    return new NotFoundError(`${detail} (${url})`);
  }
  return new TransportError(detail, response.status);
}

async function readErrorMessage(response: Response): Promise<string | null> {
  let text: string;
  try {
    text = (await response.text()).trim();
  } catch {
    return null;
  }
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    if (isARealObject(parsed) && typeof parsed['message'] === 'string') {
      return parsed['message'];
    }
  } catch {
    // Not JSON; use the raw text
  }
  return text;
}

function toBuild(raw: unknown): Build {
  const build = parseBuild(raw);
  if (!build) {
    throw new TransportError('Failed to parse build response');
  }
  return build;
}

/**
 * Parses a raw API payload into a Build.
 * Returns null if a required field is missing or has the wrong type.
 */
export function parseBuild(raw: unknown): Build | null {
  if (!isARealObject(raw)) {
    return null;
  }

  const { id, number, url, web_url, state, finished_at } = raw;
  if (!isNonEmptyString(id) || typeof number !== 'number' || !Number.isFinite(number)) {
    return null;
  }
  if (!isNonEmptyString(url) || typeof web_url !== 'string' || !isNonEmptyString(state)) {
    return null;
  }

  return {
    id,
    number,
    url,
    web_url,
    state,
    finished_at: typeof finished_at === 'string' ? finished_at : null,
    raw,
  };
}
