/**
 * Error Taxonomy
 * Layer: core
 *
 * Every failure the action can surface. All of them are fatal except a
 * TransportError raised while polling, which the poll state machine counts.
 */

/**
 * Bad configuration detected before any network call.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Base class for failures talking to the Buildkite API.
 */
export class BuildkiteApiError extends Error {
  /** HTTP status code, or null when no response was received */
  readonly status: number | null;

  constructor(message: string, status: number | null) {
    super(message);
    this.name = 'BuildkiteApiError';
    this.status = status;
  }
}

/** Token is invalid or lacks the required scope (401/403). */
export class AuthError extends BuildkiteApiError {
  constructor(message: string, status: number) {
    super(message, status);
    this.name = 'AuthError';
  }
}

/** Pipeline or build does not exist (404). */
export class NotFoundError extends BuildkiteApiError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/** Network failure, timeout, unexpected status or unparseable body. */
export class TransportError extends BuildkiteApiError {
  constructor(message: string, status: number | null = null) {
    super(message, status);
    this.name = 'TransportError';
  }
}
