/**
 * Error taxonomy for the relay.
 * Every error carries a message that is safe to hand back to the calling agent.
 */

/**
 * Error categories for classifying different types of failures.
 */
export type ErrorCategory =
  | 'configuration'  // Required credential or env var missing
  | 'validation'     // Malformed date/datetime input
  | 'upstream_auth'  // Strava token refresh failed
  | 'transport';     // Timeout, DNS or connection failure

/**
 * Source of the error - which API or component caused it.
 */
export type ErrorSource = 'intervals' | 'strava' | 'config' | 'input';

/**
 * Base error class for all relay errors.
 */
export class ApiError extends Error {
  public override readonly name: string = 'ApiError';

  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly source: ErrorSource,
    public readonly statusCode?: number
  ) {
    super(message);
    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ApiError);
    }
  }
}

/**
 * A required credential or env var is absent. Raised before any network call.
 */
export class ConfigError extends ApiError {
  public override readonly name = 'ConfigError';

  constructor(
    /** Env var names that are missing */
    public readonly missing: string[],
    source: ErrorSource = 'config'
  ) {
    super(ConfigError.buildMessage(missing), 'configuration', source);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }

  private static buildMessage(missing: string[]): string {
    if (missing.length === 1) {
      return `Missing ${missing[0]} env var`;
    }
    return `Missing env vars: ${missing.join(', ')}`;
  }
}

/**
 * A tool input doesn't match its expected format.
 */
export class ValidationError extends ApiError {
  public override readonly name = 'ValidationError';

  constructor(
    /** The parameter name (e.g., "oldest", "start_date_local") */
    public readonly field: string,
    /** Human-readable format, e.g. "YYYY-MM-DD" */
    public readonly expectedFormat: string,
    /** The input string that was rejected */
    public readonly input: string
  ) {
    super(`${field} must be ${expectedFormat}`, 'validation', 'input');

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}

/**
 * The Strava token refresh itself failed. There is no further fallback,
 * so this is surfaced to the caller with the upstream status and body.
 */
export class UpstreamAuthError extends ApiError {
  public override readonly name = 'UpstreamAuthError';

  constructor(
    message: string,
    statusCode: number,
    /** Parsed JSON body, or `{ raw }` when the body wasn't JSON */
    public readonly body: unknown
  ) {
    super(message, 'upstream_auth', 'strava', statusCode);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamAuthError);
    }
  }

  /**
   * Create an error from a failed token refresh response.
   */
  static fromRefreshResponse(statusCode: number, body: unknown): UpstreamAuthError {
    return new UpstreamAuthError(`Strava token refresh failed with status ${statusCode}`, statusCode, body);
  }

  /**
   * Re-wrap a refresh failure that happened while recovering from a 401.
   */
  static afterUnauthorized(activityId: string, cause: UpstreamAuthError): UpstreamAuthError {
    return new UpstreamAuthError(
      `Strava returned 401 for activity ${activityId} and the token refresh failed: ${cause.message}`,
      cause.statusCode ?? 0,
      cause.body
    );
  }
}

/**
 * The request never produced an HTTP response (timeout, DNS, connection reset).
 */
export class TransportError extends ApiError {
  public override readonly name = 'TransportError';

  constructor(
    message: string,
    source: ErrorSource,
    /** Request URL without query string */
    public readonly url: string
  ) {
    super(message, 'transport', source);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransportError);
    }
  }

  /**
   * Create an error for network/connection issues.
   */
  static fromCause(url: string, source: ErrorSource, originalError?: unknown): TransportError {
    let detail = '';
    if (originalError instanceof Error) {
      detail = originalError.name === 'TimeoutError'
        ? ': request timed out'
        : `: ${originalError.message}`;
    }
    return new TransportError(`Request to ${url} failed${detail}`, source, url);
  }

  /**
   * Re-wrap a token request that failed while recovering from a 401.
   */
  static afterUnauthorized(activityId: string, cause: TransportError): TransportError {
    return new TransportError(
      `Strava returned 401 for activity ${activityId} and the token refresh failed: ${cause.message}`,
      cause.source,
      cause.url
    );
  }
}
