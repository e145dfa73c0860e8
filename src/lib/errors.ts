export class SpotifyApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "SpotifyApiError";
    this.status = status;
  }
}

/**
 * The stored credential can no longer be used: a request came back 401 and
 * the refresh token could not be exchanged for a new access token.
 */
export class ReauthenticationRequiredError extends Error {
  readonly sessionId: string;
  readonly status: number;

  constructor(sessionId: string, reason: string, status = 401) {
    super(`Spotify session "${sessionId}" needs to re-authenticate: ${reason}`);
    this.name = "ReauthenticationRequiredError";
    this.sessionId = sessionId;
    this.status = status;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function isAbortError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return err.name === "AbortError" || err.name === "TimeoutError";
}

/**
 * True for an abort error, or for any error once `signal` has fired: an
 * abort reason may be an arbitrary value.
 */
export function isCancellation(err: unknown, signal?: AbortSignal): boolean {
  return Boolean(signal?.aborted) || isAbortError(err);
}

/**
 * Errors that unwind through every enrichment layer instead of being
 * downgraded to a logged partial result.
 */
export function isPropagating(err: unknown, signal?: AbortSignal): boolean {
  return isCancellation(err, signal) || err instanceof ReauthenticationRequiredError;
}

type SpotifyErrorBody = {
  error?: { message?: string } | string;
  error_description?: string;
  message?: string;
};

function parseErrorBody(bodyText: string): SpotifyErrorBody | null {
  try {
    const parsed: unknown = JSON.parse(bodyText);
    return typeof parsed === "object" && parsed !== null ? (parsed as SpotifyErrorBody) : null;
  } catch {
    return null;
  }
}

export function buildErrorMessage(status: number, bodyText: string): string {
  if (!bodyText) {
    return `Spotify API request failed with status ${status}`;
  }

  const parsed = parseErrorBody(bodyText);
  if (parsed) {
    if (typeof parsed.error === "string") {
      const detail = parsed.error_description ? ` (${parsed.error_description})` : "";
      return `Spotify API request failed with status ${status}: ${parsed.error}${detail}`;
    }

    const errorMessage = parsed.error?.message || parsed.message;
    if (errorMessage) {
      return `Spotify API request failed with status ${status}: ${errorMessage}`;
    }
  }

  return `Spotify API request failed with status ${status}: ${bodyText}`;
}
