import type { Credential, CredentialStore } from "../auth/credentials";
import type { TokenClient, TokenResponse } from "../auth/tokenClient";
import { throwIfAborted } from "../lib/abort";
import { ReauthenticationRequiredError } from "../lib/errors";
import { debug, error, log, warn } from "../lib/logger";
import type { FetchFn, OutboundRequest } from "./types";

export type RefreshLocks = Map<string, Promise<Credential>>;

export type PipelineOptions = {
  sessionId: string;
  credentials: CredentialStore;
  tokenClient: TokenClient;
  fetchFn?: FetchFn | undefined;
  /**
   * In-flight refreshes keyed by session. Pipelines serving the same session
   * must share one map so a 401 seen by several callers triggers one refresh.
   */
  refreshLocks?: RefreshLocks | undefined;
};

export interface AuthenticatedPipeline {
  readonly sessionId: string;
  send(request: OutboundRequest): Promise<Response>;
}

function toRequestInit(request: OutboundRequest, accessToken: string): RequestInit {
  const headers: Record<string, string> = {
    Accept: "application/json",
    ...request.headers,
  };
  if (accessToken) {
    headers.Authorization = `Bearer ${accessToken}`;
  }

  const init: RequestInit = { method: request.method ?? "GET", headers };
  if (request.body !== undefined) init.body = request.body;
  if (request.signal) init.signal = request.signal;
  return init;
}

/**
 * Wraps outbound calls to the primary API for one session: attaches the
 * bearer token and, on 401, refreshes once and re-sends once.
 */
export function createAuthenticatedPipeline(options: PipelineOptions): AuthenticatedPipeline {
  const { sessionId, credentials, tokenClient } = options;
  const fetchFn: FetchFn = options.fetchFn ?? fetch;
  const locks: RefreshLocks = options.refreshLocks ?? new Map();

  function dispatch(request: OutboundRequest, accessToken: string): Promise<Response> {
    debug(`[http] ${request.method ?? "GET"} ${request.url}`);
    return fetchFn(request.url, toRequestInit(request, accessToken));
  }

  async function runRefresh(): Promise<Credential> {
    const current = credentials.get(sessionId);
    if (!current?.refreshToken) {
      error(`[auth] No refresh token stored for session "${sessionId}"`);
      throw new ReauthenticationRequiredError(sessionId, "no refresh token stored");
    }

    let tokens: TokenResponse;
    try {
      tokens = await tokenClient.refreshAccessToken(current.refreshToken);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      error(`[auth] Token refresh failed for session "${sessionId}": ${reason}`);
      throw new ReauthenticationRequiredError(sessionId, `token refresh failed (${reason})`);
    }

    let next = credentials.updateAccessToken(sessionId, tokens.accessToken);
    if (tokens.refreshToken && tokens.refreshToken !== next.refreshToken) {
      next = { accessToken: tokens.accessToken, refreshToken: tokens.refreshToken };
      credentials.store(sessionId, next);
    }
    log(`[auth] Session "${sessionId}" updated with a new access token`);
    return next;
  }

  /**
   * Returns a usable credential after `staleToken` was rejected. Joins a
   * refresh already in flight, or skips refreshing when another caller has
   * already replaced the stale token.
   */
  function refreshAfter(staleToken: string): Promise<Credential> {
    const current = credentials.get(sessionId);
    if (current?.accessToken && current.accessToken !== staleToken) {
      return Promise.resolve(current);
    }

    const inFlight = locks.get(sessionId);
    if (inFlight) return inFlight;

    const pending = runRefresh().finally(() => {
      locks.delete(sessionId);
    });
    locks.set(sessionId, pending);
    return pending;
  }

  return {
    sessionId,

    async send(request) {
      const accessToken = credentials.get(sessionId)?.accessToken ?? "";
      const response = await dispatch(request, accessToken);

      if (response.status !== 401) {
        return response;
      }

      warn(`[auth] 401 from ${request.url}, attempting token refresh`);
      await response.body?.cancel();

      const refreshed = await refreshAfter(accessToken);

      throwIfAborted(request.signal);
      debug("[auth] Token refreshed, retrying request once");
      return dispatch(request, refreshed.accessToken);
    },
  };
}
