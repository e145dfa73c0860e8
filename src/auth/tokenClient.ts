import { SpotifyApiError, buildErrorMessage } from "../lib/errors";
import { debug } from "../lib/logger";
import type { FetchFn } from "../http/types";

const DEFAULT_ACCOUNTS_BASE = "https://accounts.spotify.com";

export type TokenResponse = {
  accessToken: string;
  refreshToken?: string | undefined;
  expiresIn?: number | undefined;
};

export type TokenClientOptions = {
  clientId: string;
  clientSecret: string;
  redirectUri?: string | undefined;
  accountsBaseUrl?: string | undefined;
  fetchFn?: FetchFn | undefined;
};

export interface TokenClient {
  refreshAccessToken(refreshToken: string, signal?: AbortSignal): Promise<TokenResponse>;
  exchangeCode(code: string, signal?: AbortSignal): Promise<TokenResponse>;
}

export function basicAuthHeader(clientId: string, clientSecret: string): string {
  return `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString("base64")}`;
}

function parseTokenBody(bodyText: string): TokenResponse {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch {
    throw new SpotifyApiError(200, "Spotify token response was not valid JSON");
  }

  const record = (typeof parsed === "object" && parsed !== null ? parsed : {}) as {
    access_token?: unknown;
    refresh_token?: unknown;
    expires_in?: unknown;
  };

  if (typeof record.access_token !== "string" || record.access_token.length === 0) {
    throw new SpotifyApiError(200, "Spotify token response did not include access_token");
  }

  return {
    accessToken: record.access_token,
    refreshToken: typeof record.refresh_token === "string" ? record.refresh_token : undefined,
    expiresIn: typeof record.expires_in === "number" ? record.expires_in : undefined,
  };
}

/**
 * Stateless client for the Spotify accounts token endpoint.
 */
export function createTokenClient(options: TokenClientOptions): TokenClient {
  const fetchFn: FetchFn = options.fetchFn ?? fetch;
  const baseUrl = (options.accountsBaseUrl ?? DEFAULT_ACCOUNTS_BASE).replace(/\/+$/, "");
  const authorization = basicAuthHeader(options.clientId, options.clientSecret);

  async function requestToken(
    params: Record<string, string>,
    signal?: AbortSignal
  ): Promise<TokenResponse> {
    const init: RequestInit = {
      method: "POST",
      headers: {
        Authorization: authorization,
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json",
      },
      body: new URLSearchParams(params).toString(),
    };
    if (signal) init.signal = signal;

    const response = await fetchFn(`${baseUrl}/api/token`, init);
    const bodyText = await response.text();

    if (!response.ok) {
      throw new SpotifyApiError(response.status, buildErrorMessage(response.status, bodyText));
    }

    return parseTokenBody(bodyText);
  }

  return {
    async refreshAccessToken(refreshToken, signal) {
      debug("[auth] Refreshing access token");
      return requestToken({ grant_type: "refresh_token", refresh_token: refreshToken }, signal);
    },

    async exchangeCode(code, signal) {
      if (!options.redirectUri) {
        throw new Error("A redirect URI is required to exchange an authorization code.");
      }
      debug("[auth] Exchanging authorization code for tokens");
      return requestToken(
        { grant_type: "authorization_code", code, redirect_uri: options.redirectUri },
        signal
      );
    },
  };
}
