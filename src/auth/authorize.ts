import { DEFAULT_SCOPES } from "../lib/config";

export type AuthorizeUrlOptions = {
  clientId: string;
  redirectUri: string;
  scopes?: string | undefined;
  state?: string | undefined;
  accountsBaseUrl?: string | undefined;
};

/**
 * URL the user opens in a browser to grant access; Spotify redirects back
 * to `redirectUri` with `?code=...`.
 */
export function buildAuthorizeUrl(options: AuthorizeUrlOptions): string {
  const base = (options.accountsBaseUrl ?? "https://accounts.spotify.com").replace(/\/+$/, "");
  const params = new URLSearchParams({
    client_id: options.clientId,
    response_type: "code",
    redirect_uri: options.redirectUri,
    scope: options.scopes ?? DEFAULT_SCOPES,
  });
  if (options.state) {
    params.set("state", options.state);
  }
  return `${base}/authorize?${params.toString()}`;
}
