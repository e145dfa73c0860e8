import { describe, expect, it, vi } from "vitest";
import { buildAuthorizeUrl } from "../src/auth/authorize";
import { basicAuthHeader, createTokenClient } from "../src/auth/tokenClient";
import { SpotifyApiError } from "../src/lib/errors";
import { jsonResponse } from "./helpers";

describe("token client", () => {
  it("posts a refresh_token grant with basic client auth", async () => {
    const fetchFn = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ access_token: "new-token", token_type: "Bearer", expires_in: 3600 })
    );
    const client = createTokenClient({
      clientId: "client-id",
      clientSecret: "test-secret",
      accountsBaseUrl: "https://accounts.spotify.test/",
      fetchFn,
    });

    const tokens = await client.refreshAccessToken("refresh-1");

    expect(tokens).toEqual({ accessToken: "new-token", refreshToken: undefined, expiresIn: 3600 });
    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe("https://accounts.spotify.test/api/token");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe("grant_type=refresh_token&refresh_token=refresh-1");
    const headers = new Headers(init?.headers);
    expect(headers.get("Authorization")).toBe(
      `Basic ${Buffer.from("client-id:test-secret").toString("base64")}`
    );
    expect(headers.get("Content-Type")).toBe("application/x-www-form-urlencoded");
  });

  it("exchanges an authorization code with the redirect uri", async () => {
    const fetchFn = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ access_token: "access-1", refresh_token: "refresh-1" })
    );
    const client = createTokenClient({
      clientId: "client-id",
      clientSecret: "test-secret",
      redirectUri: "http://127.0.0.1:8888/callback",
      fetchFn,
    });

    const tokens = await client.exchangeCode("code-1");

    expect(tokens.refreshToken).toBe("refresh-1");
    expect(fetchFn.mock.calls[0]?.[1]?.body).toBe(
      "grant_type=authorization_code&code=code-1&redirect_uri=http%3A%2F%2F127.0.0.1%3A8888%2Fcallback"
    );
  });

  it("refuses to exchange a code without a redirect uri", async () => {
    const client = createTokenClient({
      clientId: "client-id",
      clientSecret: "test-secret",
      fetchFn: vi.fn(async () => jsonResponse({})),
    });

    await expect(client.exchangeCode("code-1")).rejects.toThrow(
      "A redirect URI is required to exchange an authorization code."
    );
  });

  it("surfaces the accounts error as SpotifyApiError", async () => {
    const client = createTokenClient({
      clientId: "client-id",
      clientSecret: "test-secret",
      fetchFn: vi.fn(async () =>
        jsonResponse({ error: "invalid_grant", error_description: "Refresh token revoked" }, 400)
      ),
    });

    const failure = client.refreshAccessToken("refresh-1");

    await expect(failure).rejects.toBeInstanceOf(SpotifyApiError);
    await expect(failure).rejects.toThrow(
      "Spotify API request failed with status 400: invalid_grant (Refresh token revoked)"
    );
  });

  it("rejects a token response without access_token", async () => {
    const client = createTokenClient({
      clientId: "client-id",
      clientSecret: "test-secret",
      fetchFn: vi.fn(async () => jsonResponse({ token_type: "Bearer" })),
    });

    await expect(client.refreshAccessToken("refresh-1")).rejects.toThrow(
      "Spotify token response did not include access_token"
    );
  });

  it("builds the basic header from id and secret", () => {
    expect(basicAuthHeader("id", "secret")).toBe("Basic aWQ6c2VjcmV0");
  });
});

describe("buildAuthorizeUrl", () => {
  it("includes the code flow parameters", () => {
    const url = new URL(
      buildAuthorizeUrl({
        clientId: "client-id",
        redirectUri: "http://127.0.0.1:8888/callback",
        scopes: "playlist-read-private",
        state: "state-1",
        accountsBaseUrl: "https://accounts.spotify.test",
      })
    );

    expect(url.origin + url.pathname).toBe("https://accounts.spotify.test/authorize");
    expect(url.searchParams.get("client_id")).toBe("client-id");
    expect(url.searchParams.get("response_type")).toBe("code");
    expect(url.searchParams.get("redirect_uri")).toBe("http://127.0.0.1:8888/callback");
    expect(url.searchParams.get("scope")).toBe("playlist-read-private");
    expect(url.searchParams.get("state")).toBe("state-1");
  });
});
