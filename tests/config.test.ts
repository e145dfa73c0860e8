import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../src/app";
import { createMemoryCredentialStore, FileCredentialStore } from "../src/auth/credentials";
import { openDatabase } from "../src/db";
import { ConfigError } from "../src/lib/errors";
import { loadConfig, requireSpotifyClient } from "../src/lib/config";
import { setLogLevel } from "../src/lib/logger";
import { jsonResponse } from "./helpers";

describe("config and credentials", () => {
  let dir: string;

  beforeAll(() => {
    setLogLevel("silent");
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tracksift-test-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults without a config file", () => {
    const config = loadConfig({ TRACKSIFT_CONFIG_PATH: path.join(dir, "missing.yaml") });

    expect(config.spotify.client_id).toBe("");
    expect(config.spotify.redirect_uri).toBe("http://127.0.0.1:8888/callback");
    expect(config.spotify.api_base_url).toBe("https://api.spotify.com/v1");
    expect(config.reccobeats.base_url).toBe("https://api.reccobeats.com");
  });

  it("reads the yaml file and lets the environment override it", () => {
    const configPath = path.join(dir, "config.yaml");
    fs.writeFileSync(
      configPath,
      [
        "spotify:",
        "  client_id: file-client",
        "  client_secret: test-secret",
        "reccobeats:",
        "  base_url: https://reccobeats.test",
        "database:",
        `  path: ${path.join(dir, "cache.db")}`,
      ].join("\n")
    );

    const config = loadConfig({
      TRACKSIFT_CONFIG_PATH: configPath,
      TRACKSIFT_SPOTIFY_CLIENT_ID: "env-client",
    });

    expect(config.spotify.client_id).toBe("env-client");
    expect(config.spotify.client_secret).toBe("test-secret");
    expect(config.reccobeats.base_url).toBe("https://reccobeats.test");
    expect(config.database.path).toBe(path.join(dir, "cache.db"));
  });

  it("names the missing app credentials", () => {
    const config = loadConfig({ TRACKSIFT_CONFIG_PATH: path.join(dir, "missing.yaml") });

    expect(() => requireSpotifyClient(config)).toThrow(ConfigError);
    expect(() => requireSpotifyClient(config)).toThrow(
      /Missing Spotify app credentials: spotify\.client_id, spotify\.client_secret\./
    );
  });

  it("persists sessions to a private file", () => {
    const storePath = path.join(dir, "nested", "credentials.json");
    const store = new FileCredentialStore(storePath);

    store.store("default", { accessToken: "access-1", refreshToken: "refresh-1" });
    store.updateAccessToken("default", "access-2");

    const reloaded = new FileCredentialStore(storePath);
    expect(reloaded.get("default")).toEqual({ accessToken: "access-2", refreshToken: "refresh-1" });
    expect(fs.statSync(storePath).mode & 0o777).toBe(0o600);

    reloaded.clear("default");
    expect(new FileCredentialStore(storePath).get("default")).toBeNull();
  });

  it("ignores an unreadable credentials file", () => {
    const storePath = path.join(dir, "credentials.json");
    fs.writeFileSync(storePath, "{oops");

    expect(new FileCredentialStore(storePath).get("default")).toBeNull();
  });

  it("wires an app that sends requests through the session's credentials", async () => {
    const config = loadConfig({
      TRACKSIFT_CONFIG_PATH: path.join(dir, "missing.yaml"),
      TRACKSIFT_SPOTIFY_CLIENT_ID: "client-id",
      TRACKSIFT_SPOTIFY_CLIENT_SECRET: "test-secret",
    });
    const requests: Array<{ url: string; auth: string | null }> = [];
    const app = createApp(config, {
      credentials: createMemoryCredentialStore({
        default: { accessToken: "access-1", refreshToken: "refresh-1" },
      }),
      fetchFn: async (url, init) => {
        requests.push({ url, auth: new Headers(init?.headers).get("Authorization") });
        return jsonResponse({ items: [], limit: 50, offset: 0, total: 0, next: null });
      },
      db: openDatabase(":memory:"),
    });

    try {
      expect(await app.playlists.getUserPlaylists()).toEqual([]);
    } finally {
      app.close();
    }
    expect(requests).toEqual([
      { url: "https://api.spotify.com/v1/me/playlists?limit=50", auth: "Bearer access-1" },
    ]);
  });
});
