import fs from "fs";
import yaml from "yaml";
import { ConfigError } from "./errors";
import {
  defaultConfigPath,
  defaultCredentialsPath,
  defaultDatabasePath,
  expandHome,
} from "./paths";

export const DEFAULT_SCOPES =
  "playlist-read-private playlist-modify-private playlist-modify-public user-read-recently-played";

export type TracksiftConfig = {
  spotify: {
    client_id: string;
    client_secret: string;
    redirect_uri: string;
    api_base_url: string;
    accounts_base_url: string;
    scopes: string;
  };
  reccobeats: {
    base_url: string;
  };
  database: {
    path: string;
  };
  credentials: {
    path: string;
  };
};

type PartialConfig = {
  spotify?: Partial<TracksiftConfig["spotify"]>;
  reccobeats?: Partial<TracksiftConfig["reccobeats"]>;
  database?: Partial<TracksiftConfig["database"]>;
  credentials?: Partial<TracksiftConfig["credentials"]>;
};

type Env = Record<string, string | undefined>;

const DEFAULT_CONFIG: TracksiftConfig = {
  spotify: {
    client_id: "",
    client_secret: "",
    redirect_uri: "http://127.0.0.1:8888/callback",
    api_base_url: "https://api.spotify.com/v1",
    accounts_base_url: "https://accounts.spotify.com",
    scopes: DEFAULT_SCOPES,
  },
  reccobeats: {
    base_url: "https://api.reccobeats.com",
  },
  database: {
    path: defaultDatabasePath(),
  },
  credentials: {
    path: defaultCredentialsPath(),
  },
};

function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  const raw = fs.readFileSync(configPath, "utf8");
  const parsed: unknown = yaml.parse(raw);
  if (parsed && typeof parsed === "object") {
    return parsed as PartialConfig;
  }
  return {};
}

function pick(
  envValue: string | undefined,
  fileValue: string | undefined,
  fallback: string
): string {
  const fromEnv = envValue?.trim();
  if (fromEnv) return fromEnv;
  if (typeof fileValue === "string" && fileValue.trim().length > 0) {
    return fileValue.trim();
  }
  return fallback;
}

/**
 * Defaults, then ~/.config/tracksift/config.yaml, then TRACKSIFT_* env vars.
 */
export function loadConfig(env: Env = process.env): TracksiftConfig {
  const configPath = expandHome(env.TRACKSIFT_CONFIG_PATH ?? defaultConfigPath());
  const file = readConfigFile(configPath);

  return {
    spotify: {
      client_id: pick(
        env.TRACKSIFT_SPOTIFY_CLIENT_ID,
        file.spotify?.client_id,
        DEFAULT_CONFIG.spotify.client_id
      ),
      client_secret: pick(
        env.TRACKSIFT_SPOTIFY_CLIENT_SECRET,
        file.spotify?.client_secret,
        DEFAULT_CONFIG.spotify.client_secret
      ),
      redirect_uri: pick(
        env.TRACKSIFT_SPOTIFY_REDIRECT_URI,
        file.spotify?.redirect_uri,
        DEFAULT_CONFIG.spotify.redirect_uri
      ),
      api_base_url: pick(
        env.TRACKSIFT_SPOTIFY_API_URL,
        file.spotify?.api_base_url,
        DEFAULT_CONFIG.spotify.api_base_url
      ),
      accounts_base_url: pick(
        env.TRACKSIFT_SPOTIFY_ACCOUNTS_URL,
        file.spotify?.accounts_base_url,
        DEFAULT_CONFIG.spotify.accounts_base_url
      ),
      scopes: pick(undefined, file.spotify?.scopes, DEFAULT_CONFIG.spotify.scopes),
    },
    reccobeats: {
      base_url: pick(
        env.TRACKSIFT_RECCOBEATS_URL,
        file.reccobeats?.base_url,
        DEFAULT_CONFIG.reccobeats.base_url
      ),
    },
    database: {
      path: expandHome(
        pick(env.TRACKSIFT_DB_PATH, file.database?.path, DEFAULT_CONFIG.database.path)
      ),
    },
    credentials: {
      path: expandHome(
        pick(
          env.TRACKSIFT_CREDENTIALS_PATH,
          file.credentials?.path,
          DEFAULT_CONFIG.credentials.path
        )
      ),
    },
  };
}

export function requireSpotifyClient(config: TracksiftConfig): {
  clientId: string;
  clientSecret: string;
} {
  const missing: string[] = [];
  if (!config.spotify.client_id) missing.push("spotify.client_id");
  if (!config.spotify.client_secret) missing.push("spotify.client_secret");
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing Spotify app credentials: ${missing.join(", ")}. ` +
        "Set them in config.yaml or via TRACKSIFT_SPOTIFY_CLIENT_ID / TRACKSIFT_SPOTIFY_CLIENT_SECRET."
    );
  }
  return {
    clientId: config.spotify.client_id,
    clientSecret: config.spotify.client_secret,
  };
}
