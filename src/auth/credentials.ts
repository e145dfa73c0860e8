import fs from "fs";
import path from "path";
import { expandHome } from "../lib/paths";
import { warn } from "../lib/logger";

export type Credential = {
  accessToken: string;
  refreshToken: string;
};

export const DEFAULT_SESSION = "default";

/**
 * Access/refresh token pairs keyed by session id.
 * The refresh path is the only writer of an existing session's access token.
 */
export interface CredentialStore {
  get(sessionId: string): Credential | null;
  store(sessionId: string, credential: Credential): void;
  updateAccessToken(sessionId: string, accessToken: string): Credential;
  clear(sessionId: string): void;
}

function withAccessToken(
  current: Credential | null,
  accessToken: string
): Credential {
  return { accessToken, refreshToken: current?.refreshToken ?? "" };
}

export function createMemoryCredentialStore(
  initial: Record<string, Credential> = {}
): CredentialStore {
  const sessions = new Map<string, Credential>(Object.entries(initial));

  return {
    get(sessionId) {
      return sessions.get(sessionId) ?? null;
    },
    store(sessionId, credential) {
      sessions.set(sessionId, { ...credential });
    },
    updateAccessToken(sessionId, accessToken) {
      const next = withAccessToken(sessions.get(sessionId) ?? null, accessToken);
      sessions.set(sessionId, next);
      return next;
    },
    clear(sessionId) {
      sessions.delete(sessionId);
    },
  };
}

function isCredential(value: unknown): value is Credential {
  if (typeof value !== "object" || value === null) return false;
  const record = value as Record<string, unknown>;
  return typeof record.accessToken === "string" && typeof record.refreshToken === "string";
}

/**
 * JSON file of sessions, e.g. ~/.config/tracksift/credentials.json.
 * Written with mode 0600 on every change.
 */
export class FileCredentialStore implements CredentialStore {
  private readonly storePath: string;
  private sessions: Record<string, Credential> = {};

  constructor(storePath: string) {
    this.storePath = expandHome(storePath);
    this.load();
  }

  private load(): void {
    if (!fs.existsSync(this.storePath)) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.storePath, "utf-8"));
    } catch (err) {
      warn(
        `[auth] Ignoring unreadable credentials file ${this.storePath}: ${err instanceof Error ? err.message : err}`
      );
      return;
    }

    if (typeof parsed !== "object" || parsed === null) return;
    for (const [sessionId, value] of Object.entries(parsed)) {
      if (isCredential(value)) {
        this.sessions[sessionId] = { accessToken: value.accessToken, refreshToken: value.refreshToken };
      }
    }
  }

  private save(): void {
    fs.mkdirSync(path.dirname(this.storePath), { recursive: true });
    fs.writeFileSync(this.storePath, JSON.stringify(this.sessions, null, 2), { mode: 0o600 });
  }

  get(sessionId: string): Credential | null {
    return this.sessions[sessionId] ?? null;
  }

  store(sessionId: string, credential: Credential): void {
    this.sessions[sessionId] = { ...credential };
    this.save();
  }

  updateAccessToken(sessionId: string, accessToken: string): Credential {
    const next = withAccessToken(this.get(sessionId), accessToken);
    this.sessions[sessionId] = next;
    this.save();
    return next;
  }

  clear(sessionId: string): void {
    delete this.sessions[sessionId];
    this.save();
  }
}
