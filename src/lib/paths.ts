import os from "os";
import path from "path";

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function defaultConfigDir(): string {
  return path.join(os.homedir(), ".config", "tracksift");
}

export function defaultConfigPath(): string {
  return path.join(defaultConfigDir(), "config.yaml");
}

export function defaultCredentialsPath(): string {
  return path.join(defaultConfigDir(), "credentials.json");
}

export function defaultDatabasePath(): string {
  return path.join(os.homedir(), ".local", "share", "tracksift", "tracks_cache.db");
}
