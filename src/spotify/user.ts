import type { SpotifyClient } from "./client";
import type { SpotifyUser } from "./types";

export async function getCurrentUser(
  client: SpotifyClient,
  signal?: AbortSignal
): Promise<SpotifyUser> {
  return client.getJson<SpotifyUser>("me", signal);
}
