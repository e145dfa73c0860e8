import type { Playlist } from "../domain/playlist";
import { chunk } from "../lib/chunk";
import { debug, log } from "../lib/logger";
import type { SpotifyClient } from "./client";
import { mapPlaylist } from "./mapping";
import type {
  CreatePlaylistRequest,
  PagingResponse,
  SpotifyPlaylist,
} from "./types";
import { getCurrentUser } from "./user";

/** Spotify accepts at most 100 URIs per add-items call. */
export const PLAYLIST_WRITE_BATCH_SIZE = 100;
const PLAYLIST_PAGE_SIZE = 50;

export interface PlaylistService {
  getUserPlaylists(signal?: AbortSignal): Promise<Playlist[]>;
  getPlaylist(playlistId: string, signal?: AbortSignal): Promise<Playlist>;
  createPlaylist(name: string, description?: string, signal?: AbortSignal): Promise<Playlist>;
  addTracksToPlaylist(playlistId: string, uris: readonly string[], signal?: AbortSignal): Promise<number>;
  findPlaylistByName(name: string, signal?: AbortSignal): Promise<Playlist | null>;
  getOrCreatePlaylist(name: string, description?: string, signal?: AbortSignal): Promise<{
    playlist: Playlist;
    created: boolean;
  }>;
}

export function createPlaylistService(client: SpotifyClient): PlaylistService {
  async function getUserPlaylists(signal?: AbortSignal): Promise<Playlist[]> {
    const playlists: Playlist[] = [];
    let next: string | null = `me/playlists?limit=${PLAYLIST_PAGE_SIZE}`;

    while (next) {
      const page: PagingResponse<SpotifyPlaylist | null> = await client.getJson<
        PagingResponse<SpotifyPlaylist | null>
      >(next, signal);
      for (const item of page.items) {
        if (item) playlists.push(mapPlaylist(item));
      }
      next = page.next;
    }

    log(`[playlists] Fetched ${playlists.length} playlists`);
    return playlists;
  }

  async function getPlaylist(playlistId: string, signal?: AbortSignal): Promise<Playlist> {
    const dto = await client.getJson<SpotifyPlaylist>(
      `playlists/${encodeURIComponent(playlistId)}`,
      signal
    );
    return mapPlaylist(dto);
  }

  async function createPlaylist(
    name: string,
    description?: string,
    signal?: AbortSignal
  ): Promise<Playlist> {
    const user = await getCurrentUser(client, signal);
    const request: CreatePlaylistRequest = { name, public: false };
    if (description) request.description = description;

    const dto = await client.postJson<SpotifyPlaylist>(
      `users/${encodeURIComponent(user.id)}/playlists`,
      request,
      signal
    );
    const playlist = mapPlaylist(dto);
    log(`[playlists] Created playlist ${playlist.name} (${playlist.id})`);
    return playlist;
  }

  async function addTracksToPlaylist(
    playlistId: string,
    uris: readonly string[],
    signal?: AbortSignal
  ): Promise<number> {
    const batches = chunk(uris, PLAYLIST_WRITE_BATCH_SIZE);
    for (const [index, batch] of batches.entries()) {
      debug(`[playlists] Writing chunk ${index + 1}/${batches.length} size=${batch.length}`);
      await client.postJson<unknown>(
        `playlists/${encodeURIComponent(playlistId)}/tracks`,
        { uris: batch },
        signal
      );
    }
    log(`[playlists] Added ${uris.length} tracks to playlist ${playlistId}`);
    return uris.length;
  }

  async function findPlaylistByName(name: string, signal?: AbortSignal): Promise<Playlist | null> {
    const wanted = name.trim().toLowerCase();
    const playlists = await getUserPlaylists(signal);
    return playlists.find((p) => p.name.trim().toLowerCase() === wanted) ?? null;
  }

  async function getOrCreatePlaylist(
    name: string,
    description?: string,
    signal?: AbortSignal
  ): Promise<{ playlist: Playlist; created: boolean }> {
    const existing = await findPlaylistByName(name, signal);
    if (existing) {
      log(`[playlists] Found existing playlist ${existing.name} (${existing.id})`);
      return { playlist: existing, created: false };
    }
    return { playlist: await createPlaylist(name, description, signal), created: true };
  }

  return {
    getUserPlaylists,
    getPlaylist,
    createPlaylist,
    addTracksToPlaylist,
    findPlaylistByName,
    getOrCreatePlaylist,
  };
}
