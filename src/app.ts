import type Database from "better-sqlite3";
import { DEFAULT_SESSION, FileCredentialStore, type CredentialStore } from "./auth/credentials";
import { createTokenClient } from "./auth/tokenClient";
import { openDatabase } from "./db";
import { createAudioFeaturesCache } from "./enrichment/cache";
import { createTrackEnricher } from "./enrichment/orchestrator";
import { createAuthenticatedPipeline } from "./http/pipeline";
import type { FetchFn } from "./http/types";
import { requireSpotifyClient, type TracksiftConfig } from "./lib/config";
import { createReccoBeatsClient } from "./providers/reccobeats";
import { createArtistGenreLookup } from "./spotify/artists";
import { SpotifyClient } from "./spotify/client";
import { createPlaylistService, type PlaylistService } from "./spotify/playlists";
import { createTrackService, type TrackService } from "./spotify/tracks";

export type AppContext = {
  playlists: PlaylistService;
  tracks: TrackService;
  close(): void;
};

export type AppOptions = {
  sessionId?: string | undefined;
  credentials?: CredentialStore | undefined;
  fetchFn?: FetchFn | undefined;
  db?: Database.Database | undefined;
};

/**
 * Wires one session's services: credential store → pipeline → Spotify
 * client, plus the SQLite cache and ReccoBeats client behind the enricher.
 */
export function createApp(config: TracksiftConfig, options: AppOptions = {}): AppContext {
  const { clientId, clientSecret } = requireSpotifyClient(config);
  const sessionId = options.sessionId ?? DEFAULT_SESSION;
  const credentials = options.credentials ?? new FileCredentialStore(config.credentials.path);

  const tokenClient = createTokenClient({
    clientId,
    clientSecret,
    redirectUri: config.spotify.redirect_uri,
    accountsBaseUrl: config.spotify.accounts_base_url,
    fetchFn: options.fetchFn,
  });

  const pipeline = createAuthenticatedPipeline({
    sessionId,
    credentials,
    tokenClient,
    fetchFn: options.fetchFn,
  });
  const client = new SpotifyClient(pipeline, config.spotify.api_base_url);

  const db = options.db ?? openDatabase(config.database.path);
  const enricher = createTrackEnricher({
    genres: createArtistGenreLookup(client),
    audioFeatures: createReccoBeatsClient({
      baseUrl: config.reccobeats.base_url,
      fetchFn: options.fetchFn,
    }),
    cache: createAudioFeaturesCache(db),
  });

  return {
    playlists: createPlaylistService(client),
    tracks: createTrackService(client, enricher),
    close() {
      db.close();
    },
  };
}
