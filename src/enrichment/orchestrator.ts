import { UNKNOWN_GENRE, type AudioFeatures } from "../domain/track";
import type { AudioFeaturesClient } from "../providers/reccobeats";
import { throwIfAborted } from "../lib/abort";
import { isPropagating } from "../lib/errors";
import { debug, describeError, log, warn } from "../lib/logger";
import type { BatchLookup } from "./batchLookup";
import type { AudioFeaturesCache } from "./cache";

/**
 * The slice of a track enrichment reads and decorates.
 * `primaryArtistId` is "" for tracks without artists.
 */
export type EnrichmentTrack = {
  id: string;
  primaryArtistId: string;
  genre: string;
  audioFeatures?: AudioFeatures | undefined;
};

export type EnrichmentStats = {
  tracks: number;
  uniqueArtists: number;
  genresResolved: number;
  audio: {
    requested: number;
    cacheHits: number;
    cacheMisses: number;
    apiCalls: number;
    found: number;
    notFound: number;
  };
};

export type EnrichmentResult<T extends EnrichmentTrack> = {
  tracks: T[];
  genres: Map<string, string>;
  audioFeatures: Map<string, AudioFeatures>;
  stats: EnrichmentStats;
};

export type TrackEnricherOptions = {
  genres: BatchLookup<string>;
  audioFeatures: AudioFeaturesClient;
  cache: AudioFeaturesCache;
  onProgress?: ((done: number, total: number, trackId: string) => void) | undefined;
};

export interface TrackEnricher {
  enrichTracks<T extends EnrichmentTrack>(
    tracks: readonly T[],
    signal?: AbortSignal
  ): Promise<EnrichmentResult<T>>;
  getAudioFeatures(
    trackIds: readonly string[],
    signal?: AbortSignal
  ): Promise<Map<string, AudioFeatures>>;
}

function emptyStats(tracks: number): EnrichmentStats {
  return {
    tracks,
    uniqueArtists: 0,
    genresResolved: 0,
    audio: {
      requested: 0,
      cacheHits: 0,
      cacheMisses: 0,
      apiCalls: 0,
      found: 0,
      notFound: 0,
    },
  };
}

/**
 * Decorates tracks with artist genres (Spotify) and audio features
 * (cache first, then ReccoBeats). Either half degrades to partial results;
 * only cancellation and re-authentication errors escape.
 */
export function createTrackEnricher(options: TrackEnricherOptions): TrackEnricher {
  const { genres: genreLookup, audioFeatures: featuresClient, cache, onProgress } = options;

  async function resolveGenres(
    artistIds: string[],
    signal: AbortSignal | undefined
  ): Promise<Map<string, string>> {
    if (artistIds.length === 0) return new Map();
    debug(`[enrich] Fetching genres for ${artistIds.length} artists`);
    try {
      return await genreLookup.resolveMany(artistIds, signal);
    } catch (err) {
      if (isPropagating(err, signal)) throw err;
      warn(`[enrich] Genre lookup failed: ${describeError(err)}`);
      return new Map();
    }
  }

  async function resolveAudioFeatures(
    trackIds: readonly string[],
    signal: AbortSignal | undefined,
    stats: EnrichmentStats["audio"]
  ): Promise<Map<string, AudioFeatures>> {
    const unique = [...new Set(trackIds)].filter((id) => id.length > 0);
    stats.requested = unique.length;
    if (unique.length === 0) return new Map();

    // Step 1: one batched cache read
    const featuresMap = cache.getMany(unique);
    stats.cacheHits = featuresMap.size;

    // Step 2: what the cache could not answer
    const missing = unique.filter((id) => !featuresMap.has(id));
    stats.cacheMisses = missing.length;
    log(`[enrich] Found ${featuresMap.size}/${unique.length} tracks in cache`);

    if (missing.length === 0) return featuresMap;

    // Step 3: sequential API lookups, one at a time for the rate limit
    log(`[enrich] Fetching ${missing.length} tracks from ReccoBeats`);
    try {
      for (const [index, trackId] of missing.entries()) {
        throwIfAborted(signal);
        onProgress?.(index + 1, missing.length, trackId);

        stats.apiCalls++;
        const features = await featuresClient.fetchOne(trackId, signal);
        if (!features) {
          stats.notFound++;
          continue;
        }

        stats.found++;
        featuresMap.set(trackId, features);
        cache.put(trackId, features);
      }
    } catch (err) {
      if (isPropagating(err, signal)) throw err;
      warn(
        `[enrich] Audio feature lookup failed, returning ${featuresMap.size} partial results: ${describeError(err)}`
      );
    }

    log(`[enrich] Audio features for ${featuresMap.size}/${unique.length} tracks (cache + API)`);
    return featuresMap;
  }

  return {
    async enrichTracks(tracks, signal) {
      const stats = emptyStats(tracks.length);

      // Step 1: distinct primary artists
      const artistIds = [
        ...new Set(tracks.map((t) => t.primaryArtistId).filter((id) => id.length > 0)),
      ];
      stats.uniqueArtists = artistIds.length;

      // Step 2: genres, batched
      const genres = await resolveGenres(artistIds, signal);
      stats.genresResolved = genres.size;
      throwIfAborted(signal);

      // Step 3: audio features
      const audioFeatures = await resolveAudioFeatures(
        tracks.map((t) => t.id),
        signal,
        stats.audio
      );

      // Step 4: new decorated values; inputs are left untouched
      const enriched = tracks.map((track) => ({
        ...track,
        genre: (track.primaryArtistId && genres.get(track.primaryArtistId)) || UNKNOWN_GENRE,
        audioFeatures: audioFeatures.get(track.id),
      }));

      log(`[enrich] Enriched ${tracks.length} tracks with genres and audio features`);
      return { tracks: enriched, genres, audioFeatures, stats };
    },

    async getAudioFeatures(trackIds, signal) {
      return resolveAudioFeatures(trackIds, signal, emptyStats(trackIds.length).audio);
    },
  };
}
