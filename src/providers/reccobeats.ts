/**
 * ReccoBeats provider: audio features for Spotify track ids.
 *
 * API: https://reccobeats.com/docs
 * Endpoints:
 *   GET /v1/track?ids=:spotifyId       → { content: [{ id, trackTitle, href }] }
 *   GET /v1/track/:id/audio-features   → acousticness, danceability, energy, ...
 *
 * The features endpoint takes ReccoBeats' own track id, so every lookup is
 * two requests. Responds 404 for tracks it has not analysed and 429
 * (optionally with Retry-After seconds) when rate limited.
 */

import { throwIfAborted, type Delay } from "../lib/abort";
import { parseAudioFeatures, type AudioFeatures } from "../domain/track";
import { isCancellation } from "../lib/errors";
import { debug, describeError, warn } from "../lib/logger";
import { withRateLimitRetry } from "../lib/retry";
import type { FetchFn } from "../http/types";

// --- Types ---

export type ReccoBeatsClientOptions = {
  baseUrl?: string | undefined;
  fetchFn?: FetchFn | undefined;
  /** Backoff between 429 retries; tests pass a fake. */
  delay?: Delay | undefined;
  maxRetries?: number | undefined;
  defaultRetryDelayMs?: number | undefined;
};

export interface AudioFeaturesClient {
  fetchOne(trackId: string, signal?: AbortSignal): Promise<AudioFeatures | null>;
}

// --- Constants ---

const RECCOBEATS_BASE = "https://api.reccobeats.com";
const MAX_RETRIES = 3;
const DEFAULT_RETRY_DELAY_MS = 2000;

// --- Client ---

export function createReccoBeatsClient(options: ReccoBeatsClientOptions = {}): AudioFeaturesClient {
  const baseUrl = (options.baseUrl ?? RECCOBEATS_BASE).replace(/\/+$/, "");
  const fetchFn: FetchFn = options.fetchFn ?? fetch;

  async function getJson(
    url: string,
    label: string,
    signal: AbortSignal | undefined
  ): Promise<unknown> {
    const init: RequestInit = { headers: { Accept: "application/json" } };
    if (signal) init.signal = signal;

    const { response, exhausted } = await withRateLimitRetry(() => fetchFn(url, init), {
      label,
      maxRetries: options.maxRetries ?? MAX_RETRIES,
      defaultDelayMs: options.defaultRetryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
      delay: options.delay,
      signal,
    });

    if (response.ok) {
      return response.json();
    }

    await response.body?.cancel();
    if (exhausted) {
      warn(`[reccobeats] Rate limit retries exhausted for ${label}`);
    } else if (response.status === 404) {
      debug(`[reccobeats] 404 for ${label}`);
    } else {
      warn(`[reccobeats] API ${response.status} for ${label}`);
    }
    return null;
  }

  /** Spotify id → ReccoBeats id, or null when ReccoBeats does not know the track. */
  async function lookupTrackId(spotifyId: string, signal?: AbortSignal): Promise<string | null> {
    const payload = await getJson(
      `${baseUrl}/v1/track?ids=${encodeURIComponent(spotifyId)}`,
      `track lookup ${spotifyId}`,
      signal
    );
    if (typeof payload !== "object" || payload === null || !("content" in payload)) {
      return null;
    }
    const { content } = payload;
    if (!Array.isArray(content)) return null;

    const first: unknown = content[0];
    if (typeof first === "object" && first !== null && "id" in first) {
      return typeof first.id === "string" && first.id.length > 0 ? first.id : null;
    }
    return null;
  }

  /**
   * Best-effort lookup: unknown tracks, 404, exhausted retries, other HTTP
   * errors and malformed payloads all come back as null. Only cancellation
   * throws.
   */
  async function fetchOne(trackId: string, signal?: AbortSignal): Promise<AudioFeatures | null> {
    try {
      // Step 1: ReccoBeats' own id for the Spotify track
      const reccoId = await lookupTrackId(trackId, signal);
      if (!reccoId) {
        debug(`[reccobeats] Track ${trackId} not found in ReccoBeats`);
        return null;
      }

      // Step 2: features by ReccoBeats id
      throwIfAborted(signal);
      const payload = await getJson(
        `${baseUrl}/v1/track/${encodeURIComponent(reccoId)}/audio-features`,
        `audio features ${trackId}`,
        signal
      );
      if (payload === null) return null;

      const features = parseAudioFeatures(payload);
      if (!features) {
        warn(`[reccobeats] Malformed audio features payload for track ${trackId}`);
      }
      return features;
    } catch (err) {
      if (isCancellation(err, signal)) throw err;
      warn(`[reccobeats] Request failed for track ${trackId}: ${describeError(err)}`);
      return null;
    }
  }

  return { fetchOne };
}
