import { UNKNOWN_GENRE } from "../domain/track";
import { createBatchLookup, type BatchLookup } from "../enrichment/batchLookup";
import type { SpotifyClient } from "./client";
import type { ArtistsResponse } from "./types";

/**
 * artist id → primary genre via GET /artists?ids=a,b,c.
 * Artists without genres map to "unknown"; ids Spotify does not know are absent.
 */
export function createArtistGenreLookup(client: SpotifyClient): BatchLookup<string> {
  return createBatchLookup<string>({
    label: "genres",
    fetchBatch: async (ids, signal) => {
      const response = await client.getJson<ArtistsResponse>(
        `artists?ids=${ids.map(encodeURIComponent).join(",")}`,
        signal
      );

      const genres = new Map<string, string>();
      for (const artist of response?.artists ?? []) {
        if (!artist?.id) continue;
        genres.set(artist.id, artist.genres?.[0] ?? UNKNOWN_GENRE);
      }
      return genres;
    },
  });
}
