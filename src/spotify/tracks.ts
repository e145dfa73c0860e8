import type { Track } from "../domain/track";
import type { EnrichmentStats, TrackEnricher } from "../enrichment/orchestrator";
import { log } from "../lib/logger";
import type { SpotifyClient } from "./client";
import { isPlayableTrack, mapTrack, toTrackView } from "./mapping";
import type { PagingResponse, PlaylistTrackItem } from "./types";

/** Page size cap of GET /playlists/:id/tracks. */
export const MAX_TRACKS_PAGE = 100;

export type TrackPage = {
  offset?: number | undefined;
  limit?: number | undefined;
};

export type PlaylistTracks = {
  tracks: Track[];
  total: number;
  skipped: number;
  stats: EnrichmentStats;
};

export interface TrackService {
  getPlaylistTracks(playlistId: string, page?: TrackPage, signal?: AbortSignal): Promise<PlaylistTracks>;
}

function normalizePage(page: TrackPage | undefined): { offset: number; limit: number } {
  const offset =
    typeof page?.offset === "number" && Number.isFinite(page.offset) && page.offset > 0
      ? Math.floor(page.offset)
      : 0;
  const limit =
    typeof page?.limit === "number" && Number.isFinite(page.limit) && page.limit > 0
      ? Math.min(Math.floor(page.limit), MAX_TRACKS_PAGE)
      : MAX_TRACKS_PAGE;
  return { offset, limit };
}

export function createTrackService(client: SpotifyClient, enricher: TrackEnricher): TrackService {
  return {
    async getPlaylistTracks(playlistId, page, signal) {
      const { offset, limit } = normalizePage(page);
      const response = await client.getJson<PagingResponse<PlaylistTrackItem>>(
        `playlists/${encodeURIComponent(playlistId)}/tracks?offset=${offset}&limit=${limit}`,
        signal
      );

      const items = response.items ?? [];
      const playable = items.map((item) => item.track).filter(isPlayableTrack);
      const skipped = items.length - playable.length;

      const enrichment = await enricher.enrichTracks(playable.map(toTrackView), signal);
      const tracks = enrichment.tracks.map((view) =>
        mapTrack(view.dto, view.genre, view.audioFeatures)
      );

      log(`[tracks] Fetched ${tracks.length} tracks for playlist ${playlistId}`);
      return { tracks, total: response.total, skipped, stats: enrichment.stats };
    },
  };
}
