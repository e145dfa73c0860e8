import { trackIdsFilter, type TrackIdsFilter } from "../domain/filters";
import type { Track } from "../domain/track";
import { log } from "../lib/logger";

/**
 * Natural-language track selection, e.g. backed by a local LLM.
 * Implementations own their prompts; tracksift only consumes the results.
 */
export interface AiTrackFilterService {
  filterTracks(prompt: string, tracks: readonly Track[], signal?: AbortSignal): Promise<Set<string>>;
  generatePlaylistName(prompt: string, signal?: AbortSignal): Promise<string>;
}

export const DEFAULT_AI_PLAYLIST_NAME = "AI Filtered Playlist";
const MAX_PLAYLIST_NAME_LENGTH = 50;

export function normalizePlaylistName(raw: string): string {
  const name = raw.trim().replace(/^["']+|["']+$/g, "").trim();
  if (!name) return DEFAULT_AI_PLAYLIST_NAME;
  return name.length > MAX_PLAYLIST_NAME_LENGTH
    ? `${name.slice(0, MAX_PLAYLIST_NAME_LENGTH - 3)}...`
    : name;
}

/**
 * Runs the AI selection once and freezes it into a track-ids filter.
 * Ids the service returns that are not among `tracks` are dropped.
 */
export async function createAiTrackFilter(
  prompt: string,
  tracks: readonly Track[],
  service: AiTrackFilterService,
  signal?: AbortSignal
): Promise<TrackIdsFilter> {
  const matches = await service.filterTracks(prompt, tracks, signal);
  const name = normalizePlaylistName(await service.generatePlaylistName(prompt, signal));

  const known = new Set(tracks.map((t) => t.id));
  const ids = [...matches].filter((id) => known.has(id));

  log(`[ai] Matched ${ids.length} of ${tracks.length} tracks for prompt: ${prompt}`);
  return trackIdsFilter(prompt, name, ids);
}
