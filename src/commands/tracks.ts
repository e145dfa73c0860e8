import { Command } from "commander";
import { groupTracksByDecade, groupTracksByGenre } from "../domain/playlist";
import type { Track } from "../domain/track";
import { formatGroups, formatTrackList, formatTracksAsJson, normalizeFormat } from "../formatting";
import { log } from "../lib/logger";
import { parseIntegerOption, withApp } from "./session";

type TracksOptions = {
  groupBy?: string;
  offset?: string;
  limit?: string;
  format?: string;
  session?: string;
};

export type GroupBy = "genre" | "decade";

export function normalizeGroupBy(value: string | undefined): GroupBy | undefined {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase();
  if (normalized === "genre" || normalized === "decade") {
    return normalized;
  }
  throw new Error("--group-by must be genre or decade.");
}

export function groupTracks(tracks: readonly Track[], groupBy: GroupBy): Map<string, Track[]> {
  return groupBy === "genre" ? groupTracksByGenre(tracks) : groupTracksByDecade(tracks);
}

export async function runTracks(playlistId: string, options: TracksOptions): Promise<void> {
  const format = normalizeFormat(options.format);
  const groupBy = normalizeGroupBy(options.groupBy);
  const page = {
    offset: parseIntegerOption(options.offset, "--offset"),
    limit: parseIntegerOption(options.limit, "--limit"),
  };

  const { playlist, result } = await withApp(async (app, signal) => {
    const details = await app.playlists.getPlaylist(playlistId, signal);
    const tracks = await app.tracks.getPlaylistTracks(details.id, page, signal);
    return { playlist: details, result: tracks };
  }, options.session);
  const { audio } = result.stats;
  log(
    `[tracks] ${result.tracks.length}/${result.total} tracks, ${result.skipped} skipped; ` +
      `audio features: ${audio.cacheHits} cached, ${audio.found} fetched, ${audio.notFound} missing`
  );

  const groups = groupBy ? groupTracks(result.tracks, groupBy) : undefined;
  if (format === "json") {
    console.log(formatTracksAsJson(playlist, result.tracks, groups));
    return;
  }
  console.log(`${playlist.name} (${result.total} tracks)`);
  console.log(groups ? formatGroups(groups) : formatTrackList(result.tracks).join("\n"));
}

export function registerTracksCommand(program: Command): void {
  program
    .command("tracks")
    .description("Show a playlist's tracks with genres and audio features")
    .argument("<playlistId>", "Spotify playlist id")
    .option("--group-by <key>", "Group tracks by genre or decade")
    .option("--offset <n>", "Index of the first track")
    .option("--limit <n>", "Number of tracks (max 100)")
    .option("--format <format>", "Output format (text|json)", "text")
    .option("--session <id>", "Session id")
    .action(async (playlistId: string, options: TracksOptions) => {
      await runTracks(playlistId, options);
    });
}
