import { Command } from "commander";
import { allOf, genreFilter, yearRangeFilter, type TrackFilter } from "../domain/filters";
import type { Track } from "../domain/track";
import { copyFilteredTracks } from "../services/copy";
import { MAX_TRACKS_PAGE, type TrackService } from "../spotify/tracks";
import { log } from "../lib/logger";
import { parseIntegerOption, withApp } from "./session";

type CopyCommandOptions = {
  genre?: string;
  yearMin?: string;
  yearMax?: string;
  name?: string;
  dryRun?: boolean;
  session?: string;
};

export function buildFilters(options: CopyCommandOptions): TrackFilter[] {
  const filters: TrackFilter[] = [];
  if (options.genre?.trim()) {
    filters.push(genreFilter(options.genre));
  }
  const yearMin = parseIntegerOption(options.yearMin, "--year-min");
  const yearMax = parseIntegerOption(options.yearMax, "--year-max");
  if (yearMin !== undefined) {
    filters.push(yearRangeFilter(yearMin, yearMax));
  } else if (yearMax !== undefined) {
    throw new Error("--year-max requires --year-min.");
  }
  return filters;
}

export async function fetchAllTracks(
  service: TrackService,
  playlistId: string,
  signal: AbortSignal
): Promise<Track[]> {
  const tracks: Track[] = [];
  let offset = 0;
  for (;;) {
    const page = await service.getPlaylistTracks(
      playlistId,
      { offset, limit: MAX_TRACKS_PAGE },
      signal
    );
    tracks.push(...page.tracks);
    offset += MAX_TRACKS_PAGE;
    if (offset >= page.total) break;
  }
  return tracks;
}

export async function runCopy(playlistId: string, options: CopyCommandOptions): Promise<void> {
  const filter = allOf(buildFilters(options));

  const result = await withApp(async (app, signal) => {
    const tracks = await fetchAllTracks(app.tracks, playlistId, signal);
    log(`[copy] Loaded ${tracks.length} tracks from ${playlistId}`);
    return copyFilteredTracks({
      playlists: app.playlists,
      tracks,
      filter,
      playlistName: options.name,
      dryRun: options.dryRun,
      signal,
    });
  }, options.session);

  if (result.matched.length === 0) {
    console.log(`No tracks match ${filter.name}.`);
    return;
  }
  if (!result.playlist) {
    console.log(`${result.matched.length} tracks match ${filter.name} (dry run, nothing copied).`);
    return;
  }
  const verb = result.created ? "Created" : "Updated";
  console.log(
    `${verb} playlist "${result.playlist.name}" [${result.playlist.id}] with ${result.copied} tracks.`
  );
}

export function registerCopyCommand(program: Command): void {
  program
    .command("copy")
    .description("Copy the tracks matching a filter into a new or existing playlist")
    .argument("<playlistId>", "Source Spotify playlist id")
    .option("--genre <genre>", "Keep tracks of this genre")
    .option("--year-min <year>", "Keep tracks released in or after this year")
    .option("--year-max <year>", "Keep tracks released in or before this year")
    .option("--name <name>", "Target playlist name")
    .option("--dry-run", "Only report the matching tracks")
    .option("--session <id>", "Session id")
    .action(async (playlistId: string, options: CopyCommandOptions) => {
      await runCopy(playlistId, options);
    });
}
