import { Command } from "commander";
import { formatPlaylists, normalizeFormat } from "../formatting";
import { withApp } from "./session";

type PlaylistsOptions = {
  format?: string;
  session?: string;
};

export async function runPlaylists(options: PlaylistsOptions): Promise<void> {
  const format = normalizeFormat(options.format);
  const playlists = await withApp(
    (app, signal) => app.playlists.getUserPlaylists(signal),
    options.session
  );

  if (format === "json") {
    console.log(JSON.stringify({ count: playlists.length, playlists }, null, 2));
    return;
  }
  console.log(formatPlaylists(playlists));
}

export function registerPlaylistsCommand(program: Command): void {
  program
    .command("playlists")
    .description("List the current user's playlists")
    .option("--format <format>", "Output format (text|json)", "text")
    .option("--session <id>", "Session id")
    .action(async (options: PlaylistsOptions) => {
      await runPlaylists(options);
    });
}
