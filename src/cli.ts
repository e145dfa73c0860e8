#!/usr/bin/env node

import { Command } from "commander";
import { registerAuthCommand } from "./commands/auth";
import { registerCacheCommand } from "./commands/cache";
import { registerCopyCommand } from "./commands/copy";
import { registerPlaylistsCommand } from "./commands/playlists";
import { registerTracksCommand } from "./commands/tracks";
import { ReauthenticationRequiredError } from "./lib/errors";

const program = new Command();

program
  .name("tracksift")
  .description("Browse, enrich and filter Spotify playlists")
  .version("1.0.0");

registerAuthCommand(program);
registerPlaylistsCommand(program);
registerTracksCommand(program);
registerCopyCommand(program);
registerCacheCommand(program);

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  if (error instanceof ReauthenticationRequiredError) {
    console.error("Run `tracksift auth login` to sign in again.");
  }
  process.exitCode = 1;
});
