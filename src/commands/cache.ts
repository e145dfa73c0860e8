import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { openDatabase } from "../db";
import { createAudioFeaturesCache, type AudioFeaturesCache } from "../enrichment/cache";

function withCache<T>(fn: (cache: AudioFeaturesCache) => T): T {
  const config = loadConfig();
  const db = openDatabase(config.database.path);
  try {
    return fn(createAudioFeaturesCache(db));
  } finally {
    db.close();
  }
}

export function runStats(): void {
  withCache((cache) => {
    const stats = cache.stats();
    console.log(
      JSON.stringify(
        {
          total: stats.total,
          oldest: stats.oldest,
          newest: stats.newest,
        },
        null,
        2
      )
    );
  });
}

export function runClear(): void {
  withCache((cache) => {
    const removed = cache.clear();
    console.log(`Cleared ${removed} cached audio feature entries.`);
  });
}

export function registerCacheCommand(program: Command): void {
  const cacheCmd = program
    .command("cache")
    .description("Inspect and manage the audio features cache");

  cacheCmd
    .command("stats")
    .description("Show cache statistics")
    .action(() => runStats());

  cacheCmd
    .command("clear")
    .description("Clear all cached audio features")
    .action(() => runClear());
}
