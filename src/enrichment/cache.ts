import type Database from "better-sqlite3";
import { applySchema } from "../db";
import { parseAudioFeatures, type AudioFeatures } from "../domain/track";
import { chunk } from "../lib/chunk";
import { describeError, warn } from "../lib/logger";

/** SQLite caps bound parameters per statement; stay well below it. */
export const CACHE_READ_BATCH_SIZE = 500;

// --- Types ---

export type CacheStats = {
  total: number;
  oldest: string | null;
  newest: string | null;
};

type CacheRow = {
  track_id: string;
  features_json: string;
};

// --- Cache Operations ---

/**
 * Audio features keyed by Spotify track id. An optimisation only: reads and
 * writes never throw, they log and fall back to a miss / no-op.
 */
export type AudioFeaturesCache = {
  getMany(trackIds: readonly string[]): Map<string, AudioFeatures>;
  put(trackId: string, features: AudioFeatures): boolean;
  stats(): CacheStats;
  clear(): number;
};

export function createAudioFeaturesCache(db: Database.Database): AudioFeaturesCache {
  applySchema(db);

  const upsertStmt = db.prepare(
    `INSERT OR REPLACE INTO audio_features_cache (track_id, features_json, created_at)
     VALUES (?, ?, CURRENT_TIMESTAMP)`
  );

  function decodeRow(row: CacheRow): AudioFeatures | null {
    try {
      return parseAudioFeatures(JSON.parse(row.features_json));
    } catch {
      return null;
    }
  }

  return {
    getMany(trackIds: readonly string[]): Map<string, AudioFeatures> {
      const results = new Map<string, AudioFeatures>();
      if (trackIds.length === 0) return results;

      try {
        for (const batch of chunk(trackIds, CACHE_READ_BATCH_SIZE)) {
          const placeholders = batch.map(() => "?").join(", ");
          const rows = db
            .prepare(
              `SELECT track_id, features_json FROM audio_features_cache
               WHERE track_id IN (${placeholders})`
            )
            .all(...batch) as CacheRow[];

          for (const row of rows) {
            const features = decodeRow(row);
            if (!features) {
              warn(`[cache] Skipping unreadable cache entry for track ${row.track_id}`);
              continue;
            }
            results.set(row.track_id, features);
          }
        }
      } catch (err) {
        warn(`[cache] Read failed, returning ${results.size} cached entries: ${describeError(err)}`);
      }

      return results;
    },

    put(trackId: string, features: AudioFeatures): boolean {
      try {
        upsertStmt.run(trackId, JSON.stringify(features));
        return true;
      } catch (err) {
        warn(`[cache] Failed to store audio features for track ${trackId}: ${describeError(err)}`);
        return false;
      }
    },

    // --- Stats ---

    stats(): CacheStats {
      const row = db
        .prepare(
          `SELECT
             COUNT(*) as total,
             MIN(created_at) as oldest,
             MAX(created_at) as newest
           FROM audio_features_cache`
        )
        .get() as { total: number; oldest: string | null; newest: string | null };
      return { total: row.total, oldest: row.oldest, newest: row.newest };
    },

    clear(): number {
      return db.prepare("DELETE FROM audio_features_cache").run().changes;
    },
  };
}
