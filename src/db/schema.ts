export const schemaStatements = [
  `
CREATE TABLE IF NOT EXISTS audio_features_cache (
  track_id TEXT PRIMARY KEY,
  features_json TEXT NOT NULL,
  created_at DATETIME DEFAULT CURRENT_TIMESTAMP
);
  `,
  // Redundant with the primary key, kept so lookups by track id are explicit
  `CREATE INDEX IF NOT EXISTS idx_audio_features_cache_track_id
   ON audio_features_cache(track_id);`,
];
