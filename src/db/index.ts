import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { schemaStatements } from "./schema";

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const directory = path.dirname(dbPath);
    fs.mkdirSync(directory, { recursive: true });
  }
  const db = new Database(dbPath);
  // WAL lets readers proceed while an enrichment run is writing
  db.pragma("journal_mode = WAL");
  return db;
}

export function applySchema(db: Database.Database): void {
  for (const statement of schemaStatements) {
    db.exec(statement);
  }
}
