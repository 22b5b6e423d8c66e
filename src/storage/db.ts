import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

export type DB = Database.Database;

export const MEMORY_DB = ":memory:";

export function openDb(filename: string): DB {
  if (filename !== MEMORY_DB && filename !== "") {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }
  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  applyMigrations(db);
  return db;
}

function applyMigrations(db: DB) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS signatures (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      extension TEXT NOT NULL,
      magic_bytes TEXT NOT NULL,
      byte_offset INTEGER NOT NULL DEFAULT 0,
      description TEXT,
      mime_type TEXT,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      UNIQUE (extension, magic_bytes, byte_offset)
    );

    CREATE INDEX IF NOT EXISTS idx_signatures_extension
      ON signatures (extension);
  `);
}

export function hasTable(db: DB, name: string): boolean {
  const row = db
    .prepare<[string], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name = ?"
    )
    .get(name);
  return !!row?.name;
}
