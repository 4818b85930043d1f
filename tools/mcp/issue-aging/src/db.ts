/**
 * Local SQLite database holding raw tracker responses.
 *
 * Each row is one response body exactly as the tracker sent it, keyed by
 * board and page (e.g. "board.42.issue.50"), with the time it was fetched.
 * Decoding happens later, so a cached body can be re-read after a schema
 * change without refetching.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { join, resolve } from "node:path";

// ─── Database Singleton ─────────────────────────────────

let _db: Database.Database | null = null;
let _dbPath: string | null = null;

export const DB_FILENAME = "cache.db";

/** Get or create the database under `cacheDir` */
export function getDb(cacheDir: string): Database.Database {
  const dbPath = join(resolve(cacheDir), DB_FILENAME);
  if (_db && _dbPath === dbPath) return _db;
  closeDb();

  if (!existsSync(cacheDir)) {
    mkdirSync(cacheDir, { recursive: true });
  }

  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");

  migrate(db);

  _db = db;
  _dbPath = dbPath;
  return db;
}

/** Close the database connection */
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
    _dbPath = null;
  }
}

// ─── Schema Migrations ──────────────────────────────────

const MIGRATIONS: Array<{ version: number; sql: string }> = [
  {
    version: 1,
    sql: `
      CREATE TABLE IF NOT EXISTS responses (
        key           TEXT PRIMARY KEY,                 -- board.<id>.issue.<startAt>
        url           TEXT NOT NULL,
        body          TEXT NOT NULL,                    -- raw JSON as received
        fetched_at    INTEGER NOT NULL                  -- epoch milliseconds
      );

      CREATE INDEX IF NOT EXISTS idx_responses_fetched ON responses(fetched_at);

      INSERT OR IGNORE INTO schema_version (version) VALUES (1);
    `,
  },
];

/** Run pending migrations */
function migrate(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version       INTEGER PRIMARY KEY,
      applied_at    TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db.prepare("SELECT MAX(version) as v FROM schema_version").get() as
    | { v: number | null }
    | undefined;
  const currentVersion = row?.v ?? 0;

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      db.exec(migration.sql);
    }
  }
}

// ─── Response Queries ────────────────────────────────────

export interface StoredResponse {
  key: string;
  url: string;
  body: string;
  fetched_at: number;
}

export function getResponse(
  db: Database.Database,
  key: string
): StoredResponse | null {
  const row = db
    .prepare("SELECT key, url, body, fetched_at FROM responses WHERE key = ?")
    .get(key) as StoredResponse | undefined;
  return row ?? null;
}

export function putResponse(
  db: Database.Database,
  response: StoredResponse
): void {
  db.prepare(`
    INSERT INTO responses (key, url, body, fetched_at)
    VALUES (@key, @url, @body, @fetched_at)
    ON CONFLICT(key) DO UPDATE SET
      url = excluded.url,
      body = excluded.body,
      fetched_at = excluded.fetched_at
  `).run(response);
}

/** Delete cached responses, optionally only keys starting with `prefix` */
export function deleteResponses(db: Database.Database, prefix?: string): number {
  if (prefix === undefined) {
    return db.prepare("DELETE FROM responses").run().changes;
  }
  return db
    .prepare("DELETE FROM responses WHERE substr(key, 1, length(?)) = ?")
    .run(prefix, prefix).changes;
}

export function listResponses(
  db: Database.Database
): Array<Omit<StoredResponse, "body"> & { bytes: number }> {
  return db
    .prepare(
      "SELECT key, url, fetched_at, length(body) as bytes FROM responses ORDER BY key"
    )
    .all() as Array<Omit<StoredResponse, "body"> & { bytes: number }>;
}
