/**
 * Read-through response cache backed by the local SQLite database.
 *
 * A stored body younger than the TTL is served without touching the
 * network. Older bodies are refetched; if that refetch fails, or returns a
 * body `validate` rejects, the old body is served with a warning and kept.
 */

import { CACHE_STALE_MS } from "./config.js";
import {
  getDb,
  getResponse,
  putResponse,
  deleteResponses,
  listResponses,
} from "./db.js";
import { log } from "./logger.js";

// ─── Types ──────────────────────────────────────────────

export type CacheSource = "cache" | "network" | "stale";

export interface CachedBody {
  body: string;
  source: CacheSource;
  fetchedAt: number;
}

export interface CachedGetOptions {
  cacheDir: string;
  ttlMs?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
  /** Skip the freshness check and always try the network first */
  force?: boolean;
  /** Throw to reject a fetched body; a rejected body is never stored */
  validate?: (body: string) => void;
}

// ─── Cache Implementation ───────────────────────────────

/**
 * Return the body stored under `key`, or fetch it from `url` and store it.
 */
export async function cachedGet(
  key: string,
  url: string,
  fetchBody: (url: string) => Promise<string>,
  options: CachedGetOptions
): Promise<CachedBody> {
  const now = options.now ?? Date.now;
  const ttlMs = options.ttlMs ?? CACHE_STALE_MS;
  const db = getDb(options.cacheDir);

  const existing = getResponse(db, key);
  if (existing && !options.force && existing.fetched_at > now() - ttlMs) {
    log("debug", "cache hit", { key });
    return { body: existing.body, source: "cache", fetchedAt: existing.fetched_at };
  }

  let body: string;
  try {
    body = await fetchBody(url);
    options.validate?.(body);
  } catch (error) {
    if (!existing) throw error;
    log("warn", "fetch failed, serving stale cache", {
      key,
      fetchedAt: new Date(existing.fetched_at).toISOString(),
      error: error instanceof Error ? error.message : String(error),
    });
    return { body: existing.body, source: "stale", fetchedAt: existing.fetched_at };
  }

  const fetchedAt = now();
  putResponse(db, { key, url, body, fetched_at: fetchedAt });
  log("debug", "cached response", { key, bytes: body.length });
  return { body, source: "network", fetchedAt };
}

/**
 * Remove cached responses (all, or those whose key starts with `prefix`).
 */
export function clearCache(cacheDir: string, prefix?: string): number {
  return deleteResponses(getDb(cacheDir), prefix);
}

/**
 * Get cache statistics for observability.
 */
export function getCacheStats(
  cacheDir: string,
  options: { ttlMs?: number; now?: number } = {}
): {
  entries: number;
  freshEntries: number;
  keys: string[];
} {
  const now = options.now ?? Date.now();
  const ttlMs = options.ttlMs ?? CACHE_STALE_MS;
  const rows = listResponses(getDb(cacheDir));

  return {
    entries: rows.length,
    freshEntries: rows.filter((row) => row.fetched_at > now - ttlMs).length,
    keys: rows.map((row) => row.key),
  };
}
