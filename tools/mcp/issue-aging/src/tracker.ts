/**
 * Tracker REST client — pulls a board's issues with their changelogs.
 *
 * Uses the agile board endpoint of a Jira-compatible API:
 *   GET {baseUrl}/rest/agile/1.0/board/{boardId}/issue
 *       ?fields=changelog&expand=changelog&startAt=N
 *
 * Every page goes through the response cache, so repeated runs within the
 * cache TTL never hit the network.
 */

import { z } from "zod";
import { cacheTtlMs, REQUEST_LIMITS, type AgingConfig } from "./config.js";
import { cachedGet, type CacheSource } from "./cache.js";
import { logOperation } from "./logger.js";

// ─── Response Schemas ────────────────────────────────────

const userSchema = z.object({
  name: z.string().nullish(),
  emailAddress: z.string().nullish(),
  displayName: z.string().nullish(),
  timeZone: z.string().nullish(),
});

const historyItemSchema = z.object({
  field: z.string(),
  from: z.string().nullish(),
  fromString: z.string().nullish(),
  to: z.string().nullish(),
  // An absent key would otherwise resolve to Object.prototype.toString
  toString: z.unknown().transform((value) => (typeof value === "string" ? value : null)),
});

const historySchema = z.object({
  id: z.string(),
  author: userSchema.nullish(),
  created: z.string(),
  items: z.array(historyItemSchema),
});

const changelogSchema = z.object({
  startAt: z.number().int().default(0),
  maxResults: z.number().int().default(0),
  total: z.number().int().default(0),
  histories: z.array(historySchema).default([]),
});

const issueSchema = z.object({
  id: z.string(),
  key: z.string(),
  changelog: changelogSchema.default({}),
});

export const pagedIssuesSchema = z.object({
  startAt: z.number().int().nonnegative(),
  maxResults: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  issues: z.array(issueSchema),
});

export type TrackerUser = z.infer<typeof userSchema>;
export type TrackerIssue = z.infer<typeof issueSchema>;
export type PagedIssues = z.infer<typeof pagedIssuesSchema>;

// ─── Errors ──────────────────────────────────────────────

export class TrackerHttpError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly url: string
  ) {
    super(`HTTP response ${status} ${statusText}`.trimEnd());
    this.name = "TrackerHttpError";
  }
}

export class TrackerResponseError extends Error {
  constructor(readonly key: string, detail: string) {
    super(`Malformed tracker response for ${key}: ${detail}`);
    this.name = "TrackerResponseError";
  }
}

// ─── HTTP ────────────────────────────────────────────────

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/** Authorization header value for HTTP Basic auth */
export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`;
}

export function boardIssuesUrl(
  config: Pick<AgingConfig, "baseUrl" | "boardId">,
  startAt: number
): string {
  return `${config.baseUrl}/rest/agile/1.0/board/${config.boardId}/issue?fields=changelog&expand=changelog&startAt=${startAt}`;
}

export function pageCacheKey(boardId: number, startAt: number): string {
  return `board.${boardId}.issue.${startAt}`;
}

function bodyFetcher(
  config: Pick<AgingConfig, "username" | "password">,
  fetchImpl: FetchLike
): (url: string) => Promise<string> {
  return async (url) => {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (config.username) {
      headers.Authorization = basicAuth(config.username, config.password);
    }

    const rsp = await fetchImpl(url, {
      method: "GET",
      headers,
      signal: AbortSignal.timeout(REQUEST_LIMITS.timeoutMs),
    });
    if (rsp.status >= 300) {
      await rsp.body?.cancel();
      throw new TrackerHttpError(rsp.status, rsp.statusText, url);
    }
    return rsp.text();
  };
}

function decodePage(key: string, body: string): PagedIssues {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new TrackerResponseError(
      key,
      error instanceof Error ? error.message : String(error)
    );
  }

  const result = pagedIssuesSchema.safeParse(json);
  if (!result.success) {
    const first = result.error.issues[0];
    throw new TrackerResponseError(
      key,
      `${first.path.join(".") || "body"}: ${first.message}`
    );
  }
  return result.data;
}

// ─── Board Issues ────────────────────────────────────────

export interface FetchBoardOptions {
  fetchImpl?: FetchLike;
  /** Bypass fresh cache entries */
  force?: boolean;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface BoardIssues {
  boardId: number;
  issues: TrackerIssue[];
  pages: Array<{ key: string; source: CacheSource; count: number }>;
}

/** Fetch every page of a board's issues, from cache or network */
export async function fetchBoardIssues(
  config: AgingConfig,
  options: FetchBoardOptions = {}
): Promise<BoardIssues> {
  const fetchBody = bodyFetcher(config, options.fetchImpl ?? fetch);
  const issues: TrackerIssue[] = [];
  const pages: BoardIssues["pages"] = [];

  let startAt = 0;
  let total = 1;

  while (startAt < total) {
    const key = pageCacheKey(config.boardId, startAt);
    const url = boardIssuesUrl(config, startAt);
    const started = Date.now();

    const cached = await cachedGet(key, url, fetchBody, {
      cacheDir: config.cacheDir,
      ttlMs: cacheTtlMs(config),
      now: options.now,
      force: options.force,
      validate: (body) => {
        decodePage(key, body);
      },
    });
    const page = decodePage(key, cached.body);

    logOperation("fetch_page", "debug", key, Date.now() - started, {
      source: cached.source,
      issues: page.issues.length,
      total: page.total,
    });
    pages.push({ key, source: cached.source, count: page.issues.length });
    issues.push(...page.issues);

    total = page.total;
    // An empty page would never advance startAt
    if (page.issues.length === 0) break;
    startAt = page.startAt + page.issues.length;
  }

  return { boardId: config.boardId, issues, pages };
}
