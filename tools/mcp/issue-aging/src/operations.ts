/**
 * Operations shared by the CLI and the MCP tools.
 */

import { Temporal } from "temporal-polyfill";
import {
  businessDaysUntil,
  normalize,
  parseTimestamp,
  type CivilDate,
} from "./calendar.js";
import { buildAgingReport, type AgingReport } from "./aging.js";
import { fetchBoardIssues, type BoardIssues, type FetchLike } from "./tracker.js";
import type { AgingConfig } from "./config.js";
import { log } from "./logger.js";

/** Today's civil date in `timeZone` */
export function todayIn(timeZone: string, nowMs: number = Date.now()): CivilDate {
  return normalize(
    Temporal.Instant.fromEpochMilliseconds(nowMs).toZonedDateTimeISO(timeZone)
  );
}

export interface GenerateOptions {
  fetchImpl?: FetchLike;
  /** Refetch even when cached pages are fresh */
  refresh?: boolean;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface GeneratedReport {
  report: AgingReport;
  pages: BoardIssues["pages"];
}

/** Fetch (or read cached) board issues and age them */
export async function generateAgingReport(
  config: AgingConfig,
  options: GenerateOptions = {}
): Promise<GeneratedReport> {
  const now = options.now ?? Date.now;
  const board = await fetchBoardIssues(config, {
    fetchImpl: options.fetchImpl,
    force: options.refresh,
    now,
  });

  const report = buildAgingReport(board.issues, {
    today: todayIn(config.timeZone, now()),
    statuses: config.statuses,
    ignoredStatuses: config.ignoredStatuses,
  });

  log("info", "aging report built", {
    boardId: config.boardId,
    issues: board.issues.length,
    pages: board.pages.length,
    stalePages: board.pages.filter((p) => p.source === "stale").length,
  });

  return { report, pages: board.pages };
}

export interface BusinessDaysResult {
  start: string;
  until: string;
  businessDays: number;
}

/** Business days between two timestamps, each normalized in its own zone */
export function countBusinessDays(start: string, until: string): BusinessDaysResult {
  const startDate = normalize(parseTimestamp(start));
  const untilDate = normalize(parseTimestamp(until));
  return {
    start: startDate.toPlainDate().toString(),
    until: untilDate.toPlainDate().toString(),
    businessDays: businessDaysUntil(startDate, untilDate),
  };
}
