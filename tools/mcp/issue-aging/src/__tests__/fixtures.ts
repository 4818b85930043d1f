/**
 * Shared test data: a small board as the tracker would send it.
 */
import { pagedIssuesSchema, type TrackerIssue } from "../tracker.js";
import type { AgingConfig } from "../config.js";

interface RawStatusChange {
  created: string;
  to: string;
  from?: string;
  author?: { name?: string; displayName?: string };
}

/** Raw issue JSON with one history per status change */
export function rawIssue(key: string, changes: RawStatusChange[]) {
  return {
    id: key.replace(/\D/g, ""),
    key,
    changelog: {
      startAt: 0,
      maxResults: changes.length,
      total: changes.length,
      histories: changes.map((change, i) => ({
        id: `${key}-h${i}`,
        author: change.author ?? { name: "sam" },
        created: change.created,
        items: [
          {
            field: "status",
            fromString: change.from ?? null,
            toString: change.to,
          },
        ],
      })),
    },
  };
}

/**
 * Board used across aging, report and end-to-end tests.
 * "Today" for these is Friday 2018-11-16 in America/Chicago.
 */
export const BOARD_ISSUES = [
  rawIssue("A-1", [{ created: "2018-11-02T10:00:00.000-0500", to: "In Progress" }]),
  rawIssue("A-2", [{ created: "2018-11-14T16:20:00.000-0600", to: "In Progress" }]),
  rawIssue("A-3", [
    { created: "2018-11-01T09:00:00.000-0500", to: "In Progress" },
    {
      created: "2018-11-15T08:00:00.000-0600",
      from: "In Progress",
      to: "In Testing",
      author: { name: "dana", displayName: "Dana Tester" },
    },
  ]),
  rawIssue("A-4", [
    { created: "2018-11-05T09:00:00.000-0600", to: "In Progress" },
    { created: "2018-11-09T09:00:00.000-0600", to: "Closed" },
  ]),
  {
    id: "5",
    key: "A-5",
    changelog: {
      startAt: 0,
      maxResults: 1,
      total: 1,
      histories: [
        {
          id: "A-5-h0",
          author: { name: "sam" },
          created: "2018-11-12T10:00:00.000-0600",
          items: [{ field: "assignee", fromString: null, toString: "sam" }],
        },
      ],
    },
  },
  rawIssue("A-6", [{ created: "2018-11-13T10:00:00.000-0600", to: "Code Review" }]),
  rawIssue("A-0", [{ created: "2018-11-14T09:00:00.000-0600", to: "In Progress" }]),
];

/** 09:30 on Friday 2018-11-16 in Chicago (15:30 UTC) */
export const TODAY_MS = Date.UTC(2018, 10, 16, 15, 30);

export function page(issues: unknown[], startAt: number, total: number): string {
  return JSON.stringify({ startAt, maxResults: 50, total, issues });
}

export function parsedIssues(raw: unknown[] = BOARD_ISSUES): TrackerIssue[] {
  return pagedIssuesSchema.parse({
    startAt: 0,
    maxResults: 50,
    total: raw.length,
    issues: raw,
  }).issues;
}

export function testConfig(cacheDir: string): AgingConfig {
  return {
    baseUrl: "https://tracker.example.test",
    username: "test-user",
    password: "test-secret",
    boardId: 42,
    cacheDir,
    cacheTtlMinutes: 60,
    timeZone: "America/Chicago",
    statuses: ["In Progress", "In Testing", "In Progress - 1"],
    ignoredStatuses: ["Open", "Reopened", "Closed"],
  };
}
