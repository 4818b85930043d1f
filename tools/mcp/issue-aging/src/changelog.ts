/**
 * Changelog reading — where an issue's workflow status stands now.
 */

import { parseTimestamp, type Instant } from "./calendar.js";
import type { TrackerIssue, TrackerUser } from "./tracker.js";

export interface StatusSnapshot {
  status: string;
  /** When the issue entered `status` */
  since: Instant;
  /** Who moved it there */
  movedBy: TrackerUser | null;
}

/**
 * The last status change in an issue's changelog, or null when the
 * changelog holds no status change. A change to an unnamed status yields
 * an empty `status`. Histories are read in the order the
 * tracker returns them (oldest first).
 */
export function latestStatus(issue: TrackerIssue): StatusSnapshot | null {
  let snapshot: StatusSnapshot | null = null;

  for (const history of issue.changelog.histories) {
    for (const item of history.items) {
      // Ignore any histories except status changes
      if (item.field !== "status") continue;

      snapshot = {
        status: item.toString ?? "",
        since: parseTimestamp(history.created),
        movedBy: history.author ?? null,
      };
    }
  }

  return snapshot;
}

export function displayName(user: TrackerUser | null): string | null {
  if (!user) return null;
  return user.displayName || user.name || user.emailAddress || null;
}
