/**
 * Aging — how long each in-flight issue has sat in its current status.
 *
 * Age is counted in business days from the date the issue entered its
 * status (in the zone of that changelog timestamp) to `today`.
 */

import {
  businessDaysUntil,
  normalize,
  type CivilDate,
  type Instant,
} from "./calendar.js";
import { latestStatus } from "./changelog.js";
import type { TrackerIssue, TrackerUser } from "./tracker.js";

// ─── Types ──────────────────────────────────────────────

export interface AgedIssue {
  key: string;
  status: string;
  since: Instant;
  movedBy: TrackerUser | null;
  businessDays: number;
}

export interface StatusGroup {
  status: string;
  issues: AgedIssue[];
}

export interface AgingReport {
  today: CivilDate;
  /** One group per tracked status, in tracked order (possibly empty) */
  groups: StatusGroup[];
  /** Issue counts in statuses that are neither tracked nor ignored */
  untracked: Record<string, number>;
  /** Issues without any status change in their changelog */
  withoutStatus: number;
}

export interface AgingOptions {
  today: CivilDate;
  statuses: readonly string[];
  ignoredStatuses: readonly string[];
}

// ─── Report ─────────────────────────────────────────────

function byAge(a: AgedIssue, b: AgedIssue): number {
  return a.businessDays - b.businessDays || a.key.localeCompare(b.key);
}

/** Age every issue and group the tracked ones by status, youngest first */
export function buildAgingReport(
  issues: readonly TrackerIssue[],
  options: AgingOptions
): AgingReport {
  const ignored = new Set(options.ignoredStatuses);
  const byStatus = new Map<string, AgedIssue[]>();
  let withoutStatus = 0;

  for (const issue of issues) {
    const snapshot = latestStatus(issue);
    if (!snapshot || snapshot.status === "") {
      withoutStatus++;
      continue;
    }
    if (ignored.has(snapshot.status)) continue;

    const aged: AgedIssue = {
      key: issue.key,
      status: snapshot.status,
      since: snapshot.since,
      movedBy: snapshot.movedBy,
      businessDays: businessDaysUntil(normalize(snapshot.since), options.today),
    };

    const group = byStatus.get(aged.status);
    if (group) group.push(aged);
    else byStatus.set(aged.status, [aged]);
  }

  const groups = options.statuses.map((status) => ({
    status,
    issues: (byStatus.get(status) ?? []).sort(byAge),
  }));

  const tracked = new Set(options.statuses);
  const untracked: Record<string, number> = {};
  for (const [status, aged] of byStatus) {
    if (!tracked.has(status)) untracked[status] = aged.length;
  }

  return { today: options.today, groups, untracked, withoutStatus };
}
