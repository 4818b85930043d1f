/**
 * Aging report rendering: terminal text and plain JSON.
 */

import { formatInstant } from "./calendar.js";
import { displayName } from "./changelog.js";
import type { AgingReport } from "./aging.js";

// ─── ANSI Colors ─────────────────────────────────────────

const c = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

/** Age (business days) at which an issue is highlighted */
const AGE_WARN_DAYS = 5;
const AGE_ALERT_DAYS = 10;

function ageColor(days: number): string {
  if (days >= AGE_ALERT_DAYS) return c.red;
  if (days >= AGE_WARN_DAYS) return c.yellow;
  return "";
}

// ─── Text ────────────────────────────────────────────────

export interface RenderOptions {
  /** Emit ANSI colors (terminal output) */
  color?: boolean;
}

/**
 * One block per tracked status:
 *
 *   In Testing: [
 *     ABC-12 (3 days old since 2018-11-05T14:10:25.073-05:00)
 *   ]
 */
export function renderReport(
  report: AgingReport,
  options: RenderOptions = {}
): string {
  const paint = (code: string, text: string) =>
    options.color && code ? `${code}${text}${c.reset}` : text;

  const lines: string[] = [];
  for (const group of report.groups) {
    lines.push(`${paint(c.bold, group.status)}: [`);
    for (const issue of group.issues) {
      const age = paint(ageColor(issue.businessDays), `${issue.businessDays} days old`);
      lines.push(`  ${issue.key} (${age} since ${formatInstant(issue.since)})`);
    }
    lines.push("]");
  }

  return lines.join("\n") + "\n";
}

// ─── JSON ────────────────────────────────────────────────

export interface AgingReportJson {
  today: string;
  groups: Array<{
    status: string;
    issues: Array<{
      key: string;
      businessDays: number;
      since: string;
      movedBy: string | null;
    }>;
  }>;
  untracked: Record<string, number>;
  withoutStatus: number;
}

export function reportToJson(report: AgingReport): AgingReportJson {
  return {
    today: report.today.toPlainDate().toString(),
    groups: report.groups.map((group) => ({
      status: group.status,
      issues: group.issues.map((issue) => ({
        key: issue.key,
        businessDays: issue.businessDays,
        since: formatInstant(issue.since),
        movedBy: displayName(issue.movedBy),
      })),
    })),
    untracked: { ...report.untracked },
    withoutStatus: report.withoutStatus,
  };
}
