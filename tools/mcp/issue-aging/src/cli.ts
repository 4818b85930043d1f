#!/usr/bin/env node

/**
 * issue-aging CLI — how long has each in-flight issue been stuck?
 *
 * Commands:
 *   issue-aging report [boardId] [--refresh] [--json]   Aging report (default)
 *   issue-aging days <start> <until>                    Business days between timestamps
 *   issue-aging cache [clear]                           Cached pages / drop them
 *   issue-aging help
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { cacheTtlMs, loadCacheSettings, loadConfig, type AgingConfigInput } from "./config.js";
import { countBusinessDays, generateAgingReport } from "./operations.js";
import { renderReport, reportToJson } from "./report.js";
import { clearCache, getCacheStats } from "./cache.js";
import { closeDb } from "./db.js";
import type { FetchLike } from "./tracker.js";

// ─── ANSI Colors ─────────────────────────────────────────

const c = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliContext {
  env: NodeJS.ProcessEnv;
  cwd: string;
  color: boolean;
  write: (text: string) => void;
  fetchImpl?: FetchLike;
  now?: () => number;
}

// ─── Commands ────────────────────────────────────────────

function parseBoardId(arg: string | undefined): Partial<AgingConfigInput> {
  if (arg === undefined) return {};
  if (!/^\d+$/.test(arg)) throw new UsageError(`Invalid board id: ${arg}`);
  return { boardId: Number(arg) };
}

async function cmdReport(args: string[], ctx: CliContext): Promise<void> {
  const positional = args.filter((a) => !a.startsWith("--"));
  const config = await loadConfig({
    env: ctx.env,
    cwd: ctx.cwd,
    overrides: parseBoardId(positional[0]),
  });

  const { report } = await generateAgingReport(config, {
    refresh: args.includes("--refresh"),
    fetchImpl: ctx.fetchImpl,
    now: ctx.now,
  });

  if (args.includes("--json")) {
    ctx.write(JSON.stringify({ boardId: config.boardId, ...reportToJson(report) }, null, 2) + "\n");
    return;
  }
  ctx.write(renderReport(report, { color: ctx.color }));
}

function cmdDays(args: string[], ctx: CliContext): void {
  const [start, until] = args;
  if (!start || !until) {
    throw new UsageError("Usage: issue-aging days <start> <until>");
  }

  const result = countBusinessDays(start, until);
  ctx.write(`${result.businessDays} business days from ${result.start} to ${result.until}\n`);
}

async function cmdCache(args: string[], ctx: CliContext): Promise<void> {
  const config = await loadCacheSettings({ env: ctx.env, cwd: ctx.cwd });

  if (args[0] === "clear") {
    const removed = clearCache(config.cacheDir, args[1]);
    ctx.write(`Removed ${removed} cached page${removed === 1 ? "" : "s"}\n`);
    return;
  }

  const stats = getCacheStats(config.cacheDir, {
    ttlMs: cacheTtlMs(config),
    now: ctx.now?.(),
  });
  ctx.write(`${stats.entries} cached pages (${stats.freshEntries} fresh) in ${config.cacheDir}\n`);
  for (const key of stats.keys) {
    ctx.write(`  ${key}\n`);
  }
}

function usage(ctx: CliContext): string {
  const bold = (s: string) => (ctx.color ? `${c.bold}${s}${c.reset}` : s);
  const cyan = (s: string) => (ctx.color ? `${c.cyan}${s}${c.reset}` : s);
  return `
${bold("issue-aging")} — business-day age of in-flight issues

${bold("Commands:")}
  ${cyan("issue-aging report")} [boardId] [--refresh] [--json]   Aging report (default)
  ${cyan("issue-aging days")} <start> <until>                    Business days between timestamps
  ${cyan("issue-aging cache")} [clear [prefix]]                  Show or drop cached pages

${bold("Environment:")}
  JIRA_URL, JIRA_USERNAME, JIRA_PASSWORD, JIRA_BOARD
  ISSUE_AGING_CONFIG, ISSUE_AGING_CACHE_DIR, ISSUE_AGING_TZ, ISSUE_AGING_LOG_LEVEL
`;
}

// ─── Main ────────────────────────────────────────────────

/** Run one command; returns the process exit code */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const [command, ...args] = argv;

  try {
    switch (command) {
      case undefined:
      case "report":
        await cmdReport(args, ctx);
        break;
      case "days":
        cmdDays(args, ctx);
        break;
      case "cache":
        await cmdCache(args, ctx);
        break;
      case "help":
      case "--help":
      case "-h":
        ctx.write(usage(ctx));
        break;
      default:
        // A bare board id is shorthand for `report <boardId>`
        if (/^\d+$/.test(command)) {
          await cmdReport(argv, ctx);
          break;
        }
        ctx.write(usage(ctx));
        return 1;
    }
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const prefix = ctx.color ? `${c.red}Error:${c.reset}` : "Error:";
    console.error(`${prefix} ${message}`);
    return 1;
  }
}

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2), {
    env: process.env,
    cwd: process.cwd(),
    color: Boolean(process.stdout.isTTY),
    write: (text) => process.stdout.write(text),
  });
  closeDb();
  process.exitCode = code;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

if (isEntryPoint()) {
  main().catch((error) => {
    console.error("Fatal error in issue-aging:", error);
    process.exit(1);
  });
}
