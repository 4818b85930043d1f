/**
 * Issue aging configuration — local file plus environment.
 *
 * Config is read from .issue-aging.json in the working directory (or the
 * file named by ISSUE_AGING_CONFIG). Environment variables override the
 * file, so credentials never need to live on disk.
 */

import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import { Temporal } from "temporal-polyfill";

// ─── Workflow Constants ──────────────────────────────────

/** Statuses reported, in output order */
export const DEFAULT_STATUSES = [
  "In Progress", // In Development
  "In Progress - 1", // PR
  "In Progress - 2", // Ready for QA
  "In Testing",
] as const;

/** Statuses that mean the issue is not being worked */
export const IGNORED_STATUSES = ["Open", "Reopened", "Closed"] as const;

// ─── Operational Defaults ────────────────────────────────

/** Cached responses are considered stale after this many milliseconds (1 hour) */
export const CACHE_STALE_MS = 60 * 60 * 1000;

export const CONFIG_FILENAME = ".issue-aging.json";

export const DEFAULT_CACHE_DIR = ".issue-aging";

/** HTTP limits for tracker requests */
export const REQUEST_LIMITS = {
  timeoutMs: 30_000,
} as const;

// ─── Config Types ────────────────────────────────────────

function isTimeZone(value: string): boolean {
  try {
    Temporal.Now.zonedDateTimeISO(value);
    return true;
  } catch {
    return false;
  }
}

const configSchema = z.object({
  baseUrl: z
    .string({ required_error: "set JIRA_URL or baseUrl" })
    .url()
    .transform((url) => url.replace(/\/+$/, "")),
  username: z.string().default(""),
  password: z.string().default(""),
  boardId: z.coerce
    .number({ invalid_type_error: "set JIRA_BOARD or boardId" })
    .int()
    .positive(),
  cacheDir: z.string().min(1).default(DEFAULT_CACHE_DIR),
  cacheTtlMinutes: z.number().positive().default(CACHE_STALE_MS / 60_000),
  timeZone: z
    .string()
    .refine(isTimeZone, { message: "unknown time zone" })
    .default(() => Temporal.Now.timeZoneId()),
  statuses: z.array(z.string().min(1)).min(1).default([...DEFAULT_STATUSES]),
  ignoredStatuses: z.array(z.string()).default([...IGNORED_STATUSES]),
});

export type AgingConfig = z.infer<typeof configSchema>;

/** Raw input accepted before validation (file contents, env, CLI overrides) */
export type AgingConfigInput = z.input<typeof configSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// ─── Config Loading ──────────────────────────────────────

const ENV_KEYS = {
  JIRA_URL: "baseUrl",
  JIRA_USERNAME: "username",
  JIRA_PASSWORD: "password",
  JIRA_BOARD: "boardId",
  ISSUE_AGING_CACHE_DIR: "cacheDir",
  ISSUE_AGING_TZ: "timeZone",
} as const satisfies Record<string, keyof AgingConfigInput>;

function fromEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value) values[key] = value;
  }
  return values;
}

async function fromFile(path: string): Promise<Record<string, unknown>> {
  if (!existsSync(path)) return {};
  const content = await readFile(path, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigError([
      `${path}: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    throw new ConfigError([`${path}: expected a JSON object`]);
  }
  return Object.fromEntries(Object.entries(json));
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, e.g. a board id given on the command line */
  overrides?: Partial<AgingConfigInput>;
}

async function mergeSources(
  options: LoadConfigOptions
): Promise<{ cwd: string; merged: Record<string, unknown> }> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = resolve(cwd, env.ISSUE_AGING_CONFIG || CONFIG_FILENAME);

  return {
    cwd,
    merged: {
      ...(await fromFile(configPath)),
      ...fromEnv(env),
      ...options.overrides,
    },
  };
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`
  );
}

/** Read, merge and validate config. File < environment < overrides. */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<AgingConfig> {
  const { cwd, merged } = await mergeSources(options);

  const result = configSchema.safeParse(merged);
  if (!result.success) throw new ConfigError(issuesOf(result.error));

  return {
    ...result.data,
    cacheDir: resolve(cwd, result.data.cacheDir),
  };
}

const cacheSettingsSchema = configSchema.pick({
  cacheDir: true,
  cacheTtlMinutes: true,
});

export type CacheSettings = z.infer<typeof cacheSettingsSchema>;

/** Only the cache settings; works without tracker URL or board */
export async function loadCacheSettings(
  options: LoadConfigOptions = {}
): Promise<CacheSettings> {
  const { cwd, merged } = await mergeSources(options);

  const result = cacheSettingsSchema.safeParse(merged);
  if (!result.success) throw new ConfigError(issuesOf(result.error));

  return {
    ...result.data,
    cacheDir: resolve(cwd, result.data.cacheDir),
  };
}

let _config: AgingConfig | null = null;

/** Load config once per process */
export async function getConfig(): Promise<AgingConfig> {
  if (_config) return _config;
  _config = await loadConfig();
  return _config;
}

/** Forget the memoized config (tests) */
export function resetConfig(): void {
  _config = null;
}

export function cacheTtlMs(config: Pick<AgingConfig, "cacheTtlMinutes">): number {
  return config.cacheTtlMinutes * 60_000;
}
