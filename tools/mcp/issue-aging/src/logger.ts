/**
 * Structured logging for fetches, cache decisions and tool calls.
 *
 * Logs to stderr: stdout carries the report (CLI) or JSON-RPC (MCP server).
 * Set ISSUE_AGING_LOG_LEVEL to debug/info/warn/error to filter.
 */

// ─── Types ──────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  operation?: string;
  duration_ms?: number;
  message: string;
  context?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

// ─── Logger ─────────────────────────────────────────────

function threshold(): number {
  const configured = process.env.ISSUE_AGING_LOG_LEVEL?.toLowerCase();
  return LEVEL_ORDER[isLogLevel(configured) ? configured : "info"];
}

export function formatEntry(entry: LogEntry): string {
  const parts = [entry.timestamp, entry.level.toUpperCase().padEnd(5)];

  if (entry.operation) {
    parts.push(`[${entry.operation}]`);
  }

  parts.push(entry.message);

  if (entry.duration_ms !== undefined) {
    parts.push(`(${entry.duration_ms}ms)`);
  }

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  return parts.join(" ");
}

function write(entry: LogEntry): void {
  if (LEVEL_ORDER[entry.level] < threshold()) return;
  console.error(formatEntry(entry));
}

export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  write({
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  });
}

export function logOperation(
  operation: string,
  level: LogLevel,
  message: string,
  duration_ms?: number,
  context?: Record<string, unknown>
): void {
  write({
    timestamp: new Date().toISOString(),
    level,
    operation,
    duration_ms,
    message,
    context,
  });
}

// ─── Call Metrics ───────────────────────────────────────

interface CallMetrics {
  calls: number;
  errors: number;
  totalMs: number;
  lastCallAt: string | null;
}

const metrics = new Map<string, CallMetrics>();

export function recordCall(
  operation: string,
  durationMs: number,
  isError: boolean
): void {
  const existing = metrics.get(operation) || {
    calls: 0,
    errors: 0,
    totalMs: 0,
    lastCallAt: null,
  };

  existing.calls++;
  if (isError) existing.errors++;
  existing.totalMs += durationMs;
  existing.lastCallAt = new Date().toISOString();

  metrics.set(operation, existing);
}

export function getCallMetrics(): Record<string, CallMetrics & { avgMs: number }> {
  const result: Record<string, CallMetrics & { avgMs: number }> = {};
  for (const [operation, m] of metrics) {
    result[operation] = {
      ...m,
      avgMs: m.calls > 0 ? Math.round(m.totalMs / m.calls) : 0,
    };
  }
  return result;
}

export function resetCallMetrics(): void {
  metrics.clear();
}

/** Slower than this and a successful call is logged as a warning */
const SLOW_CALL_MS = 1000;

/**
 * Wrap an async operation with timing, metrics and error logging.
 * Errors are logged and rethrown unchanged.
 */
export async function withLogging<T>(
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();
  try {
    const result = await fn();
    const duration = Date.now() - start;
    recordCall(operation, duration, false);
    if (duration > SLOW_CALL_MS) {
      logOperation(operation, "warn", "slow execution", duration);
    } else {
      logOperation(operation, "debug", "completed", duration);
    }
    return result;
  } catch (error) {
    const duration = Date.now() - start;
    recordCall(operation, duration, true);
    logOperation(
      operation,
      "error",
      error instanceof Error ? error.message : String(error),
      duration
    );
    throw error;
  }
}
