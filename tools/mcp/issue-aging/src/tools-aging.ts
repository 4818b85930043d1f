import { z } from "zod";
import { cacheTtlMs, getConfig, loadCacheSettings, loadConfig } from "./config.js";
import { countBusinessDays, generateAgingReport } from "./operations.js";
import { reportToJson } from "./report.js";
import { getCacheStats } from "./cache.js";
import { type McpServer, toolResponse, wrapTool } from "./tool-helpers.js";

// ─── Handlers ────────────────────────────────────────────

export const getAgingReport = wrapTool(
  "get_aging_report",
  async ({ boardId, refresh }: { boardId?: number; refresh?: boolean }) => {
    // A board other than the configured one skips the memoized config
    const config =
      boardId === undefined
        ? await getConfig()
        : await loadConfig({ overrides: { boardId } });
    const { report, pages } = await generateAgingReport(config, {
      refresh: refresh || false,
    });
    return toolResponse({
      boardId: config.boardId,
      ...reportToJson(report),
      pages,
    });
  }
);

export const countDays = wrapTool(
  "count_business_days",
  async ({ start, until }: { start: string; until: string }) =>
    toolResponse(countBusinessDays(start, until))
);

export const cacheStats = wrapTool("get_cache_stats", async () => {
  const settings = await loadCacheSettings();
  return toolResponse(
    getCacheStats(settings.cacheDir, { ttlMs: cacheTtlMs(settings) })
  );
});

// ─── Registration ────────────────────────────────────────

export function register(server: McpServer) {
  server.registerTool(
    "get_aging_report",
    {
      title: "Issue Aging Report",
      description:
        "Age every in-flight issue on a board: latest workflow status from the changelog and business days spent in it, grouped by status (youngest first). Uses cached tracker responses younger than the cache TTL unless refresh=true; if a refetch fails, stale cached pages are used.",
      inputSchema: {
        boardId: z
          .number()
          .int()
          .positive()
          .optional()
          .describe("Board id (defaults to the configured board)"),
        refresh: z
          .boolean()
          .optional()
          .describe("Refetch pages even when the cache is fresh"),
      },
    },
    getAgingReport
  );

  server.registerTool(
    "count_business_days",
    {
      title: "Count Business Days",
      description:
        "Count business days between two timestamps (e.g. 2018-11-05T14:10:25.073-05:00). Each timestamp is reduced to its calendar date in its own UTC offset; steps landing on Saturday or Sunday skip ahead to Monday.",
      inputSchema: {
        start: z.string().describe("Start timestamp with UTC offset"),
        until: z.string().describe("End timestamp with UTC offset"),
      },
    },
    countDays
  );

  server.registerTool(
    "get_cache_stats",
    {
      title: "Cache Stats",
      description:
        "Show cached tracker response pages: total entries, how many are still fresh, and their keys (board.<id>.issue.<startAt>).",
    },
    cacheStats
  );
}
