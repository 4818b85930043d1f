#!/usr/bin/env node

/**
 * Issue Aging MCP Server
 *
 * Exposes the board aging report and the business-day calculator as MCP
 * tools, so an assistant can ask which issues have been stuck longest.
 *
 * Tools:
 *   - get_aging_report: In-flight issues grouped by status with business-day ages
 *   - count_business_days: Business days between two timestamps
 *   - get_cache_stats: Cached tracker pages and their freshness
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { register as registerAgingTools } from "./tools-aging.js";
import { closeDb } from "./db.js";
import { log } from "./logger.js";

const VERSION = "0.3.0";

const server = new McpServer({
  name: "issue-aging",
  version: VERSION,
});

registerAgingTools(server);

// ─── MAIN ───────────────────────────────────────────────

const ALL_TOOLS = ["get_aging_report", "count_business_days", "get_cache_stats"];

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log("info", `Issue Aging MCP Server v${VERSION} running on stdio`, {
    tools: ALL_TOOLS,
  });
}

process.on("SIGINT", async () => {
  log("info", "Shutting down Issue Aging MCP server...");
  await server.close();
  closeDb();
  process.exit(0);
});

main().catch((error) => {
  log("error", "Fatal error in Issue Aging MCP server", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
