import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { runCli, type CliContext } from "../cli.js";
import { closeDb } from "../db.js";
import type { FetchLike } from "../tracker.js";
import { BOARD_ISSUES, TODAY_MS, page } from "./fixtures.js";

const stderrSpy = vi.spyOn(console, "error").mockImplementation(() => {});

let cwd: string;
let output: string[];
let server: Mock<FetchLike>;

function context(): CliContext {
  return {
    env: {
      JIRA_URL: "https://tracker.example.test",
      JIRA_BOARD: "42",
      ISSUE_AGING_TZ: "America/Chicago",
    },
    cwd,
    color: false,
    write: (text) => output.push(text),
    fetchImpl: server,
    now: () => TODAY_MS,
  };
}

beforeEach(() => {
  cwd = mkdtempSync(join(tmpdir(), "aging-cli-"));
  output = [];
  stderrSpy.mockClear();
  server = vi.fn<FetchLike>(async () => new Response(page(BOARD_ISSUES, 0, BOARD_ISSUES.length)));
});

afterEach(() => {
  closeDb();
  rmSync(cwd, { recursive: true, force: true });
});

describe("issue-aging report", () => {
  it("prints the text report by default", async () => {
    expect(await runCli([], context())).toBe(0);
    expect(output.join("")).toBe(
      [
        "In Progress: [",
        "  A-0 (2 days old since 2018-11-14T09:00:00-06:00)",
        "  A-2 (2 days old since 2018-11-14T16:20:00-06:00)",
        "  A-1 (10 days old since 2018-11-02T10:00:00-05:00)",
        "]",
        "In Progress - 1: [",
        "]",
        "In Progress - 2: [",
        "]",
        "In Testing: [",
        "  A-3 (1 days old since 2018-11-15T08:00:00-06:00)",
        "]",
        "",
      ].join("\n")
    );
  });

  it("takes the board id as an argument", async () => {
    expect(await runCli(["report", "7", "--json"], context())).toBe(0);

    const url = server.mock.calls[0][0];
    expect(url).toContain("/rest/agile/1.0/board/7/issue?");
    expect(JSON.parse(output.join("")).boardId).toBe(7);
  });

  it("accepts a bare board id", async () => {
    expect(await runCli(["7"], context())).toBe(0);
    expect(server.mock.calls[0][0]).toContain("/board/7/issue?");
  });

  it("prints JSON with --json", async () => {
    expect(await runCli(["report", "--json"], context())).toBe(0);

    const json = JSON.parse(output.join(""));
    expect(json.boardId).toBe(42);
    expect(json.today).toBe("2018-11-16");
    expect(json.groups[3]).toEqual({
      status: "In Testing",
      issues: [{ key: "A-3", businessDays: 1, since: "2018-11-15T08:00:00-06:00", movedBy: "Dana Tester" }],
    });
  });

  it("fails with a message on a bad board id", async () => {
    expect(await runCli(["report", "seven"], context())).toBe(1);
    expect(stderrSpy).toHaveBeenCalledWith("Error: Invalid board id: seven");
    expect(server).not.toHaveBeenCalled();
  });

  it("fails with a message when the tracker rejects the request", async () => {
    server.mockImplementation(async () => new Response("", { status: 403, statusText: "Forbidden" }));

    expect(await runCli(["report"], context())).toBe(1);
    expect(stderrSpy).toHaveBeenCalledWith("Error: HTTP response 403 Forbidden");
  });
});

describe("issue-aging days", () => {
  it("prints the business-day count", async () => {
    expect(
      await runCli(["days", "2018-11-02T00:00:00-05:00", "2018-11-16T00:00:00-06:00"], context())
    ).toBe(0);
    expect(output).toEqual(["10 business days from 2018-11-02 to 2018-11-16\n"]);
  });

  it("requires two timestamps", async () => {
    expect(await runCli(["days", "2018-11-02T00:00:00-05:00"], context())).toBe(1);
    expect(stderrSpy).toHaveBeenCalledWith("Error: Usage: issue-aging days <start> <until>");
  });
});

describe("issue-aging cache", () => {
  it("lists and clears cached pages", async () => {
    await runCli(["report"], context());
    output = [];

    expect(await runCli(["cache"], context())).toBe(0);
    expect(output).toEqual([
      `1 cached pages (1 fresh) in ${join(cwd, ".issue-aging")}\n`,
      "  board.42.issue.0\n",
    ]);

    output = [];
    expect(await runCli(["cache", "clear"], context())).toBe(0);
    expect(output).toEqual(["Removed 1 cached page\n"]);
  });

  it("works without tracker settings", async () => {
    const ctx = { ...context(), env: { ISSUE_AGING_CACHE_DIR: "pages" } };

    expect(await runCli(["cache"], ctx)).toBe(0);
    expect(output).toEqual([`0 cached pages (0 fresh) in ${join(cwd, "pages")}\n`]);

    output = [];
    expect(await runCli(["cache", "clear"], ctx)).toBe(0);
    expect(output).toEqual(["Removed 0 cached pages\n"]);
  });
});

describe("usage", () => {
  it("prints help and exits 0", async () => {
    expect(await runCli(["help"], context())).toBe(0);
    expect(output.join("")).toContain("issue-aging days <start> <until>");
  });

  it("exits 1 on an unknown command", async () => {
    expect(await runCli(["bogus"], context())).toBe(1);
    expect(output.join("")).toContain("Commands:");
  });
});
