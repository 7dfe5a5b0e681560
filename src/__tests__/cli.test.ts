import { describe, expect, it } from "vitest";
import { parseArgs, runOnce, HELP_TEXT } from "../cli.ts";
import { bootstrap } from "../bootstrap.ts";
import { loadConfig } from "../config.ts";
import { BufferLogger } from "../observability/logger.ts";
import { StaticFetcher, createTestSnapshot } from "../testing/fixtures.ts";

describe("parseArgs", () => {
  // ── Modes ──────────────────────────────────────────────────────────────

  it("defaults to the daemon with the API", () => {
    expect(parseArgs([])).toEqual({ once: false, api: true, help: false });
  });

  it("parses --once", () => {
    expect(parseArgs(["--once"]).once).toBe(true);
  });

  it("parses --no-api", () => {
    expect(parseArgs(["--no-api"]).api).toBe(false);
  });

  it("parses --help and -h", () => {
    expect(parseArgs(["--help"]).help).toBe(true);
    expect(parseArgs(["-h"]).help).toBe(true);
  });

  it("combines flags", () => {
    expect(parseArgs(["--once", "--no-api"])).toEqual({ once: true, api: false, help: false });
  });

  // ── Errors ─────────────────────────────────────────────────────────────

  it("rejects unknown flags", () => {
    expect(() => parseArgs(["--daemon"])).toThrow("Unknown argument: --daemon");
  });

  it("rejects positional arguments", () => {
    expect(() => parseArgs(["github"])).toThrow("Unknown argument: github");
  });
});

describe("HELP_TEXT", () => {
  it("documents every flag", () => {
    for (const flag of ["--once", "--no-api", "--help"]) {
      expect(HELP_TEXT).toContain(flag);
    }
  });
});

describe("runOnce", () => {
  function makeApp(fetcher: StaticFetcher, logger: BufferLogger) {
    const config = loadConfig({
      MONITORED_SERVICES: "github,slack",
      SERVICES_FILE: undefined,
      ANTHROPIC_API_KEY: undefined,
      EMAIL_SMTP_HOST: undefined,
      SCRAPE_RETRY_DELAY_MS: "0",
    });
    return bootstrap(config, { fetcher, logger, api: false, signals: false });
  }

  it("runs one cycle, shuts down and exits 0", async () => {
    const logger = new BufferLogger();
    const fetcher = new StaticFetcher([
      createTestSnapshot({ serviceId: "github", status: "ISSUES", reportCount: 300 }),
    ]);

    const { report, exitCode } = await runOnce(makeApp(fetcher, logger));

    expect(exitCode).toBe(0);
    expect(report.cycleId).toBe("cycle-1");
    expect(report.fetchFailures).toBe(1);
    expect(report.services.map((s) => [s.serviceId, s.outcome])).toEqual([
      ["github", "changed"],
      ["slack", "fetch_failed"],
    ]);
    expect(logger.has("info", "shutdown_complete")).toBe(true);
  });

  it("exits 1 when every fetch fails", async () => {
    const { exitCode } = await runOnce(makeApp(new StaticFetcher(), new BufferLogger()));
    expect(exitCode).toBe(1);
  });
});
