#!/usr/bin/env -S npx tsx
import "dotenv/config";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadConfig, ConfigError, type RuntimeConfig } from "./config.ts";
import { bootstrap, type Application } from "./bootstrap.ts";
import type { CycleReport } from "./scheduler/cycle-scheduler.ts";
import { errorMessage } from "./observability/logger.ts";

// ── Parsed CLI Arguments ───────────────────────────────────────────────────

export interface ParsedArgs {
  once: boolean;
  api: boolean;
  help: boolean;
}

// ── Argument Parser ────────────────────────────────────────────────────────

/**
 * Parse CLI arguments into a structured ParsedArgs object.
 *
 * @param argv Arguments after the script name (e.g. process.argv.slice(2))
 * @throws Error if arguments are invalid
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = { once: false, api: true, help: false };

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--once") {
      result.once = true;
    } else if (arg === "--no-api") {
      result.api = false;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

// ── Help Text ──────────────────────────────────────────────────────────────

export const HELP_TEXT = `
outage-relay: watch service status pages and fan out change events

Usage:
  outage-relay              Run the scrape loop with the REST/WebSocket API
  outage-relay --once       Run a single cycle and print its report as JSON
  outage-relay --no-api     Run the scrape loop without the HTTP surface

Options:
  --help, -h                Show this help message

Configuration is read from the environment (and .env). Common variables:
  MONITORED_SERVICES        Comma-separated service ids (or SERVICES_FILE)
  SCRAPE_INTERVAL_SECONDS   Seconds between cycles (default: 600)
  SPIKE_FACTOR              Report spike ratio (default: 2)
  SPIKE_MIN_ABSOLUTE        Report spike floor (default: 100)
  API_PORT                  HTTP port (default: 8000)
  EMAIL_SMTP_HOST           Enables email notifications
  ANTHROPIC_API_KEY         Enables AI outage summaries
`.trim();

// ── Single Cycle ───────────────────────────────────────────────────────────

export interface OnceResult {
  readonly report: CycleReport;
  /** 1 when no service could be fetched at all. */
  readonly exitCode: number;
}

export async function runOnce(app: Application): Promise<OnceResult> {
  try {
    const report = await app.scheduler.runCycle();
    const allFailed = report.services.length > 0 && report.fetchFailures === report.services.length;
    return { report, exitCode: allFailed ? 1 : 0 };
  } finally {
    await app.shutdown();
  }
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error(`Error: ${errorMessage(err)}`);
    console.error("Run with --help for usage information.");
    process.exit(1);
    return;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    process.exit(0);
    return;
  }

  let config: RuntimeConfig;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error (${err.field}): ${err.message}`);
      process.exit(1);
      return;
    }
    throw err;
  }

  if (args.once) {
    const app = bootstrap(config, { api: false, signals: false });
    const { report, exitCode } = await runOnce(app);
    console.log(JSON.stringify(report, null, 2));
    process.exit(exitCode);
    return;
  }

  const app = bootstrap(config, { api: args.api });
  try {
    await app.start();
  } catch (err: unknown) {
    app.logger.fatal("startup_failed", { error: errorMessage(err) });
    await app.shutdown();
    process.exit(1);
  }
}

// Run only when executed as the entry point (not when imported for testing)
function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((err: unknown) => {
    console.error("Fatal: failed to start:", errorMessage(err));
    process.exit(1);
  });
}
