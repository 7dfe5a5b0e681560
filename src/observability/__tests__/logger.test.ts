import { describe, it, expect, beforeEach } from "vitest";
import {
  createLogger,
  BufferLogger,
  NULL_LOGGER,
  errorMessage,
} from "../logger.ts";

// ── BufferLogger ────────────────────────────────────────────────────────────

describe("BufferLogger", () => {
  let logger: BufferLogger;

  beforeEach(() => {
    logger = new BufferLogger();
  });

  it("records entries at every level in order", () => {
    logger.trace("t");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");
    logger.fatal("f");
    expect(logger.entries.map((e) => e.level)).toEqual([
      "trace",
      "debug",
      "info",
      "warn",
      "error",
      "fatal",
    ]);
  });

  it("keeps data undefined when none is passed", () => {
    logger.info("no_data");
    expect(logger.entries[0]?.data).toBeUndefined();
  });

  it("merges child bindings into entries and shares the buffer", () => {
    const child = logger.child({ module: "scheduler" });
    child.warn("fetch_failed", { serviceId: "github" });
    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]?.data).toEqual({ module: "scheduler", serviceId: "github" });
  });

  it("nests bindings across generations", () => {
    logger.child({ module: "a" }).child({ component: "b" }).info("x");
    expect(logger.entries[0]?.data).toEqual({ module: "a", component: "b" });
  });

  it("matches messages exactly in has() and find()", () => {
    logger.info("cycle_completed", { events: 2 });
    expect(logger.has("info", "cycle_completed")).toBe(true);
    expect(logger.has("info", "cycle")).toBe(false);
    expect(logger.has("warn", "cycle_completed")).toBe(false);
    expect(logger.find("cycle_completed")[0]?.data).toEqual({ events: 2 });
  });

  it("filters by level and clears", () => {
    logger.info("a");
    logger.error("b");
    expect(logger.getByLevel("error").map((e) => e.msg)).toEqual(["b"]);
    logger.clear();
    expect(logger.entries).toHaveLength(0);
  });
});

// ── NULL_LOGGER ─────────────────────────────────────────────────────────────

describe("NULL_LOGGER", () => {
  it("returns itself from child()", () => {
    expect(NULL_LOGGER.child({ module: "x" })).toBe(NULL_LOGGER);
  });

  it("accepts calls without side effects", () => {
    expect(() => NULL_LOGGER.error("gone", { a: 1 })).not.toThrow();
  });
});

// ── createLogger ────────────────────────────────────────────────────────────

describe("createLogger", () => {
  it("creates a silent json logger with children", () => {
    const logger = createLogger({ level: "silent", format: "json" });
    const child = logger.child({ module: "test" });
    expect(() => child.info("hidden", { a: 1 })).not.toThrow();
  });
});

describe("errorMessage", () => {
  it("uses Error.message and stringifies anything else", () => {
    expect(errorMessage(new Error("smtp down"))).toBe("smtp down");
    expect(errorMessage(42)).toBe("42");
  });
});
