import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { LOG_LEVELS, LOG_FORMATS } from "./observability/logger.ts";
import type { LogLevel, LogFormat } from "./observability/logger.ts";
import {
  validateThresholds,
  type DetectorThresholds,
} from "./detector/change-detector.ts";
import type { ServiceInfo } from "./api/query-service.ts";

// ── Runtime Configuration ──────────────────────────────────────────────────

export interface RuntimeConfig {
  readonly services: readonly ServiceInfo[];
  readonly scraping: {
    readonly intervalMs: number;
    readonly timeoutMs: number;
    readonly concurrency: number;
    readonly baseUrl: string;
    readonly retryAttempts: number;
    readonly retryDelayMs: number;
  };
  readonly thresholds: DetectorThresholds;
  readonly lifecycle: {
    readonly runOnStart: boolean;
    readonly shutdownGraceMs: number;
  };
  readonly dispatch: {
    readonly deliveryTimeoutMs: number;
    readonly eventHistoryHours: number;
    readonly wsMaxQueue: number;
  };
  /** Absent when no SMTP host is configured. */
  readonly email: {
    readonly smtp: {
      readonly host: string;
      readonly port: number;
      readonly useTls: boolean;
      readonly username: string | undefined;
      readonly password: string | undefined;
    };
    readonly sender: string;
    readonly recipients: readonly string[];
  } | undefined;
  /** Absent when ANTHROPIC_API_KEY is unset. */
  readonly ai: {
    readonly apiKey: string;
    readonly model: string;
    readonly maxTokens: number;
    readonly timeoutMs: number;
  } | undefined;
  readonly api: {
    readonly host: string;
    readonly port: number;
    readonly rateLimitPerMinute: number;
  };
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
  };
}

export const DEFAULT_SERVICES = "google,facebook,twitter,instagram,whatsapp";

// ── Config Error ───────────────────────────────────────────────────────────

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(
    message: string,
    readonly field: string,
  ) {
    super(message);
  }
}

// ── Field Parsers ──────────────────────────────────────────────────────────

type Env = (key: string) => string | undefined;

function intField(env: Env, key: string, fallback: number, min: number): number {
  const raw = env(key)?.trim();
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(
      `${key} must be an integer >= ${min}, got "${raw}".`,
      key,
    );
  }
  return value;
}

function numberField(env: Env, key: string, fallback: number): number {
  const raw = env(key)?.trim();
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}".`, key);
  }
  return value;
}

function boolField(env: Env, key: string, fallback: boolean): boolean {
  const raw = env(key)?.trim().toLowerCase();
  if (raw === undefined || raw === "") return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${key} must be a boolean, got "${raw}".`, key);
}

function optionalString(env: Env, key: string): string | undefined {
  const raw = env(key)?.trim();
  return raw ? raw : undefined;
}

function listField(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function oneOf<T extends string>(
  allowed: readonly T[],
  raw: string,
  key: string,
): T {
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new ConfigError(
      `${key} must be one of: ${allowed.join(", ")}. Got "${raw}".`,
      key,
    );
  }
  return match;
}

// ── Service Catalog ────────────────────────────────────────────────────────

const SERVICE_ID_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

function checkServiceId(id: string, field: string): string {
  const normalized = id.trim().toLowerCase();
  if (!SERVICE_ID_PATTERN.test(normalized)) {
    throw new ConfigError(`Invalid service id "${id}" in ${field}.`, field);
  }
  return normalized;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a YAML service catalog of the form
 * `services: [{ id, name?, url? }]`.
 */
export function parseServiceCatalog(content: string, field = "SERVICES_FILE"): ServiceInfo[] {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err: unknown) {
    throw new ConfigError(
      `${field} is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
      field,
    );
  }
  if (!isRecord(raw) || !Array.isArray(raw.services)) {
    throw new ConfigError(`${field} must contain a "services" list.`, field);
  }

  return raw.services.map((entry: unknown, index: number): ServiceInfo => {
    if (typeof entry === "string") {
      const id = checkServiceId(entry, field);
      return { id, name: id };
    }
    if (!isRecord(entry) || typeof entry.id !== "string") {
      throw new ConfigError(`${field}: services[${index}] needs a string "id".`, field);
    }
    const id = checkServiceId(entry.id, field);
    const name = typeof entry.name === "string" && entry.name.trim() ? entry.name.trim() : id;
    if (entry.url !== undefined && typeof entry.url !== "string") {
      throw new ConfigError(`${field}: services[${index}].url must be a string.`, field);
    }
    return entry.url ? { id, name, url: entry.url } : { id, name };
  });
}

function loadServices(env: Env): ServiceInfo[] {
  const file = optionalString(env, "SERVICES_FILE");
  let services: ServiceInfo[];
  if (file) {
    const path = resolve(process.cwd(), file);
    let content: string;
    try {
      content = readFileSync(path, "utf-8");
    } catch (err: unknown) {
      throw new ConfigError(
        `SERVICES_FILE could not be read: ${path} (${err instanceof Error ? err.message : String(err)})`,
        "SERVICES_FILE",
      );
    }
    services = parseServiceCatalog(content);
  } else {
    services = listField(env("MONITORED_SERVICES") ?? DEFAULT_SERVICES).map((id) => {
      const normalized = checkServiceId(id, "MONITORED_SERVICES");
      return { id: normalized, name: normalized };
    });
  }

  const field = file ? "SERVICES_FILE" : "MONITORED_SERVICES";
  if (services.length === 0) {
    throw new ConfigError(`${field} must name at least one service.`, field);
  }
  const seen = new Set<string>();
  for (const service of services) {
    if (seen.has(service.id)) {
      throw new ConfigError(`Duplicate service id "${service.id}" in ${field}.`, field);
    }
    seen.add(service.id);
  }
  return services;
}

// ── Load Config ────────────────────────────────────────────────────────────

/**
 * Load runtime configuration from environment variables.
 *
 * @param envOverrides Env-var-style overrides for testing. A key present in
 *   the map wins over `process.env`, even when its value is undefined.
 * @throws ConfigError if a field is missing or invalid.
 */
export function loadConfig(
  envOverrides?: Record<string, string | undefined>,
): RuntimeConfig {
  const env: Env = (key) =>
    envOverrides && key in envOverrides ? envOverrides[key] : process.env[key];

  const services = loadServices(env);

  // ── Scraping ───────────────────────────────────────────────────────────
  const scraping = {
    intervalMs: intField(env, "SCRAPE_INTERVAL_SECONDS", 600, 1) * 1000,
    timeoutMs: intField(env, "SCRAPE_TIMEOUT_MS", 30_000, 1),
    concurrency: intField(env, "SCRAPE_CONCURRENCY", 4, 1),
    baseUrl: optionalString(env, "SCRAPE_BASE_URL") ?? "https://downdetector.com/status",
    retryAttempts: intField(env, "SCRAPE_RETRY_ATTEMPTS", 3, 1),
    retryDelayMs: intField(env, "SCRAPE_RETRY_DELAY_MS", 5_000, 0),
  };

  // ── Detector ───────────────────────────────────────────────────────────
  const thresholds: DetectorThresholds = {
    spikeFactor: numberField(env, "SPIKE_FACTOR", 2),
    spikeMinAbsolute: numberField(env, "SPIKE_MIN_ABSOLUTE", 100),
  };
  const problem = validateThresholds(thresholds);
  if (problem) {
    const field = problem.field === "spikeFactor" ? "SPIKE_FACTOR" : "SPIKE_MIN_ABSOLUTE";
    throw new ConfigError(`${field}: ${problem.message}`, field);
  }

  // ── Lifecycle & Dispatch ───────────────────────────────────────────────
  const lifecycle = {
    runOnStart: boolField(env, "RUN_ON_START", true),
    shutdownGraceMs: intField(env, "SHUTDOWN_GRACE_MS", 10_000, 0),
  };
  const dispatch = {
    deliveryTimeoutMs: intField(env, "DELIVERY_TIMEOUT_MS", 10_000, 0),
    eventHistoryHours: intField(env, "EVENT_HISTORY_HOURS", 24, 1),
    wsMaxQueue: intField(env, "WS_MAX_QUEUE", 100, 1),
  };

  // ── Email ──────────────────────────────────────────────────────────────
  const smtpHost = optionalString(env, "EMAIL_SMTP_HOST");
  let email: RuntimeConfig["email"];
  if (smtpHost) {
    const sender = optionalString(env, "EMAIL_SENDER");
    if (!sender) {
      throw new ConfigError(
        "EMAIL_SENDER is required when EMAIL_SMTP_HOST is set.",
        "EMAIL_SENDER",
      );
    }
    email = {
      smtp: {
        host: smtpHost,
        port: intField(env, "EMAIL_SMTP_PORT", 587, 1),
        useTls: boolField(env, "EMAIL_USE_TLS", true),
        username: optionalString(env, "EMAIL_USERNAME"),
        password: env("EMAIL_PASSWORD") || undefined,
      },
      sender,
      recipients: listField(env("EMAIL_RECIPIENTS") ?? ""),
    };
  }

  // ── AI Summaries ───────────────────────────────────────────────────────
  const apiKey = optionalString(env, "ANTHROPIC_API_KEY");
  const ai = apiKey
    ? {
        apiKey,
        model: optionalString(env, "AI_MODEL") ?? "claude-haiku-4-5-20251001",
        maxTokens: intField(env, "AI_MAX_TOKENS", 500, 1),
        timeoutMs: intField(env, "AI_TIMEOUT_MS", 30_000, 1),
      }
    : undefined;

  // ── API ────────────────────────────────────────────────────────────────
  const api = {
    host: optionalString(env, "API_HOST") ?? "0.0.0.0",
    port: intField(env, "API_PORT", 8000, 0),
    rateLimitPerMinute: intField(env, "RATE_LIMIT_PER_MINUTE", 100, 1),
  };
  if (api.port > 65_535) {
    throw new ConfigError(`API_PORT must be <= 65535, got "${api.port}".`, "API_PORT");
  }

  // ── Logging ────────────────────────────────────────────────────────────
  const logging = {
    level: oneOf(LOG_LEVELS, (env("LOG_LEVEL") || "info").trim(), "LOG_LEVEL"),
    format: oneOf(LOG_FORMATS, (env("LOG_FORMAT") || "pretty").trim(), "LOG_FORMAT"),
  };

  // ── Build and freeze ──────────────────────────────────────────────────
  return Object.freeze({
    services: Object.freeze(services.map((s) => Object.freeze(s))),
    scraping: Object.freeze(scraping),
    thresholds: Object.freeze(thresholds),
    lifecycle: Object.freeze(lifecycle),
    dispatch: Object.freeze(dispatch),
    email: email
      ? Object.freeze({
          ...email,
          smtp: Object.freeze(email.smtp),
          recipients: Object.freeze([...email.recipients]),
        })
      : undefined,
    ai: ai ? Object.freeze(ai) : undefined,
    api: Object.freeze(api),
    logging: Object.freeze(logging),
  });
}
