import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { secureHeaders } from "hono/secure-headers";
import { z } from "zod";
import { CHANGE_KINDS } from "../types/events.ts";
import { SERVICE_STATUSES } from "../types/snapshot.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { MonitorMetrics } from "../observability/metrics.ts";
import type { StatusQueryService } from "./query-service.ts";
import { clientKeyFrom, type RateLimiter } from "./rate-limiter.ts";

export const SERVICE_NAME = "outage-relay";
export const SERVICE_VERSION = "0.1.0";
export const API_PREFIX = "/api/v1";

const HOUR_MS = 60 * 60 * 1000;

// ── Validation Schemas ──────────────────────────────────────────────────────

const StatusQuerySchema = z.object({
  status: z
    .string()
    .transform((s) => s.toUpperCase())
    .pipe(z.enum(SERVICE_STATUSES))
    .optional(),
});

const ChangesQuerySchema = z.object({
  hours: z.coerce.number().int().min(1).max(168).default(24),
  service: z.string().min(1).optional(),
  kind: z.enum(CHANGE_KINDS).optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "query"}: ${issue.message}`)
    .join("; ");
}

// ── App ─────────────────────────────────────────────────────────────────────

export interface ApiAppDeps {
  readonly queries: StatusQueryService;
  readonly metrics: MonitorMetrics;
  readonly rateLimiter: RateLimiter;
  readonly logger?: Logger;
  readonly clock?: () => Date;
  /** Socket address of the caller, when the server exposes one. */
  readonly remoteAddress?: (c: Context) => string | undefined;
  readonly websocketClients?: () => number;
  /** Hours of change history the event log retains; caps `/changes?hours`. */
  readonly historyHours?: number;
}

export function createApiApp(deps: ApiAppDeps): Hono {
  const logger = (deps.logger ?? NULL_LOGGER).child({ module: "api" });
  const clock = deps.clock ?? (() => new Date());
  const { queries, metrics, rateLimiter } = deps;
  const app = new Hono();

  app.onError((err, c) => {
    logger.error("request_failed", {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
    });
    return c.json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } }, 500);
  });

  app.notFound((c) =>
    c.json({ error: { code: "NOT_FOUND", message: `No route for ${c.req.method} ${c.req.path}` } }, 404),
  );

  app.use("*", secureHeaders());
  app.use(
    "*",
    cors({
      origin: "*",
      allowMethods: ["GET", "OPTIONS"],
      exposeHeaders: ["Retry-After", "X-RateLimit-Limit", "X-RateLimit-Remaining"],
    }),
  );

  // ── Rate Limiting ───────────────────────────────────────────────────────

  app.use(`${API_PREFIX}/*`, async (c, next) => {
    if (c.req.path === `${API_PREFIX}/health`) {
      await next();
      return;
    }

    const clientKey = clientKeyFrom({
      forwardedFor: c.req.header("X-Forwarded-For"),
      realIp: c.req.header("X-Real-IP"),
      remoteAddress: deps.remoteAddress?.(c),
    });
    const decision = rateLimiter.check(clientKey);
    c.header("X-RateLimit-Limit", String(decision.limit));
    c.header("X-RateLimit-Remaining", String(decision.remaining));

    if (!decision.allowed) {
      logger.warn("rate_limit_exceeded", { clientKey, path: c.req.path });
      c.header("Retry-After", String(decision.retryAfterSeconds));
      return c.json(
        {
          error: {
            code: "RATE_LIMIT_EXCEEDED",
            message: "Rate limit exceeded. Please try again later.",
            retryAfterSeconds: decision.retryAfterSeconds,
          },
        },
        429,
      );
    }
    await next();
  });

  // ── Routes ──────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: [
        `${API_PREFIX}/health`,
        `${API_PREFIX}/metrics`,
        `${API_PREFIX}/status`,
        `${API_PREFIX}/status/:serviceId`,
        `${API_PREFIX}/changes`,
        `${API_PREFIX}/services`,
        "/ws",
      ],
    }),
  );

  app.get(`${API_PREFIX}/health`, (c) =>
    c.json({
      status: "healthy",
      version: SERVICE_VERSION,
      timestamp: clock().toISOString(),
      uptimeSeconds: metrics.uptimeSeconds(),
    }),
  );

  app.get(`${API_PREFIX}/metrics`, (c) =>
    c.json({
      ...metrics.getStats(),
      websocketClients: deps.websocketClients?.() ?? 0,
    }),
  );

  app.get(`${API_PREFIX}/status`, (c) => {
    const parsed = StatusQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json(
        { error: { code: "VALIDATION_ERROR", message: describeIssues(parsed.error) } },
        400,
      );
    }
    const services = queries.listAllStatuses(parsed.data);
    return c.json({
      services,
      totalCount: services.length,
      timestamp: clock().toISOString(),
    });
  });

  app.get(`${API_PREFIX}/status/:serviceId`, (c) => {
    const serviceId = c.req.param("serviceId");
    const snapshot = queries.getCurrentStatus(serviceId);
    if (!snapshot) {
      return c.json(
        {
          error: {
            code: "NOT_FOUND",
            message: "Service not found",
            details: `The service '${serviceId}' is not being monitored`,
          },
          timestamp: clock().toISOString(),
        },
        404,
      );
    }
    return c.json(snapshot);
  });

  app.get(`${API_PREFIX}/changes`, (c) => {
    const parsed = ChangesQuerySchema.safeParse(c.req.query());
    if (!parsed.success) {
      return c.json(
        { error: { code: "VALIDATION_ERROR", message: describeIssues(parsed.error) } },
        400,
      );
    }
    const { service, kind } = parsed.data;
    const hours = Math.min(parsed.data.hours, deps.historyHours ?? parsed.data.hours);
    const now = clock();
    const changes = queries.listRecentEvents(hours * HOUR_MS, { serviceId: service, kind });
    return c.json({
      changes,
      totalCount: changes.length,
      timeRange: {
        start: new Date(now.getTime() - hours * HOUR_MS).toISOString(),
        end: now.toISOString(),
      },
    });
  });

  app.get(`${API_PREFIX}/services`, (c) => {
    const services = queries.listServices();
    return c.json({
      services,
      count: services.length,
      timestamp: clock().toISOString(),
    });
  });

  return app;
}
