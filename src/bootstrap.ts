import { getConnInfo } from "@hono/node-server/conninfo";
import type { Context, Hono } from "hono";
import type { RuntimeConfig } from "./config.ts";
import { createLogger } from "./observability/logger.ts";
import type { Logger } from "./observability/logger.ts";
import { errorMessage } from "./observability/logger.ts";
import { MonitorMetrics } from "./observability/metrics.ts";
import { InMemoryStateStore, type StateStore } from "./store/state-store.ts";
import { EventDispatcher } from "./dispatcher/event-dispatcher.ts";
import { EventLogChannel } from "./channels/event-log-channel.ts";
import { WebSocketHub } from "./channels/websocket-hub.ts";
import {
  EmailChannel,
  createSmtpTransport,
  type MailSender,
} from "./channels/email-channel.ts";
import { AiEnrichmentChannel } from "./channels/ai-enrichment-channel.ts";
import { AnthropicSummarizer, type Summarizer } from "./ai/summarizer.ts";
import { HttpStatusScraper, type StatusFetcher } from "./scraper/status-scraper.ts";
import { CycleScheduler } from "./scheduler/cycle-scheduler.ts";
import { StatusQueryService } from "./api/query-service.ts";
import { RateLimiter } from "./api/rate-limiter.ts";
import { createApiApp } from "./api/app.ts";
import { createApiServer, type ApiServer } from "./api/server.ts";

// ── Application Interface ──────────────────────────────────────────────────

export interface Application {
  readonly config: RuntimeConfig;
  readonly logger: Logger;
  readonly metrics: MonitorMetrics;
  readonly store: StateStore;
  readonly dispatcher: EventDispatcher;
  readonly eventLog: EventLogChannel;
  readonly hub: WebSocketHub;
  readonly scheduler: CycleScheduler;
  readonly queries: StatusQueryService;
  readonly app: Hono;
  /** Null when the REST surface is disabled. */
  readonly server: ApiServer | null;

  start(): Promise<void>;
  shutdown(): Promise<void>;
}

/** Replacements for the collaborators that reach outside the process. */
export interface BootstrapOptions {
  readonly logger?: Logger;
  readonly fetcher?: StatusFetcher;
  readonly mailTransport?: MailSender;
  readonly summarizer?: Summarizer;
  readonly clock?: () => Date;
  /** Serve the REST and WebSocket surface. Defaults to true. */
  readonly api?: boolean;
  /** Install SIGINT/SIGTERM handlers. Defaults to true. */
  readonly signals?: boolean;
}

function remoteAddressOf(c: Context): string | undefined {
  try {
    return getConnInfo(c).remote.address;
  } catch {
    // app.request() calls carry no socket
    return undefined;
  }
}

// ── Bootstrap ──────────────────────────────────────────────────────────────

/**
 * Wire all modules together with real implementations.
 * This is the composition root: the single place where dependency injection happens.
 */
export function bootstrap(
  config: RuntimeConfig,
  options: BootstrapOptions = {},
): Application {
  // 1. Logger first, so every later module can log
  const logger =
    options.logger ??
    createLogger({ level: config.logging.level, format: config.logging.format });
  const log = logger.child({ module: "bootstrap" });
  const clock = options.clock ?? (() => new Date());

  log.info("bootstrapping", {
    services: config.services.length,
    intervalMs: config.scraping.intervalMs,
    concurrency: config.scraping.concurrency,
    email: config.email !== undefined,
    ai: config.ai !== undefined,
  });

  // 2. Metrics and state
  const metrics = new MonitorMetrics(clock);
  const store = new InMemoryStateStore();

  // 3. Dispatcher and channels
  const dispatcher = new EventDispatcher({
    logger,
    metrics,
    config: { deliveryTimeoutMs: config.dispatch.deliveryTimeoutMs },
  });

  const eventLog = new EventLogChannel({
    config: { retentionMs: config.dispatch.eventHistoryHours * 60 * 60 * 1000 },
    clock,
  });
  dispatcher.register(eventLog);

  const hub = new WebSocketHub({
    registry: dispatcher,
    logger,
    config: { maxQueue: config.dispatch.wsMaxQueue },
  });

  const serviceNames = new Map(config.services.map((s) => [s.id, s.name]));
  let emailChannel: EmailChannel | null = null;
  if (config.email) {
    emailChannel = new EmailChannel({
      transport: options.mailTransport ?? createSmtpTransport(config.email.smtp),
      config: { sender: config.email.sender, recipients: config.email.recipients },
      serviceNames,
      logger,
    });
    dispatcher.register(emailChannel);
  }

  const summarizer =
    options.summarizer ??
    (config.ai
      ? new AnthropicSummarizer({
          apiKey: config.ai.apiKey,
          config: {
            model: config.ai.model,
            maxTokens: config.ai.maxTokens,
            timeoutMs: config.ai.timeoutMs,
          },
          logger,
        })
      : null);
  if (summarizer) {
    dispatcher.register(new AiEnrichmentChannel({ summarizer, publisher: hub, logger }));
  }

  // 4. Scraper and scheduler
  const urls = new Map<string, string>();
  for (const service of config.services) {
    if (service.url) urls.set(service.id, service.url);
  }
  const fetcher =
    options.fetcher ??
    new HttpStatusScraper({
      config: {
        baseUrl: config.scraping.baseUrl,
        timeoutMs: config.scraping.timeoutMs,
        retryAttempts: config.scraping.retryAttempts,
        retryDelayMs: config.scraping.retryDelayMs,
      },
      logger,
      clock,
      urls,
    });

  const scheduler = new CycleScheduler({
    services: config.services.map((s) => s.id),
    fetcher,
    store,
    dispatcher,
    logger,
    metrics,
    clock,
    config: {
      intervalMs: config.scraping.intervalMs,
      concurrency: config.scraping.concurrency,
      shutdownGraceMs: config.lifecycle.shutdownGraceMs,
      runOnStart: config.lifecycle.runOnStart,
      thresholds: config.thresholds,
    },
  });

  // 5. Query surface
  const queries = new StatusQueryService({
    store,
    history: eventLog,
    services: config.services,
  });
  const app = createApiApp({
    queries,
    metrics,
    rateLimiter: new RateLimiter({ limit: config.api.rateLimitPerMinute, windowMs: 60_000 }),
    logger,
    clock,
    remoteAddress: remoteAddressOf,
    websocketClients: () => hub.clientCount(),
    historyHours: config.dispatch.eventHistoryHours,
  });
  const server =
    options.api === false
      ? null
      : createApiServer({
          app,
          config: { host: config.api.host, port: config.api.port },
          hub,
          logger,
        });

  // 6. Lifecycle
  let shuttingDown = false;

  const application: Application = {
    config,
    logger,
    metrics,
    store,
    dispatcher,
    eventLog,
    hub,
    scheduler,
    queries,
    app,
    server,

    async start(): Promise<void> {
      log.info("starting", { channels: dispatcher.channelIds() });
      server?.start();
      scheduler.start();
    },

    async shutdown(): Promise<void> {
      if (shuttingDown) return;
      shuttingDown = true;
      log.info("shutting_down");

      // Stop producing events before closing their consumers
      try {
        await scheduler.stop();
        log.info("scheduler_stopped");
      } catch (err: unknown) {
        log.error("scheduler_stop_failed", { error: errorMessage(err) });
      }

      try {
        if (server) {
          await server.stop();
        } else {
          await hub.close();
        }
      } catch (err: unknown) {
        log.error("api_stop_failed", { error: errorMessage(err) });
      }

      emailChannel?.close();

      process.removeListener("SIGTERM", sigtermHandler);
      process.removeListener("SIGINT", sigintHandler);

      log.info("shutdown_complete");
    },
  };

  // 7. Signal handlers (first signal wins)
  let signalHandled = false;
  const onSignal = async (signal: string): Promise<void> => {
    if (signalHandled) return;
    signalHandled = true;
    log.info("signal_received", { signal });
    await application.shutdown();
    process.exit(0);
  };

  const fail = (err: unknown) => {
    log.fatal("signal_shutdown_failed", { error: errorMessage(err) });
    process.exit(1);
  };
  const sigtermHandler = () => {
    onSignal("SIGTERM").catch(fail);
  };
  const sigintHandler = () => {
    onSignal("SIGINT").catch(fail);
  };
  if (options.signals !== false) {
    process.on("SIGTERM", sigtermHandler);
    process.on("SIGINT", sigintHandler);
  }

  return application;
}
