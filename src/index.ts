export * from "./types/index.ts";

export {
  detect,
  isSpike,
  validateThresholds,
  DetectionError,
  DEFAULT_DETECTOR_THRESHOLDS,
  type DetectorThresholds,
  type DetectionErrorCode,
  type ThresholdProblem,
} from "./detector/change-detector.ts";

export {
  InMemoryStateStore,
  type StateStore,
  type StoreUpdate,
} from "./store/state-store.ts";

export {
  EventDispatcher,
  type DispatchResult,
  type ChannelOutcome,
  type DispatcherConfig,
} from "./dispatcher/event-dispatcher.ts";

export {
  ChannelDeliveryError,
  type NotificationChannel,
  type ChannelErrorCode,
} from "./channels/types.ts";
export { EventLogChannel, type EventFilter } from "./channels/event-log-channel.ts";
export { EmailChannel, createSmtpTransport, type MailSender } from "./channels/email-channel.ts";
export { WebSocketHub, type HubMessage } from "./channels/websocket-hub.ts";
export { AiEnrichmentChannel } from "./channels/ai-enrichment-channel.ts";
export {
  AnthropicSummarizer,
  EnrichmentError,
  type Summarizer,
} from "./ai/summarizer.ts";

export {
  HttpStatusScraper,
  FetchError,
  parseStatusPage,
  type StatusFetcher,
} from "./scraper/status-scraper.ts";

export {
  CycleScheduler,
  type CycleReport,
  type ServiceOutcome,
  type CycleSchedulerConfig,
} from "./scheduler/cycle-scheduler.ts";

export { StatusQueryService, type ServiceInfo } from "./api/query-service.ts";
export { RateLimiter } from "./api/rate-limiter.ts";
export { createApiApp } from "./api/app.ts";
export { createApiServer, type ApiServer } from "./api/server.ts";

export {
  createLogger,
  BufferLogger,
  NULL_LOGGER,
  type Logger,
} from "./observability/logger.ts";
export { MonitorMetrics, type MetricsSnapshot } from "./observability/metrics.ts";

export { loadConfig, ConfigError, type RuntimeConfig } from "./config.ts";
export { bootstrap, type Application, type BootstrapOptions } from "./bootstrap.ts";
