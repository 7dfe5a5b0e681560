/**
 * outage-relay
 *
 * Samples public service status pages on a fixed interval, turns successive
 * snapshots into semantic change events and fans them out to notification
 * channels (event log, email, WebSocket clients, AI summaries).
 */
export const VERSION = "0.1.0";

export * from "./src/index.ts";
