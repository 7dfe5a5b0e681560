import { Server as HttpServer } from "node:http";
import { serve, type ServerType } from "@hono/node-server";
import type { Hono } from "hono";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER } from "../observability/logger.ts";
import type { WebSocketHub } from "../channels/websocket-hub.ts";

// ── Server Types ────────────────────────────────────────────────────────────

export interface ApiServerConfig {
  readonly host: string;
  readonly port: number;
}

export interface ApiServer {
  readonly port: number;
  start(): void;
  stop(): Promise<void>;
  isRunning(): boolean;
}

export interface ApiServerDeps {
  readonly app: Hono;
  readonly config: ApiServerConfig;
  readonly hub?: WebSocketHub;
  readonly logger?: Logger;
}

// ── Factory ─────────────────────────────────────────────────────────────────

export function createApiServer(deps: ApiServerDeps): ApiServer {
  const logger = (deps.logger ?? NULL_LOGGER).child({ module: "api-server" });
  let server: ServerType | null = null;
  let boundPort = deps.config.port;

  return {
    get port() {
      return boundPort;
    },

    start() {
      if (server !== null) return;
      server = serve(
        { fetch: deps.app.fetch, port: deps.config.port, hostname: deps.config.host },
        (info) => {
          boundPort = info.port;
          logger.info("api_listening", { host: info.address, port: info.port });
        },
      );
      if (deps.hub && server instanceof HttpServer) {
        deps.hub.listen(server);
      }
    },

    async stop() {
      const current = server;
      if (current === null) return;
      server = null;
      await deps.hub?.close();
      await new Promise<void>((resolve, reject) => {
        current.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      logger.info("api_stopped");
    },

    isRunning() {
      return server !== null;
    },
  };
}
