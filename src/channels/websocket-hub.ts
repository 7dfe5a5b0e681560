import { randomUUID } from "node:crypto";
import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import type { ChangeEvent, ChangeKind } from "../types/events.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER, errorMessage } from "../observability/logger.ts";
import { ChannelDeliveryError, type NotificationChannel } from "./types.ts";

// ── Wire Messages ───────────────────────────────────────────────────────────

export type HubMessage =
  | { readonly type: "connection_established"; readonly clientId: string }
  | { readonly type: "outage_update"; readonly event: ChangeEvent }
  | { readonly type: "subscribed"; readonly status: "ok" }
  | {
      readonly type: "outage_summary";
      readonly eventId: string;
      readonly serviceId: string;
      readonly kind: ChangeKind;
      readonly summary: string;
    };

/** The part of a `ws` socket the hub writes to. */
export interface ClientSocket {
  send(data: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export interface ChannelRegistry {
  register(channel: NotificationChannel): void;
  unregister(channelId: string): boolean;
}

// ── Config ──────────────────────────────────────────────────────────────────

export interface WebSocketHubConfig {
  /** Messages held per client beyond the one in flight; oldest dropped first. */
  readonly maxQueue: number;
  readonly path: string;
}

export const DEFAULT_WEBSOCKET_HUB_CONFIG: WebSocketHubConfig = {
  maxQueue: 100,
  path: "/ws",
};

// ── Per-client Channel ──────────────────────────────────────────────────────

export class WebSocketClientChannel implements NotificationChannel {
  readonly id: string;
  private readonly queue: string[] = [];
  private sending = false;
  private closed = false;
  private droppedCount = 0;

  constructor(
    readonly clientId: string,
    private readonly socket: ClientSocket,
    private readonly maxQueue: number,
    private readonly logger: Logger,
  ) {
    this.id = `ws:${clientId}`;
  }

  /** Enqueues only; a slow client never holds up the dispatcher. */
  async deliver(event: ChangeEvent): Promise<void> {
    this.enqueue({ type: "outage_update", event });
  }

  enqueue(message: HubMessage): void {
    if (this.closed) {
      throw new ChannelDeliveryError(
        `Client ${this.clientId} is disconnected`,
        this.id,
        "CLOSED",
      );
    }
    if (this.queue.length >= this.maxQueue) {
      this.queue.shift();
      this.droppedCount++;
      this.logger.warn("ws_queue_overflow", {
        clientId: this.clientId,
        dropped: this.droppedCount,
      });
    }
    this.queue.push(JSON.stringify(message));
    this.pump();
  }

  get pending(): number {
    return this.queue.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(code?: number, reason?: string): void {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    if (code !== undefined) {
      this.socket.close(code, reason);
    }
  }

  private pump(): void {
    if (this.sending || this.closed) return;
    const next = this.queue.shift();
    if (next === undefined) return;

    this.sending = true;
    try {
      this.socket.send(next, (err) => {
        this.sending = false;
        if (err) {
          this.logger.warn("ws_send_failed", {
            clientId: this.clientId,
            error: err.message,
          });
        }
        this.pump();
      });
    } catch (err: unknown) {
      this.sending = false;
      this.logger.warn("ws_send_failed", {
        clientId: this.clientId,
        error: errorMessage(err),
      });
    }
  }
}

// ── Hub ─────────────────────────────────────────────────────────────────────

export interface WebSocketHubDeps {
  readonly registry: ChannelRegistry;
  readonly logger?: Logger;
  readonly config?: Partial<WebSocketHubConfig>;
  readonly generateId?: () => string;
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export class WebSocketHub {
  private readonly clients = new Map<string, WebSocketClientChannel>();
  private readonly registry: ChannelRegistry;
  private readonly logger: Logger;
  private readonly config: WebSocketHubConfig;
  private readonly generateId: () => string;
  private server: WebSocketServer | null = null;

  constructor(deps: WebSocketHubDeps) {
    this.registry = deps.registry;
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "websocket-hub" });
    this.config = { ...DEFAULT_WEBSOCKET_HUB_CONFIG, ...deps.config };
    this.generateId = deps.generateId ?? randomUUID;
  }

  // ── Client Lifecycle ────────────────────────────────────────────────────

  attach(socket: ClientSocket): WebSocketClientChannel {
    const clientId = this.generateId();
    const channel = new WebSocketClientChannel(
      clientId,
      socket,
      this.config.maxQueue,
      this.logger,
    );
    this.clients.set(clientId, channel);
    this.registry.register(channel);
    channel.enqueue({ type: "connection_established", clientId });
    this.logger.info("ws_client_connected", {
      clientId,
      clients: this.clients.size,
    });
    return channel;
  }

  handleMessage(clientId: string, raw: string): void {
    const channel = this.clients.get(clientId);
    if (!channel) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn("ws_message_invalid", { clientId });
      return;
    }

    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "type" in parsed &&
      parsed.type === "subscribe"
    ) {
      this.logger.debug("ws_subscribe", { clientId });
      channel.enqueue({ type: "subscribed", status: "ok" });
      return;
    }
    this.logger.debug("ws_message_ignored", { clientId });
  }

  detach(clientId: string): void {
    const channel = this.clients.get(clientId);
    if (!channel) return;
    channel.close();
    this.clients.delete(clientId);
    this.registry.unregister(channel.id);
    this.logger.info("ws_client_disconnected", {
      clientId,
      clients: this.clients.size,
    });
  }

  /** Queues a message for every connected client; returns how many got it. */
  broadcast(message: HubMessage): number {
    let count = 0;
    for (const channel of this.clients.values()) {
      if (channel.isClosed) continue;
      channel.enqueue(message);
      count++;
    }
    return count;
  }

  clientCount(): number {
    return this.clients.size;
  }

  // ── Server Integration ──────────────────────────────────────────────────

  /** Accepts WebSocket upgrades on the configured path of an HTTP server. */
  listen(httpServer: Server): void {
    const wss = new WebSocketServer({ noServer: true });
    this.server = wss;

    wss.on("connection", (ws: WebSocket) => {
      const channel = this.attach(ws);
      ws.on("message", (data: RawData) => {
        this.handleMessage(channel.clientId, rawToString(data));
      });
      ws.on("close", () => {
        this.detach(channel.clientId);
      });
      ws.on("error", (err: Error) => {
        this.logger.warn("ws_socket_error", {
          clientId: channel.clientId,
          error: err.message,
        });
      });
    });

    httpServer.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      const path = new URL(req.url ?? "/", "http://localhost").pathname;
      if (path !== this.config.path) {
        socket.destroy();
        return;
      }
      wss.handleUpgrade(req, socket, head, (ws) => {
        wss.emit("connection", ws, req);
      });
    });

    this.logger.info("ws_listening", { path: this.config.path });
  }

  async close(): Promise<void> {
    for (const [clientId, channel] of [...this.clients]) {
      channel.close(1001, "server shutting down");
      this.clients.delete(clientId);
      this.registry.unregister(channel.id);
    }

    const wss = this.server;
    this.server = null;
    if (!wss) return;
    await new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
