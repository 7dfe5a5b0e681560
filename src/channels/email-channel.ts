import nodemailer from "nodemailer";
import type { SendMailOptions } from "nodemailer";
import type { ChangeEvent, ChangeKind } from "../types/events.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER, errorMessage } from "../observability/logger.ts";
import { ChannelDeliveryError, type NotificationChannel } from "./types.ts";

// ── SMTP Config ─────────────────────────────────────────────────────────────

export interface SmtpConfig {
  readonly host: string;
  readonly port: number;
  /** Upgrade the connection with STARTTLS. */
  readonly useTls: boolean;
  readonly username?: string;
  readonly password?: string;
}

export interface EmailConfig {
  readonly smtp: SmtpConfig;
  readonly sender: string;
  readonly recipients: readonly string[];
}

/** The slice of a nodemailer transporter the channel uses. */
export interface MailSender {
  sendMail(options: SendMailOptions): Promise<unknown>;
  close?(): void;
}

export function createSmtpTransport(smtp: SmtpConfig): MailSender {
  return nodemailer.createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.port === 465,
    requireTLS: smtp.useTls && smtp.port !== 465,
    auth:
      smtp.username && smtp.password
        ? { user: smtp.username, pass: smtp.password }
        : undefined,
    connectionTimeout: 30_000,
  });
}

// ── Message Rendering ───────────────────────────────────────────────────────

const SUBJECTS: Record<ChangeKind, (name: string) => string> = {
  NEW_OUTAGE: (name) => `[ALERT] ${name} is experiencing issues`,
  STATUS_CHANGED: (name) => `[UPDATE] ${name} status changed`,
  SEVERITY_INCREASED: (name) => `[CRITICAL] ${name} outage severity increased`,
  SEVERITY_DECREASED: (name) => `[INFO] ${name} outage severity decreased`,
  REPORT_COUNT_SPIKE: (name) => `[WARNING] ${name} reports spiking`,
  OUTAGE_RESOLVED: (name) => `[RESOLVED] ${name} issues resolved`,
};

export function subjectFor(event: ChangeEvent, serviceName: string): string {
  return SUBJECTS[event.kind](serviceName);
}

function kindLabel(kind: ChangeKind): string {
  return kind
    .toLowerCase()
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function renderText(event: ChangeEvent, serviceName: string): string {
  const lines = [
    `${kindLabel(event.kind)}: ${serviceName}`,
    "",
    `Status: ${event.previousStatus ?? "unknown"} -> ${event.newStatus}`,
    `Reports: ${event.previousReportCount ?? "unknown"} -> ${event.newReportCount}`,
    `Detected at: ${event.detectedAt}`,
  ];
  if (event.serviceUrl) {
    lines.push(`Details: ${event.serviceUrl}`);
  }
  return lines.join("\n");
}

export function renderHtml(event: ChangeEvent, serviceName: string): string {
  const name = escapeHtml(serviceName);
  const link = event.serviceUrl
    ? `<p><a href="${escapeHtml(event.serviceUrl)}">View status page</a></p>`
    : "";
  return [
    "<!DOCTYPE html>",
    '<html><head><meta charset="UTF-8"></head><body>',
    `<h2>${escapeHtml(kindLabel(event.kind))}: ${name}</h2>`,
    "<table>",
    `<tr><td>Status</td><td>${event.previousStatus ?? "unknown"}</td><td>${event.newStatus}</td></tr>`,
    `<tr><td>Reports</td><td>${event.previousReportCount ?? "unknown"}</td><td>${event.newReportCount}</td></tr>`,
    "</table>",
    `<p>Detected at ${escapeHtml(event.detectedAt)}</p>`,
    link,
    "</body></html>",
  ].join("\n");
}

// ── EmailChannel ────────────────────────────────────────────────────────────

export interface EmailChannelDeps {
  readonly transport: MailSender;
  readonly config: Omit<EmailConfig, "smtp">;
  /** Display names by service id; falls back to the id. */
  readonly serviceNames?: ReadonlyMap<string, string>;
  readonly logger?: Logger;
}

export class EmailChannel implements NotificationChannel {
  readonly id = "email";
  private readonly transport: MailSender;
  private readonly sender: string;
  private readonly recipients: readonly string[];
  private readonly serviceNames: ReadonlyMap<string, string>;
  private readonly logger: Logger;

  constructor(deps: EmailChannelDeps) {
    this.transport = deps.transport;
    this.sender = deps.config.sender;
    this.recipients = [...deps.config.recipients];
    this.serviceNames = deps.serviceNames ?? new Map();
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "email-channel" });
  }

  async deliver(event: ChangeEvent): Promise<void> {
    if (this.recipients.length === 0) {
      this.logger.warn("email_no_recipients", { eventId: event.id });
      return;
    }

    const serviceName = this.serviceNames.get(event.serviceId) ?? event.serviceId;
    try {
      await this.transport.sendMail({
        from: this.sender,
        to: this.recipients.join(", "),
        subject: subjectFor(event, serviceName),
        text: renderText(event, serviceName),
        html: renderHtml(event, serviceName),
      });
    } catch (err: unknown) {
      throw new ChannelDeliveryError(
        `Email delivery failed: ${errorMessage(err)}`,
        this.id,
        "TRANSPORT_FAILED",
        event.id,
      );
    }

    this.logger.info("email_sent", {
      eventId: event.id,
      serviceId: event.serviceId,
      recipients: this.recipients.length,
    });
  }

  close(): void {
    this.transport.close?.();
  }
}
