import type { ChangeEvent } from "../types/events.ts";

// ── Notification Channel ────────────────────────────────────────────────────

/**
 * A destination for change events. `deliver` resolves once the channel has
 * accepted the event; any rejection counts as a failed delivery for this
 * channel only.
 */
export interface NotificationChannel {
  readonly id: string;
  deliver(event: ChangeEvent): Promise<void>;
}

// ── Errors ──────────────────────────────────────────────────────────────────

export type ChannelErrorCode =
  | "TRANSPORT_FAILED"
  | "TIMEOUT"
  | "CLOSED"
  | "ENRICHMENT_FAILED";

export class ChannelDeliveryError extends Error {
  override readonly name = "ChannelDeliveryError";

  constructor(
    message: string,
    public readonly channelId: string,
    public readonly code: ChannelErrorCode,
    public readonly eventId?: string,
  ) {
    super(message);
  }
}
