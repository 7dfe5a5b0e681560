import Anthropic from "@anthropic-ai/sdk";
import type { ChangeEvent, ChangeKind } from "../types/events.ts";
import type { Logger } from "../observability/logger.ts";
import { NULL_LOGGER, errorMessage } from "../observability/logger.ts";

// ── Types ────────────────────────────────────────────────────────────────────

export interface Summarizer {
  summarize(event: ChangeEvent, signal?: AbortSignal): Promise<string>;
}

export interface SummaryRequest {
  readonly model: string;
  readonly max_tokens: number;
  readonly system: string;
  readonly messages: Array<{ role: "user"; content: string }>;
}

export interface SummaryResponse {
  readonly model: string;
  readonly content: ReadonlyArray<{ readonly type: string; readonly text?: string }>;
  readonly usage: { readonly input_tokens: number; readonly output_tokens: number };
}

/** The slice of `Anthropic#messages` the summarizer calls. */
export interface MessagesApi {
  create(
    body: SummaryRequest,
    options?: { timeout?: number; signal?: AbortSignal },
  ): Promise<SummaryResponse>;
}

// ── Error ────────────────────────────────────────────────────────────────────

export type EnrichmentErrorCode =
  | "RATE_LIMITED"
  | "API_ERROR"
  | "TIMEOUT"
  | "ABORTED"
  | "RESPONSE_EMPTY";

export class EnrichmentError extends Error {
  override readonly name = "EnrichmentError";

  constructor(
    message: string,
    readonly code: EnrichmentErrorCode,
    override readonly cause?: Error,
  ) {
    super(message);
  }
}

// ── Config ───────────────────────────────────────────────────────────────────

export interface SummarizerConfig {
  readonly model: string;
  readonly maxTokens: number;
  readonly timeoutMs: number;
  /** Retries performed by the SDK on 429 and 5xx. */
  readonly maxRetries: number;
}

export const DEFAULT_SUMMARIZER_CONFIG: SummarizerConfig = {
  model: "claude-haiku-4-5-20251001",
  maxTokens: 500,
  timeoutMs: 30_000,
  maxRetries: 2,
};

// ── Prompt ───────────────────────────────────────────────────────────────────

export const SYSTEM_PROMPT =
  "You are a technical journalist covering internet infrastructure. " +
  "Write short, factual, professional updates for end users.";

const KIND_PHRASES: Record<ChangeKind, string> = {
  NEW_OUTAGE: "has started reporting problems",
  STATUS_CHANGED: "changed status",
  SEVERITY_INCREASED: "got worse",
  SEVERITY_DECREASED: "is improving",
  REPORT_COUNT_SPIKE: "saw a sudden spike in user reports",
  OUTAGE_RESOLVED: "appears to have recovered",
};

export function buildPrompt(event: ChangeEvent): string {
  const lines = [
    `Service: ${event.serviceId}`,
    `What happened: the service ${KIND_PHRASES[event.kind]}.`,
    `Status: ${event.previousStatus ?? "unknown"} -> ${event.newStatus}`,
    `User reports: ${event.previousReportCount ?? "unknown"} -> ${event.newReportCount}`,
    `Observed at: ${event.detectedAt}`,
  ];
  return [
    "Write a 2-4 sentence update about the following service status change.",
    "Explain the likely impact on users. Do not speculate about causes.",
    "",
    ...lines,
  ].join("\n");
}

// ── AnthropicSummarizer ──────────────────────────────────────────────────────

export interface AnthropicSummarizerDeps {
  /** Injected messages API; defaults to a client built from `apiKey`. */
  readonly messages?: MessagesApi;
  readonly apiKey?: string;
  readonly config?: Partial<SummarizerConfig>;
  readonly logger?: Logger;
}

export class AnthropicSummarizer implements Summarizer {
  private readonly messages: MessagesApi;
  private readonly config: SummarizerConfig;
  private readonly logger: Logger;

  constructor(deps: AnthropicSummarizerDeps = {}) {
    this.config = { ...DEFAULT_SUMMARIZER_CONFIG, ...deps.config };
    this.messages =
      deps.messages ??
      new Anthropic({ apiKey: deps.apiKey, maxRetries: this.config.maxRetries }).messages;
    this.logger = (deps.logger ?? NULL_LOGGER).child({ module: "summarizer" });
  }

  async summarize(event: ChangeEvent, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new EnrichmentError("Request aborted", "ABORTED");
    }

    const startTime = Date.now();
    let response: SummaryResponse;
    try {
      response = await this.messages.create(
        {
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          system: SYSTEM_PROMPT,
          messages: [{ role: "user", content: buildPrompt(event) }],
        },
        {
          timeout: this.config.timeoutMs,
          ...(signal ? { signal } : {}),
        },
      );
    } catch (err: unknown) {
      const error = toEnrichmentError(err);
      this.logger.error("summary_request_failed", {
        eventId: event.id,
        code: error.code,
        error: error.message,
      });
      throw error;
    }

    const text = response.content
      .map((block) => (block.type === "text" ? (block.text ?? "") : ""))
      .join("")
      .trim();

    if (text.length === 0) {
      throw new EnrichmentError("Model returned no text", "RESPONSE_EMPTY");
    }

    this.logger.info("summary_generated", {
      eventId: event.id,
      model: response.model,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      durationMs: Date.now() - startTime,
    });
    return text;
  }
}

// ── Error Classification ─────────────────────────────────────────────────────

export function toEnrichmentError(err: unknown): EnrichmentError {
  if (err instanceof EnrichmentError) return err;
  const cause = err instanceof Error ? err : undefined;
  const message = errorMessage(err);

  // APIConnectionTimeoutError extends APIError, so it must be checked first
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new EnrichmentError(`Request timed out: ${message}`, "TIMEOUT", cause);
  }
  if (err instanceof Anthropic.APIUserAbortError) {
    return new EnrichmentError(`Request aborted: ${message}`, "ABORTED", cause);
  }
  if (err instanceof Anthropic.APIError && err.status === 429) {
    return new EnrichmentError(`Rate limited: ${message}`, "RATE_LIMITED", cause);
  }
  if (err instanceof Error && err.name === "AbortError") {
    return new EnrichmentError(`Request aborted: ${message}`, "ABORTED", cause);
  }
  return new EnrichmentError(message, "API_ERROR", cause);
}
