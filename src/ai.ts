import { setTimeout as delay } from "timers/promises";
import OpenAI, { type ClientOptions } from "openai";
import { z } from "zod";
import type { AppConfig } from "./config.js";
import {
  AuthenticationError,
  InterruptedError,
  NetworkError,
  RateLimitError,
  SmartFfmpegError,
  UpstreamError,
} from "./errors.js";
import { debug } from "./logger.js";
import type { ChatMessage, CommandRequest } from "./request.js";

export interface GeneratedCommand {
  command: string;
  explanation?: string;
  source: "llm";
  model: string;
}

export interface CommandGenerator {
  generateCommand(request: CommandRequest, signal?: AbortSignal): Promise<GeneratedCommand>;
}

export type CompletionClientConfig = Pick<
  AppConfig,
  "apiKey" | "model" | "baseUrl" | "timeoutMs" | "maxRetries"
>;

export interface CompletionClientOptions {
  fetch?: ClientOptions["fetch"];
  /** First backoff delay; doubles on each further retry. */
  retryBaseDelayMs?: number;
}

export const DEFAULT_RETRY_BASE_DELAY_MS = 500;

function isRetryable(err: SmartFfmpegError): boolean {
  return err instanceof RateLimitError || err instanceof NetworkError;
}

const commandReplySchema = z.object({
  command: z.string(),
  explanation: z.string().optional(),
});

export interface ParsedReply {
  command: string;
  explanation?: string;
}

function stripCodeFence(text: string): string {
  const fenced = text.match(/^```[\w-]*[ \t]*\n?([\s\S]*?)\n?```$/);
  return fenced ? fenced[1].trim() : text;
}

/**
 * Reduces a reply to exactly one command line. Backslash continuations are
 * joined and a leading `$ ` prompt marker is dropped. Several distinct command
 * lines are rejected rather than guessed between.
 */
export function normalizeCommandLine(text: string): string {
  const lines: string[] = [];
  let pending = "";
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimEnd();
    if (line.endsWith("\\")) {
      pending += line.slice(0, -1).trim() + " ";
      continue;
    }
    const joined = (pending + line.trim()).trim();
    pending = "";
    if (joined) lines.push(joined.replace(/^\$\s+/, ""));
  }
  if (pending.trim()) lines.push(pending.trim().replace(/^\$\s+/, ""));

  if (lines.length === 0) {
    throw new UpstreamError("Model returned an empty command.");
  }
  if (lines.length > 1) {
    throw new UpstreamError(
      `Model returned ${lines.length} command lines; expected exactly one.`,
      undefined,
      { lines }
    );
  }
  return lines[0];
}

export function parseCommandReply(content: string | null | undefined): ParsedReply {
  const text = stripCodeFence((content ?? "").trim());
  if (!text) {
    throw new UpstreamError("Model returned an empty response.");
  }

  if (!text.startsWith("{")) {
    return { command: normalizeCommandLine(text) };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new UpstreamError("Failed to parse model response as JSON.", undefined, {
      raw: text,
    });
  }
  const parsed = commandReplySchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamError("Model response has no string \"command\" field.", undefined, {
      raw: text,
    });
  }

  const explanation = parsed.data.explanation?.trim();
  return {
    command: normalizeCommandLine(parsed.data.command),
    ...(explanation ? { explanation } : {}),
  };
}

function toMessageParam(message: ChatMessage): OpenAI.ChatCompletionMessageParam {
  return message.role === "system"
    ? { role: "system", content: message.content }
    : { role: "user", content: message.content };
}

export function mapCompletionError(err: unknown): SmartFfmpegError {
  if (err instanceof SmartFfmpegError) return err;
  if (err instanceof OpenAI.APIUserAbortError) {
    return new InterruptedError("Request cancelled.");
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new NetworkError("Request to the model API timed out.");
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new NetworkError(`Could not reach the model API: ${err.message}`);
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status;
    if (status === 401 || status === 403) {
      return new AuthenticationError(status, `Model API rejected the credentials (HTTP ${status}).`);
    }
    if (status === 429) {
      return new RateLimitError("Model API rate limit reached (HTTP 429). Try again later.");
    }
    return new UpstreamError(
      `Model API request failed${status !== undefined ? ` (HTTP ${status})` : ""}: ${err.message}`,
      status
    );
  }
  // Anything else escaped the SDK while reading the body.
  const message = err instanceof Error ? err.message : String(err);
  return new UpstreamError(`Malformed response from the model API: ${message}`);
}

export class CompletionClient implements CommandGenerator {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;

  constructor(config: CompletionClientConfig, options: CompletionClientOptions = {}) {
    this.model = config.model;
    this.maxRetries = config.maxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    // Retries happen in requestContent, limited to rate-limit and network failures.
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0,
      defaultHeaders: { "X-Title": "smart-ffmpeg" },
      ...(options.fetch ? { fetch: options.fetch } : {}),
    });
  }

  async generateCommand(
    request: CommandRequest,
    signal?: AbortSignal
  ): Promise<GeneratedCommand> {
    const startedAt = Date.now();
    debug("requesting completion", { model: this.model, instruction: request.instruction });

    const content = await this.requestContent(request, signal);
    const reply = parseCommandReply(content);
    debug("completion received", { elapsedMs: Date.now() - startedAt, command: reply.command });

    return {
      command: reply.command,
      explanation: reply.explanation,
      source: "llm",
      model: this.model,
    };
  }

  private async requestContent(
    request: CommandRequest,
    signal?: AbortSignal
  ): Promise<string | null | undefined> {
    for (let attempt = 0; ; attempt++) {
      try {
        const completion = await this.client.chat.completions.create(
          {
            model: this.model,
            messages: request.messages.map(toMessageParam),
            response_format: { type: "json_object" },
          },
          { signal }
        );
        const choice = Array.isArray(completion.choices) ? completion.choices[0] : undefined;
        return choice?.message?.content;
      } catch (err) {
        const error = mapCompletionError(err);
        if (!isRetryable(error) || attempt >= this.maxRetries) throw error;

        const waitMs = this.retryBaseDelayMs * 2 ** attempt;
        debug("retrying completion", { attempt: attempt + 1, waitMs, code: error.code });
        try {
          await delay(waitMs, undefined, { signal });
        } catch {
          throw new InterruptedError("Request cancelled.");
        }
      }
    }
  }
}
