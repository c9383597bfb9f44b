/**
 * Anthropic Messages API Client
 *
 * One HTTP attempt per send(). Every failure is raised as an APIError
 * carrying the HTTP status (0 for network failures, 408 for timeouts) so
 * the retry layer can classify it without parsing messages.
 */

import { APIError, errorMessage } from "../errors.js";
import type {
  ModelClient,
  ModelRequest,
  ModelResponse,
  ResponseBlock,
} from "./types.js";

export const ANTHROPIC_VERSION = "2023-06-01";
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

export interface AnthropicClientOptions {
  apiKey: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

// ============================================
// RESPONSE PARSING
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseBlock(value: unknown): ResponseBlock | null {
  if (!isRecord(value)) return null;
  switch (value.type) {
    case "text":
      return typeof value.text === "string" ? { type: "text", text: value.text } : null;
    case "tool_use":
      if (typeof value.id !== "string" || typeof value.name !== "string") return null;
      return { type: "tool_use", id: value.id, name: value.name, input: isRecord(value.input) ? value.input : {} };
    case "thinking":
      return {
        type: "thinking",
        thinking: typeof value.thinking === "string" ? value.thinking : "",
        ...(typeof value.signature === "string" ? { signature: value.signature } : {}),
      };
    default:
      // redacted_thinking, server tool blocks, etc. carry nothing we use
      return null;
  }
}

export function parseMessageResponse(data: unknown, fallbackModel: string): ModelResponse {
  if (!isRecord(data) || !Array.isArray(data.content)) {
    throw new APIError("Malformed response from model provider", 200);
  }

  const content = data.content
    .map(parseBlock)
    .filter((block): block is ResponseBlock => block !== null);
  const usage = isRecord(data.usage) ? data.usage : {};

  return {
    id: typeof data.id === "string" ? data.id : "",
    model: typeof data.model === "string" ? data.model : fallbackModel,
    content,
    stopReason: typeof data.stop_reason === "string" ? data.stop_reason : null,
    usage: {
      inputTokens: typeof usage.input_tokens === "number" ? usage.input_tokens : 0,
      outputTokens: typeof usage.output_tokens === "number" ? usage.output_tokens : 0,
    },
  };
}

/** Seconds from a Retry-After header; HTTP-date values are ignored. */
export function parseRetryAfter(header: string | null): number | undefined {
  if (header === null) return undefined;
  const seconds = Number(header.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

async function readErrorMessage(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (isRecord(body) && isRecord(body.error) && typeof body.error.message === "string") {
      return body.error.message;
    }
  } catch {
    // Non-JSON error body
  }
  return "Unknown API error";
}

// ============================================
// CLIENT
// ============================================

export class AnthropicClient implements ModelClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: AnthropicClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? "https://api.anthropic.com";
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(request: ModelRequest): Promise<ModelResponse> {
    const body: Record<string, unknown> = {
      model: request.model,
      max_tokens: request.maxTokens,
      messages: request.messages,
    };
    if (request.system) body.system = request.system;
    if (request.tools?.length) body.tools = request.tools;
    if (request.temperature !== undefined) body.temperature = request.temperature;
    if (request.thinkingBudgetTokens !== undefined) {
      body.thinking = { type: "enabled", budget_tokens: request.thinkingBudgetTokens };
    }

    const timeoutMs = request.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/v1/messages`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-api-key": this.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        throw new APIError("Request timed out", 408);
      }
      throw new APIError(`Network error: ${errorMessage(err)}`, 0);
    }

    if (!response.ok) {
      const message = await readErrorMessage(response);
      throw new APIError(message, response.status, parseRetryAfter(response.headers.get("retry-after")));
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new APIError(`Malformed response from model provider: ${errorMessage(err)}`, 200);
    }
    return parseMessageResponse(data, request.model);
  }
}
