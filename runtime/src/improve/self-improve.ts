/**
 * Self-Improvement
 *
 * Reviews a finished conversation with the advanced model (extended
 * thinking on) and asks it for a revised system prompt. One attempt, no
 * retries.
 */

import { createComponentLogger } from "../logging.js";
import { APIError, errorMessage } from "../errors.js";
import { loadPrompt } from "../prompt-template.js";
import { extractText, type ModelClient } from "../llm/types.js";
import type { TurnReporter } from "../conductor/types.js";

const log = createComponentLogger("improve");

export const SELF_IMPROVE_TIMEOUT_MS = 180_000;
export const SELF_IMPROVE_MAX_TOKENS = 16_000;
export const SELF_IMPROVE_THINKING_TOKENS = 10_000;

export interface ConversationEntry {
  role: string;
  content: string;
}

export type SelfImproveResult =
  | { improved_prompt: string }
  | { error: true; message: string };

export interface SelfImproveDeps {
  createClient: (apiKey: string) => ModelClient;
  reporter: TurnReporter;
  model: string;
  toolNames: () => string[];
}

export interface SelfImproveRequest {
  conversation: ConversationEntry[];
  currentPrompt: string;
  apiKey?: string;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

export function formatConversation(conversation: readonly ConversationEntry[]): string {
  return conversation.map(entry => `[${capitalize(entry.role || "unknown")}]: ${entry.content}\n\n`).join("");
}

/** Keep only {role, content} pairs with string content */
export function parseConversation(value: unknown): ConversationEntry[] {
  if (!Array.isArray(value)) return [];
  const entries: ConversationEntry[] = [];
  for (const item of value) {
    if (typeof item !== "object" || item === null) continue;
    const role = "role" in item && typeof item.role === "string" ? item.role : "unknown";
    const content = "content" in item && typeof item.content === "string" ? item.content : "";
    entries.push({ role, content });
  }
  return entries;
}

function failure(message: string): SelfImproveResult {
  return { error: true, message };
}

export async function selfImprove(request: SelfImproveRequest, deps: SelfImproveDeps): Promise<SelfImproveResult> {
  const { reporter } = deps;

  if (!request.apiKey) {
    return failure("API key not configured");
  }
  if (request.conversation.length === 0) {
    return failure("No conversation to analyze");
  }

  reporter.log("Analyzing conversation for self-improvement...");

  try {
    const prompt = await loadPrompt("self-improve.md", {
      "Current Prompt": request.currentPrompt,
      "Tool Names": deps.toolNames().join(", "),
      "Conversation": formatConversation(request.conversation),
    });

    reporter.log("Calling the model with extended thinking...");
    const response = await deps.createClient(request.apiKey).send({
      model: deps.model,
      messages: [{ role: "user", content: prompt }],
      maxTokens: SELF_IMPROVE_MAX_TOKENS,
      thinkingBudgetTokens: SELF_IMPROVE_THINKING_TOKENS,
      temperature: 1,
      timeoutMs: SELF_IMPROVE_TIMEOUT_MS,
    });

    reporter.recordUsage(deps.model, response.usage.inputTokens, response.usage.outputTokens);

    const improved = extractText(response.content).trim();
    if (!improved) {
      reporter.log("Self-improve returned an empty response", "warn");
      return failure("No improved prompt generated");
    }

    reporter.log("System prompt improved successfully");
    log.info("System prompt improved", { chars: improved.length });
    return { improved_prompt: improved };
  } catch (err) {
    const message = describeFailure(err);
    log.error("Self-improve failed", err);
    reporter.log(`Self-improve failed: ${message}`, "error");
    return failure(message);
  }
}

function describeFailure(err: unknown): string {
  if (!(err instanceof APIError)) {
    return `Unexpected error: ${errorMessage(err)}`;
  }
  if (err.status === 408) {
    return `Request timed out (${SELF_IMPROVE_TIMEOUT_MS / 1000}s). Try with a shorter conversation.`;
  }
  if (err.status === 0) {
    // Already carries the "Network error:" prefix
    return err.message;
  }
  return `API error: ${err.message}`;
}
