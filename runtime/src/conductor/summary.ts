/**
 * User-facing text for every way a turn can end, plus the log summaries
 * shown while tools run.
 */

import { basename } from "path";
import type { APIError } from "../errors.js";
import type { ModelMessage } from "../llm/types.js";

export const API_KEY_MISSING = "API key not configured. Please enter your Claude API key to get started.";
export const CONTINUE_PROMPT = "Continue from where you left off.";
export const TOOL_LIMIT_REACHED = "Maximum tool calls reached for this query.";

const MAX_RESULT_CHARS = 10_000;
const RESULT_HEAD_CHARS = 5_000;
const RESULT_TAIL_CHARS = 2_000;

export function truncateResult(text: string): string {
  if (text.length <= MAX_RESULT_CHARS) return text;
  return `${text.slice(0, RESULT_HEAD_CHARS)}\n\n[Output truncated...]\n\n${text.slice(-RESULT_TAIL_CHARS)}`;
}

export function serializeResult(result: unknown): string {
  if (typeof result === "string") return result;
  if (result === undefined) return "";
  return JSON.stringify(result);
}

export function friendlyApiError(error: APIError): string {
  switch (error.status) {
    case 429:
      return "Too many requests. Please wait 60 seconds.";
    case 401:
      return "Invalid API key. Please check your configuration in Settings.";
    case 500:
    case 502:
    case 503:
      return "AI service is busy. Retrying automatically...";
    case 408:
      return "Operation timed out after 120s. The file may be too large.";
    default:
      return `Sorry, I encountered an error: ${error.message}`;
  }
}

export function unexpectedError(message: string): string {
  return `An unexpected error occurred: ${message}`;
}

/** Sorted, distinct names of every tool the model asked for this turn */
export function toolsUsed(messages: readonly ModelMessage[]): string[] {
  const names = new Set<string>();
  for (const message of messages) {
    if (typeof message.content === "string") continue;
    for (const block of message.content) {
      if (block.type === "tool_use") names.add(block.name);
    }
  }
  return [...names].sort();
}

export function budgetMessage(iterations: number, toolCalls: number, messages: readonly ModelMessage[]): string {
  const tools = toolsUsed(messages);
  const progress = tools.length > 0
    ? `I used these tools: ${tools.join(", ")}. Here's what I found so far...`
    : "I was analyzing your request but couldn't complete it.";
  return `I've reached my step limit after ${iterations} iterations and ${toolCalls} tool calls. ${progress}`;
}

// ============================================
// PROGRESS SUMMARIES
// ============================================

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function summarizeToolInput(name: string, input: Record<string, unknown>): string {
  if (name === "run_javascript") {
    const code = typeof input.code === "string" ? input.code.trim() : "";
    if (!code) return "empty code";
    const lines = code.split("\n").length;
    return lines > 1 ? `${lines} lines of code` : clip(code, 50);
  }

  if (name === "web_fetch" || name === "headless_browser" || name === "download_media") {
    return typeof input.url === "string" ? clip(input.url, 60) : "no url";
  }

  if (name === "ffmpeg_process") {
    const operation = typeof input.operation === "string" ? input.operation : "?";
    const params = input.params ? clip(JSON.stringify(input.params), 100) : "";
    return params ? `${operation}: ${params}` : operation;
  }

  if (name === "create_pdf") {
    const title = typeof input.title === "string" ? input.title : "document";
    const images = Array.isArray(input.image_paths) ? input.image_paths.length : 0;
    return `Creating '${title}' with ${images} image(s)`;
  }

  const path = input.image_path ?? input.file_path ?? input.input_path ?? input.pdf_path ?? input.path;
  if (typeof path === "string") {
    return basename(path);
  }

  const keys = Object.keys(input);
  return keys.length > 0 ? `params: ${keys.slice(0, 3).join(", ")}` : "no params";
}

export function summarizeToolResult(result: string): string {
  if (result.length > 500) return `got ${result.length} chars`;
  if (result.length > 100) return `${result.slice(0, 80)}...`;
  return result;
}
