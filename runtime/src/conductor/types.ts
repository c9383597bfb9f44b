/**
 * Conductor Types
 */

import { MAX_TIMER_DELAY_MS } from "../timers.js";
import type { ModelClient } from "../llm/types.js";
import type { TurnUsage } from "../llm/usage.js";
import type { BridgeLogLevel } from "../bridge/types.js";

/** Per-query options the host sends with process_query */
export interface QueryContext {
  systemPrompt?: string;
  maxIterations?: number;
  maxToolCalls?: number;
  maxTokens?: number;
  toolTimeoutMs?: number;
  outputDir?: string;
  preferredModel?: string;
  costPercentUsed?: number;
  accessToken?: string;
}

export interface TurnRequest {
  userQuery: string;
  files: string[];
  context: QueryContext;
}

export type TurnTerminal = "completed" | "unexpected" | "budget_exhausted" | "failed";

export interface TurnResult {
  content: string;
  error?: true;
  createdFiles?: string[];
  usage: TurnUsage;
  terminal: TurnTerminal;
  model?: string;
}

/** User-visible progress and cost reporting; HostBridge provides both */
export interface TurnReporter {
  log(message: string, level?: BridgeLogLevel, progress?: number): void;
  recordUsage(model: string, inputTokens: number, outputTokens: number): void;
}

export interface Credentials {
  apiKey?: string;
  accessToken?: string;
}

export type ModelClientFactory = (apiKey: string) => ModelClient;

// ============================================
// CONTEXT PARSING
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined;
}

function nonNegativeInt(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : undefined;
}

function text(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

/** Pick the recognised keys out of the host's context object; the rest is ignored */
export function parseQueryContext(value: unknown): QueryContext {
  if (!isRecord(value)) return {};

  const context: QueryContext = {};
  const systemPrompt = text(value.system_prompt);
  if (systemPrompt !== undefined) context.systemPrompt = systemPrompt;
  const maxIterations = positiveInt(value.max_iterations);
  if (maxIterations !== undefined) context.maxIterations = maxIterations;
  const maxToolCalls = nonNegativeInt(value.max_tool_calls);
  if (maxToolCalls !== undefined) context.maxToolCalls = maxToolCalls;
  const maxTokens = positiveInt(value.max_tokens);
  if (maxTokens !== undefined) context.maxTokens = maxTokens;
  const toolTimeoutMs = positiveInt(value.tool_timeout_ms);
  if (toolTimeoutMs !== undefined && toolTimeoutMs <= MAX_TIMER_DELAY_MS) context.toolTimeoutMs = toolTimeoutMs;
  const outputDir = text(value.output_dir);
  if (outputDir !== undefined) context.outputDir = outputDir;
  const preferredModel = text(value.preferred_model);
  if (preferredModel !== undefined) context.preferredModel = preferredModel;
  if (typeof value.cost_percent_used === "number") context.costPercentUsed = value.cost_percent_used;
  const accessToken = text(value.google_access_token) ?? text(value.access_token);
  if (accessToken !== undefined) context.accessToken = accessToken;
  return context;
}
