/**
 * Conductor
 *
 * Runs one conversation turn as a bounded think / call tools / observe loop:
 *
 *   thinking → awaiting_model → completed
 *                             → tool_use → thinking
 *                             → length_capped → thinking
 *                             → unexpected
 *
 * Two ceilings bound the loop: model iterations and dispatched tool calls.
 * Whatever way the turn ends, exactly one assistant message is written to
 * the Session.
 */

import { basename } from "path";
import { nanoid } from "nanoid";
import { createComponentLogger } from "../logging.js";
import { APIError, ToolFailure, errorMessage } from "../errors.js";
import { loadSystemPrompt } from "../prompt-template.js";
import { selectModel } from "../llm/selection/index.js";
import { UsageTracker } from "../llm/usage.js";
import { extractText, extractToolUses } from "../llm/types.js";
import { mergeConsecutive, type ConversationSession } from "../session/index.js";
import { sanitizeMessages } from "./sanitize.js";
import {
  API_KEY_MISSING,
  CONTINUE_PROMPT,
  TOOL_LIMIT_REACHED,
  budgetMessage,
  friendlyApiError,
  serializeResult,
  summarizeToolInput,
  summarizeToolResult,
  truncateResult,
  unexpectedError,
} from "./summary.js";
import type { RuntimeConfig } from "../config.js";
import type { ModelClient, ModelMessage, ModelResponse, ToolDefinition, ToolResultBlock, ToolUseBlock } from "../llm/types.js";
import type { ToolContext } from "../tools/types.js";
import type { Credentials, ModelClientFactory, TurnReporter, TurnRequest, TurnResult, TurnTerminal } from "./types.js";

const log = createComponentLogger("conductor");

/** The slice of ToolDispatcher the loop uses */
export interface ToolRunner {
  readonly tools: ToolDefinition[];
  dispatch(name: string, input: unknown, context: ToolContext): Promise<unknown>;
}

export interface ConductorDeps {
  createClient: ModelClientFactory;
  tools: ToolRunner;
  reporter: TurnReporter;
  session: ConversationSession;
  config: RuntimeConfig;
  credentials: () => Credentials;
  loadSystemPrompt?: () => Promise<string>;
}

/** Mutable state for one turn */
interface TurnState {
  client: ModelClient;
  model: string;
  system: string;
  messages: ModelMessage[];
  usage: UsageTracker;
  toolContext: ToolContext;
  createdFiles: string[];
  maxIterations: number;
  maxToolCalls: number;
  maxTokens: number;
}

export class Conductor {
  private readonly deps: ConductorDeps;

  constructor(deps: ConductorDeps) {
    this.deps = deps;
  }

  async runTurn(request: TurnRequest): Promise<TurnResult> {
    log.setTurnId(nanoid());
    try {
      return await this.executeTurn(request);
    } finally {
      log.setTurnId(undefined);
    }
  }

  private async executeTurn(request: TurnRequest): Promise<TurnResult> {
    const { config, session, reporter } = this.deps;
    const { userQuery, files, context } = request;
    const usage = new UsageTracker();
    const credentials = this.deps.credentials();

    if (!credentials.apiKey) {
      log.warn("Query received without an API key");
      return { content: API_KEY_MISSING, error: true, usage: usage.snapshot(), terminal: "failed" };
    }

    const fileNames = files.map(path => basename(path));
    const userContent = fileNames.length > 0
      ? `${userQuery}\n\n[Attached files: ${fileNames.join(", ")}]`
      : userQuery;

    const history = session.getContextForLlm(config.maxContextTokens);
    session.trackFiles(files);
    session.addMessage("user", userContent);

    const selection = selectModel(userQuery, {
      preferredModel: context.preferredModel,
      costPercentUsed: context.costPercentUsed,
      hasAttachments: files.length > 0,
    }, config.models);
    log.info(`Model: ${selection.model} (${selection.reason})`, { tier: selection.tier });

    try {
      let system: string;
      if (context.systemPrompt) {
        log.info("Using custom system prompt");
        system = context.systemPrompt;
      } else {
        system = await (this.deps.loadSystemPrompt ?? loadSystemPrompt)();
      }

      const state: TurnState = {
        client: this.deps.createClient(credentials.apiKey),
        model: selection.model,
        system,
        messages: mergeConsecutive([...history, { role: "user", content: userContent }]),
        usage,
        toolContext: {
          fileMap: session.fileMap,
          outputDir: context.outputDir ?? config.outputDir,
          toolTimeoutMs: context.toolTimeoutMs ?? config.toolTimeoutMs,
          sandboxTimeoutMs: config.sandboxTimeoutMs,
          accessToken: context.accessToken ?? credentials.accessToken,
        },
        createdFiles: [],
        maxIterations: context.maxIterations ?? config.maxIterations,
        maxToolCalls: context.maxToolCalls ?? config.maxToolCalls,
        maxTokens: context.maxTokens ?? config.maxTokens,
      };

      return await this.loop(state);
    } catch (err) {
      const content = err instanceof APIError ? friendlyApiError(err) : unexpectedError(errorMessage(err));
      log.error("Turn failed", err, { iterations: usage.iterations, toolCalls: usage.toolCalls });
      reporter.log(content, "error");
      return this.finish(content, "failed", usage, [], selection.model, true);
    }
  }

  // ============================================
  // LOOP
  // ============================================

  private async loop(state: TurnState): Promise<TurnResult> {
    const { reporter } = this.deps;
    const { usage, maxIterations } = state;

    while (usage.iterations < maxIterations) {
      const step = usage.startIteration();
      reporter.log(`Thinking... (step ${step}/${maxIterations})`, "info", (step / maxIterations) * 0.5);

      const response = await state.client.send({
        model: state.model,
        system: state.system,
        messages: sanitizeMessages(state.messages),
        tools: this.deps.tools.tools,
        maxTokens: state.maxTokens,
      });
      this.recordUsage(state, response);

      const text = extractText(response.content);

      switch (response.stopReason) {
        case "end_turn":
        case "stop_sequence":
          reporter.log("Done!", "info", 1.0);
          return this.finish(text, "completed", usage, state.createdFiles, state.model);

        case "tool_use": {
          const calls = extractToolUses(response.content);
          if (calls.length === 0) {
            reporter.log("Done!", "info", 1.0);
            return this.finish(text, "completed", usage, state.createdFiles, state.model);
          }
          if (usage.toolCalls >= state.maxToolCalls) {
            log.warn("Tool call ceiling reached", { toolCalls: usage.toolCalls });
            state.messages.push({ role: "assistant", content: response.content });
            return this.budgetExhausted(state);
          }
          if (text) {
            log.info(`Thinking: ${text.length > 100 ? `${text.slice(0, 100)}...` : text}`);
          }

          reporter.log(`Executing ${calls.length} tool(s)...`);
          const results: ToolResultBlock[] = [];
          for (let i = 0; i < calls.length; i++) {
            results.push(await this.runTool(state, calls[i], i, calls.length));
          }

          state.messages.push({ role: "assistant", content: response.content });
          state.messages.push({ role: "user", content: results });
          break;
        }

        case "max_tokens":
          log.info("Response hit the token limit, continuing");
          if (response.content.length > 0) {
            state.messages.push({ role: "assistant", content: response.content });
            state.messages.push({ role: "user", content: CONTINUE_PROMPT });
          }
          break;

        default:
          log.warn("Unexpected stop reason", { stopReason: response.stopReason });
          if (text) {
            return this.finish(text, "unexpected", usage, state.createdFiles, state.model);
          }
          return this.budgetExhausted(state);
      }
    }

    return this.budgetExhausted(state);
  }

  private recordUsage(state: TurnState, response: ModelResponse): void {
    state.usage.recordResponse(response.usage);
    this.deps.reporter.recordUsage(state.model, response.usage.inputTokens, response.usage.outputTokens);
    log.info(`Tokens: ${response.usage.inputTokens} in, ${response.usage.outputTokens} out`);
  }

  // ============================================
  // TOOLS
  // ============================================

  private async runTool(state: TurnState, call: ToolUseBlock, index: number, total: number): Promise<ToolResultBlock> {
    const { reporter } = this.deps;

    if (state.usage.toolCalls >= state.maxToolCalls) {
      log.warn("Tool call refused, ceiling reached", { tool: call.name, toolCalls: state.usage.toolCalls });
      return { type: "tool_result", tool_use_id: call.id, content: TOOL_LIMIT_REACHED, is_error: true };
    }

    state.usage.recordToolCall();
    reporter.log(`Tool: ${call.name} - ${summarizeToolInput(call.name, call.input)}`, "info", 0.5 + (index / total) * 0.3);

    try {
      const result = await this.deps.tools.dispatch(call.name, call.input, state.toolContext);
      this.trackCreatedFiles(state, result);
      const content = truncateResult(serializeResult(result));
      log.debug(`Result: ${summarizeToolResult(content)}`, { tool: call.name });
      return { type: "tool_result", tool_use_id: call.id, content };
    } catch (err) {
      const message = err instanceof ToolFailure ? err.message : `Tool error: ${errorMessage(err)}`;
      reporter.log(`Tool ${call.name} failed: ${message}`, "warn");
      return { type: "tool_result", tool_use_id: call.id, content: message, is_error: true };
    }
  }

  private trackCreatedFiles(state: TurnState, result: unknown): void {
    if (typeof result !== "object" || result === null) return;

    const paths: string[] = [];
    if ("output_path" in result && typeof result.output_path === "string") {
      paths.push(result.output_path);
    }
    if ("output_paths" in result && Array.isArray(result.output_paths)) {
      for (const path of result.output_paths) {
        if (typeof path === "string") paths.push(path);
      }
    }

    for (const path of paths) {
      if (state.createdFiles.includes(path)) continue;
      state.createdFiles.push(path);
      this.deps.reporter.log(`File: ${path}`);
    }
    this.deps.session.trackFiles(paths);
  }

  // ============================================
  // TERMINATION
  // ============================================

  private budgetExhausted(state: TurnState): TurnResult {
    const content = budgetMessage(state.usage.iterations, state.usage.toolCalls, state.messages);
    log.warn("Turn ended at its step limit", { iterations: state.usage.iterations, toolCalls: state.usage.toolCalls });
    return this.finish(content, "budget_exhausted", state.usage, state.createdFiles, state.model);
  }

  private finish(
    content: string,
    terminal: TurnTerminal,
    usage: UsageTracker,
    createdFiles: string[],
    model: string,
    error = false,
  ): TurnResult {
    this.deps.session.addMessage("assistant", content);

    const result: TurnResult = { content, usage: usage.snapshot(), terminal, model };
    if (error) result.error = true;
    if (createdFiles.length > 0) result.createdFiles = [...createdFiles];
    return result;
  }
}
