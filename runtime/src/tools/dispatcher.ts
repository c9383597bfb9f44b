/**
 * Tool Dispatcher
 *
 * Validates a tool call against the catalog, prepares its arguments and runs
 * the matching handler. Every failure leaves here as a ToolFailure; the
 * Conductor turns it into an error result for the model.
 */

import { createComponentLogger } from "../logging.js";
import { ToolFailure, errorMessage } from "../errors.js";
import type { ToolDefinition } from "../llm/types.js";
import { loadCatalog } from "./catalog.js";
import { TOOL_HANDLERS } from "./handlers/index.js";
import { prepareArguments } from "./resolve.js";
import { isToolName, type ToolArgs, type ToolContext, type ToolDeps, type ToolHandler, type ToolName } from "./types.js";

const log = createComponentLogger("tools");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validateArguments(tool: ToolDefinition, input: unknown): ToolArgs {
  if (!isRecord(input)) {
    throw new ToolFailure(`Arguments for ${tool.name} must be an object`);
  }
  const missing = (tool.input_schema.required ?? []).filter(key => input[key] === undefined || input[key] === null);
  if (missing.length > 0) {
    throw new ToolFailure(`Missing required argument${missing.length > 1 ? "s" : ""} for ${tool.name}: ${missing.join(", ")}`);
  }
  return input;
}

export interface DispatcherOptions {
  catalog?: ToolDefinition[];
  handlers?: Partial<Record<ToolName, ToolHandler>>;
}

export class ToolDispatcher {
  private readonly deps: ToolDeps;
  private readonly catalog: ToolDefinition[];
  private readonly definitions: Map<string, ToolDefinition>;
  private readonly handlers: Record<ToolName, ToolHandler>;

  constructor(deps: ToolDeps, options: DispatcherOptions = {}) {
    this.deps = deps;
    this.catalog = options.catalog ?? loadCatalog();
    this.definitions = new Map(this.catalog.map(tool => [tool.name, tool]));
    this.handlers = { ...TOOL_HANDLERS, ...options.handlers };
  }

  /** Definitions sent to the model with every request */
  get tools(): ToolDefinition[] {
    return this.catalog;
  }

  toolNames(): string[] {
    return this.catalog.map(tool => tool.name);
  }

  async dispatch(name: string, input: unknown, context: ToolContext): Promise<unknown> {
    const definition = this.definitions.get(name);
    if (!definition || !isToolName(name)) {
      throw new ToolFailure(`Unknown tool: ${name}`);
    }

    const args = prepareArguments(validateArguments(definition, input), context.fileMap, context.outputDir);
    const started = Date.now();

    try {
      const result = await this.handlers[name](args, context, this.deps);
      log.debug("Tool finished", { tool: name, durationMs: Date.now() - started });
      return result;
    } catch (err) {
      if (err instanceof ToolFailure) {
        log.warn("Tool failed", { tool: name, error: err.message, code: err.code });
        throw err;
      }
      log.error("Tool crashed", err, { tool: name });
      throw new ToolFailure(`Tool error: ${errorMessage(err)}`);
    }
  }
}
