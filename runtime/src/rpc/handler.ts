/**
 * Control-Plane Handler
 *
 * JSON-RPC 2.0 entry point for host requests. Every call gets exactly one
 * response string, errors included. process_query turns run one at a time
 * in arrival order; the other methods answer immediately.
 */

import { createComponentLogger } from "../logging.js";
import { RpcError, errorMessage } from "../errors.js";
import { parseDelta, InvalidDeltaError, type ConversationSession } from "../session/index.js";
import { parseQueryContext, type TurnRequest, type TurnResult } from "../conductor/types.js";
import { parseConversation, type SelfImproveRequest, type SelfImproveResult } from "../improve/index.js";
import type { CredentialStore } from "../credentials.js";
import type { LogEntry } from "@pocketmind/shared/logging";
import {
  INTERNAL_ERROR,
  INVALID_PARAMS,
  INVALID_REQUEST,
  METHOD_NOT_FOUND,
  PARSE_ERROR,
  type QueryResultWire,
  type RpcId,
  type RpcRequest,
  type RpcResponse,
} from "./types.js";

const log = createComponentLogger("rpc");

export interface RpcDeps {
  runTurn: (request: TurnRequest) => Promise<TurnResult>;
  selfImprove: (request: SelfImproveRequest) => Promise<SelfImproveResult>;
  session: ConversationSession;
  credentials: CredentialStore;
  /** Newest entries from the logger's ring buffer */
  recentLogs: (count: number) => LogEntry[];
}

const DEFAULT_LOG_COUNT = 100;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRpcId(value: unknown): value is RpcId {
  return value === null || typeof value === "string" || typeof value === "number";
}

function optionalString(params: Record<string, unknown>, key: string): string | undefined {
  const value = params[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new RpcError(INVALID_PARAMS, `Invalid params: ${key} must be a string`);
  }
  return value;
}

export function toWireResult(result: TurnResult): QueryResultWire {
  const wire: QueryResultWire = {
    content: result.content,
    usage: {
      iterations: result.usage.iterations,
      tool_calls: result.usage.toolCalls,
      input_tokens: result.usage.inputTokens,
      output_tokens: result.usage.outputTokens,
    },
  };
  if (result.error) wire.error = true;
  if (result.createdFiles?.length) wire.created_files = result.createdFiles;
  return wire;
}

export class RpcHandler {
  private readonly deps: RpcDeps;
  private turnQueue: Promise<void> = Promise.resolve();

  constructor(deps: RpcDeps) {
    this.deps = deps;
  }

  async handle(raw: string): Promise<string> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      log.warn("Unparseable control message", { error: errorMessage(err) });
      return this.serialize({ jsonrpc: "2.0", id: null, error: { code: PARSE_ERROR, message: `Parse error: ${errorMessage(err)}` } });
    }

    const id = isRecord(parsed) && isRpcId(parsed.id) ? parsed.id : null;
    if (!isRecord(parsed) || typeof parsed.method !== "string") {
      return this.serialize({ jsonrpc: "2.0", id, error: { code: INVALID_REQUEST, message: "Invalid request: method is required" } });
    }

    const request: RpcRequest = {
      jsonrpc: "2.0",
      id,
      method: parsed.method,
      params: isRecord(parsed.params) ? parsed.params : {},
    };

    try {
      const result = await this.dispatch(request);
      return this.serialize({ jsonrpc: "2.0", id, result });
    } catch (err) {
      if (err instanceof RpcError) {
        log.warn("Request rejected", { method: request.method, code: err.code, error: err.message });
        return this.serialize({ jsonrpc: "2.0", id, error: { code: err.code, message: err.message } });
      }
      log.error("Request failed", err, { method: request.method });
      return this.serialize({ jsonrpc: "2.0", id, error: { code: INTERNAL_ERROR, message: `Internal error: ${errorMessage(err)}` } });
    }
  }

  private serialize(response: RpcResponse): string {
    return JSON.stringify(response);
  }

  // ============================================
  // METHODS
  // ============================================

  private async dispatch(request: RpcRequest): Promise<unknown> {
    const { params } = request;
    log.debug("Control request", { method: request.method, id: request.id });

    switch (request.method) {
      case "process_query":
        return toWireResult(await this.enqueueTurn(this.parseTurn(params)));

      case "apply_delta":
        try {
          this.deps.session.applyDelta(parseDelta(params));
        } catch (err) {
          if (err instanceof InvalidDeltaError) {
            throw new RpcError(INVALID_PARAMS, `Invalid params: ${err.message}`);
          }
          throw err;
        }
        return { success: true };

      case "set_api_key":
        this.deps.credentials.setApiKey(optionalString(params, "api_key"));
        return { success: true };

      case "set_access_token":
        this.deps.credentials.setAccessToken(optionalString(params, "access_token"));
        return { success: true };

      case "self_improve":
        return this.deps.selfImprove({
          conversation: parseConversation(params.conversation),
          currentPrompt: optionalString(params, "current_prompt") ?? "",
          apiKey: optionalString(params, "api_key") || this.deps.credentials.get().apiKey,
        });

      case "get_logs": {
        const count = params.count ?? DEFAULT_LOG_COUNT;
        if (typeof count !== "number" || !Number.isInteger(count) || count < 1) {
          throw new RpcError(INVALID_PARAMS, "Invalid params: count must be a positive integer");
        }
        return { logs: this.deps.recentLogs(count) };
      }

      default:
        throw new RpcError(METHOD_NOT_FOUND, `Method not found: ${request.method}`);
    }
  }

  private parseTurn(params: Record<string, unknown>): TurnRequest {
    const files = params.files ?? [];
    if (!Array.isArray(files) || !files.every((file): file is string => typeof file === "string")) {
      throw new RpcError(INVALID_PARAMS, "Invalid params: files must be a list of paths");
    }
    return {
      userQuery: optionalString(params, "user_query") ?? "",
      files,
      context: parseQueryContext(params.context),
    };
  }

  /** Chain turns so a second query waits for the first to finish */
  private enqueueTurn(request: TurnRequest): Promise<TurnResult> {
    const run = this.turnQueue.then(() => this.deps.runTurn(request));
    this.turnQueue = run.then(
      () => undefined,
      (err: unknown) => {
        log.debug("Previous turn rejected", { error: errorMessage(err) });
      },
    );
    return run;
  }
}
