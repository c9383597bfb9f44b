/**
 * Host Bridge
 *
 * Calls into the host application. Each call gets a correlation id and a
 * pending entry; one background dispatcher drains the inbound stream and
 * settles the entry whose id matches. A call's own timer removes its entry
 * on expiry, so a late response finds nothing and is dropped.
 */

import { nanoid } from "nanoid";
import { ToolFailure, TOOL_ERROR_CODE, errorMessage } from "../errors.js";
import { timerDelay } from "../timers.js";
import { createComponentLogger } from "../logging.js";
import type {
  BridgeLogLevel,
  BridgeOutcome,
  BridgeTransport,
  InboundResponse,
  LogNotification,
  NativeToolRequest,
  OutboundMessage,
  UsageNotification,
} from "./types.js";

const log = createComponentLogger("bridge");

interface PendingCall {
  tool: string;
  resolve: (outcome: BridgeOutcome) => void;
  timer: NodeJS.Timeout;
}

function isInboundResponse(value: unknown): value is InboundResponse {
  return typeof value === "object" && value !== null && "id" in value && typeof value.id === "string";
}

function toToolFailure(error: unknown): ToolFailure {
  if (typeof error === "string") {
    return new ToolFailure(error);
  }
  if (typeof error === "object" && error !== null) {
    const message = "message" in error && typeof error.message === "string" ? error.message : "Native tool failed";
    const code = "code" in error && typeof error.code === "number" ? error.code : TOOL_ERROR_CODE;
    return new ToolFailure(message, code);
  }
  return new ToolFailure("Native tool failed");
}

export class HostBridge {
  private readonly pending = new Map<string, PendingCall>();
  private dispatcher: Promise<void> | null = null;

  constructor(private readonly transport: BridgeTransport) {}

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  /** Start draining the inbound stream. Idempotent. */
  start(): void {
    if (this.dispatcher) return;
    this.dispatcher = this.runDispatcher().catch((err: unknown) => {
      log.error("Bridge dispatcher stopped unexpectedly", err);
    });
  }

  /** Close the inbound stream and settle every outstanding call as failed. */
  async stop(): Promise<void> {
    this.transport.close?.();
    for (const [id, call] of this.pending) {
      clearTimeout(call.timer);
      call.resolve({ status: "failed", error: new ToolFailure("Host bridge stopped") });
      this.pending.delete(id);
    }
    await this.dispatcher;
    this.dispatcher = null;
  }

  private async runDispatcher(): Promise<void> {
    log.debug("Dispatcher started");
    for await (const raw of this.transport.inbound()) {
      this.handleInbound(raw);
    }
    log.debug("Dispatcher finished");
  }

  // ----------------------------------------
  // Calls
  // ----------------------------------------

  /**
   * Ask the host to run a native tool. Never rejects: the outcome says
   * whether the host answered, answered with an error, or stayed silent
   * past the deadline.
   */
  call(tool: string, args: Record<string, unknown>, timeoutMs: number): Promise<BridgeOutcome> {
    const id = nanoid();
    const request: NativeToolRequest = {
      jsonrpc: "2.0",
      id,
      method: "native_tool",
      params: { tool, args, timeout_ms: timeoutMs },
    };

    return new Promise<BridgeOutcome>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          log.warn(`Native tool ${tool} timed out`, { id, timeoutMs });
          resolve({ status: "timed_out", timeoutMs });
        }
      }, timerDelay(timeoutMs));

      this.pending.set(id, { tool, resolve, timer });
      log.debug(`Calling native tool ${tool}`, { id, timeoutMs });

      try {
        this.transport.send(JSON.stringify(request));
      } catch (err) {
        clearTimeout(timer);
        this.pending.delete(id);
        resolve({ status: "failed", error: new ToolFailure(`Failed to reach host: ${errorMessage(err)}`) });
      }
    });
  }

  /**
   * Settle the pending call a raw inbound message answers. Malformed,
   * id-less and unknown-id messages are logged and dropped.
   */
  handleInbound(raw: string): void {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch (err) {
      log.warn("Malformed inbound message dropped", { error: errorMessage(err), length: raw.length });
      return;
    }

    if (!isInboundResponse(message)) {
      log.debug("Inbound message without a correlation id dropped");
      return;
    }

    const call = this.pending.get(message.id);
    if (!call) {
      log.debug("Response for unknown or expired call dropped", { id: message.id });
      return;
    }

    this.pending.delete(message.id);
    clearTimeout(call.timer);

    if (message.error !== undefined && message.error !== null) {
      const failure = toToolFailure(message.error);
      log.info(`Native tool ${call.tool} failed`, { id: message.id, code: failure.code, message: failure.message });
      call.resolve({ status: "failed", error: failure });
      return;
    }

    call.resolve({ status: "ok", value: message.result });
  }

  // ----------------------------------------
  // Notifications
  // ----------------------------------------

  /** Progress or status line for the host UI. Fire-and-forget. */
  log(message: string, level: BridgeLogLevel = "info", progress?: number): void {
    const notification: LogNotification = {
      jsonrpc: "2.0",
      method: "log",
      params: progress === undefined ? { level, message } : { level, message, progress },
    };
    this.notify(notification);
  }

  /** Report token usage to the host's cost accounting. Fire-and-forget. */
  recordUsage(model: string, inputTokens: number, outputTokens: number): void {
    const notification: UsageNotification = {
      jsonrpc: "2.0",
      method: "record_usage",
      params: { model, input_tokens: inputTokens, output_tokens: outputTokens },
    };
    this.notify(notification);
  }

  private notify(message: OutboundMessage): void {
    try {
      this.transport.send(JSON.stringify(message));
    } catch (err) {
      log.warn(`Failed to send ${message.method} notification`, { error: errorMessage(err) });
    }
  }

  // ----------------------------------------
  // Inspection
  // ----------------------------------------

  pendingCount(): number {
    return this.pending.size;
  }

  hasPending(id: string): boolean {
    return this.pending.has(id);
  }
}
