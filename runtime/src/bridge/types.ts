/**
 * Host Bridge Types
 *
 * Wire messages exchanged with the host application and the three-way
 * outcome of a cross-boundary call.
 */

import type { ToolFailure } from "../errors.js";

// ============================================
// OUTCOMES
// ============================================

export type BridgeOutcome<T = unknown> =
  | { status: "ok"; value: T }
  /** The host answered, with an error */
  | { status: "failed"; error: ToolFailure }
  /** The host never answered within the deadline */
  | { status: "timed_out"; timeoutMs: number };

// ============================================
// WIRE FORMAT
// ============================================

export type BridgeLogLevel = "debug" | "info" | "warn" | "error";

export interface NativeToolRequest {
  jsonrpc: "2.0";
  id: string;
  method: "native_tool";
  params: {
    tool: string;
    args: Record<string, unknown>;
    timeout_ms: number;
  };
}

export interface LogNotification {
  jsonrpc: "2.0";
  method: "log";
  params: {
    level: BridgeLogLevel;
    message: string;
    progress?: number;
  };
}

export interface UsageNotification {
  jsonrpc: "2.0";
  method: "record_usage";
  params: {
    model: string;
    input_tokens: number;
    output_tokens: number;
  };
}

export type OutboundMessage = NativeToolRequest | LogNotification | UsageNotification;

export interface InboundResponse {
  id: string;
  result?: unknown;
  error?: {
    message?: string;
    code?: number;
  };
}

// ============================================
// TRANSPORT
// ============================================

/**
 * Everything the bridge needs from the link to the host: a place to put
 * outbound messages and a stream of raw inbound responses.
 */
export interface BridgeTransport {
  send(message: string): void;
  inbound(): AsyncIterable<string>;
  /** Ends the inbound stream */
  close?(): void;
}
