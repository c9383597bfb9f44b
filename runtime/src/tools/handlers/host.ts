/**
 * Host-delegated tools
 *
 * These run in the host application. The runtime prepares the arguments,
 * forwards them over the bridge and turns the outcome into a value or a
 * ToolFailure.
 */

import { ToolFailure } from "../../errors.js";
import type { BridgeOutcome } from "../../bridge/types.js";
import { parsePageRange } from "../resolve.js";
import type { ToolArgs, ToolContext, ToolHandler } from "../types.js";

/** Media jobs are slow; they get this multiple of the base timeout */
export const MEDIA_TIMEOUT_MULTIPLIER = 10;

export const GOOGLE_NOT_CONNECTED = "Google account not connected";

export function unwrapOutcome(outcome: BridgeOutcome): unknown {
  switch (outcome.status) {
    case "ok":
      return outcome.value;
    case "failed":
      throw outcome.error;
    case "timed_out":
      throw new ToolFailure(`Operation timed out after ${Math.round(outcome.timeoutMs / 1000)}s`);
  }
}

interface HostToolOptions {
  /** Name the host knows the tool by, when it differs */
  hostName?: string;
  timeoutMultiplier?: number;
  /** Last-minute checks or additions before forwarding */
  prepare?: (args: ToolArgs, context: ToolContext) => ToolArgs;
}

export function hostTool(name: string, options: HostToolOptions = {}): ToolHandler {
  const hostName = options.hostName ?? name;
  const multiplier = options.timeoutMultiplier ?? 1;

  return async (args, context, deps) => {
    const forwarded = options.prepare ? options.prepare(args, context) : args;
    const outcome = await deps.bridge.call(hostName, forwarded, context.toolTimeoutMs * multiplier);
    return unwrapOutcome(outcome);
  };
}

/** Google tools need the user's OAuth access token */
export function withAccessToken(args: ToolArgs, context: ToolContext): ToolArgs {
  if (!context.accessToken) {
    throw new ToolFailure(GOOGLE_NOT_CONNECTED);
  }
  return { ...args, access_token: context.accessToken };
}

/** Reject malformed or zero-based page ranges before the host sees them */
export function checkPdfPages(args: ToolArgs): ToolArgs {
  if (args.pages === undefined) return args;
  if (typeof args.pages !== "string") {
    throw new ToolFailure("pages must be a string such as \"1-5\" or \"all\"");
  }
  parsePageRange(args.pages);
  return args;
}
