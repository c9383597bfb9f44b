/**
 * Per-turn usage accounting
 *
 * The Conductor owns one tracker per turn. Every model response is also
 * forwarded to the host as a `record_usage` notification for cost tracking.
 */

import type { ModelUsage } from "./types.js";

export interface TurnUsage {
  iterations: number;
  toolCalls: number;
  inputTokens: number;
  outputTokens: number;
}

export class UsageTracker {
  private usage: TurnUsage = { iterations: 0, toolCalls: 0, inputTokens: 0, outputTokens: 0 };

  startIteration(): number {
    return ++this.usage.iterations;
  }

  recordToolCall(): number {
    return ++this.usage.toolCalls;
  }

  recordResponse(usage: ModelUsage): void {
    this.usage.inputTokens += usage.inputTokens;
    this.usage.outputTokens += usage.outputTokens;
  }

  get iterations(): number {
    return this.usage.iterations;
  }

  get toolCalls(): number {
    return this.usage.toolCalls;
  }

  snapshot(): TurnUsage {
    return { ...this.usage };
  }
}
