/**
 * Resilient Model Client
 *
 * Wraps a ModelClient and retries transient provider failures (rate limits,
 * 5xx, timeouts, network errors) on the same model. `retryCount` is the
 * total number of attempts, the first included.
 */

import { createComponentLogger } from "../../logging.js";
import { APIError } from "../../errors.js";
import { classifyError, exhaustedMessage } from "./retry.js";
import type { ModelClient, ModelRequest, ModelResponse } from "../types.js";

const log = createComponentLogger("llm.resilient");

export type SleepFn = (ms: number) => Promise<void>;

export const defaultSleep: SleepFn = ms => new Promise(resolve => setTimeout(resolve, ms));

export interface ResilientClientOptions {
  retryCount?: number;
  sleep?: SleepFn;
}

export class ResilientModelClient implements ModelClient {
  private readonly inner: ModelClient;
  private readonly retryCount: number;
  private readonly sleep: SleepFn;

  constructor(inner: ModelClient, options: ResilientClientOptions = {}) {
    this.inner = inner;
    this.retryCount = Math.max(1, options.retryCount ?? 3);
    this.sleep = options.sleep ?? defaultSleep;
  }

  async send(request: ModelRequest): Promise<ModelResponse> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.inner.send(request);
      } catch (error) {
        if (!(error instanceof APIError)) throw error;

        const decision = classifyError(error, attempt);
        if (decision.action === "fail") throw error;

        if (attempt >= this.retryCount - 1) {
          log.warn("Model request failed after all attempts", {
            status: error.status,
            attempts: attempt + 1,
          });
          throw new APIError(exhaustedMessage(error), error.status, error.retryAfterSeconds);
        }

        log.warn("Retrying model request", {
          status: error.status,
          attempt: attempt + 1,
          delayMs: decision.delayMs,
          error: error.message.substring(0, 200),
        });
        if (decision.delayMs > 0) {
          await this.sleep(decision.delayMs);
        }
      }
    }
  }
}
