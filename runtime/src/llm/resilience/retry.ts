/**
 * Retry Policy
 *
 * Classifies an APIError into the action the resilient client takes next.
 * Status codes come from AnthropicClient: 0 is a network failure and 408 a
 * request timeout.
 */

import type { APIError } from "../../errors.js";

// ============================================
// CONSTANTS
// ============================================

export const DEFAULT_RETRY_AFTER_SECONDS = 5;
export const NETWORK_RETRY_DELAY_MS = 1000;

const SERVER_ERROR_STATUSES = new Set([500, 502, 503]);

// ============================================
// CLASSIFICATION
// ============================================

export type RetryDecision =
  | { action: "retry"; delayMs: number }
  | { action: "fail" };

/**
 * What to do after `error` on the zero-based `attempt` of a request.
 * Whether attempts remain is the caller's concern.
 */
export function classifyError(error: APIError, attempt: number): RetryDecision {
  if (error.status === 429) {
    return { action: "retry", delayMs: (error.retryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS) * 1000 };
  }
  if (SERVER_ERROR_STATUSES.has(error.status)) {
    return { action: "retry", delayMs: 2 ** attempt * 1000 };
  }
  if (error.status === 408) {
    return { action: "retry", delayMs: 0 };
  }
  if (error.status === 0) {
    return { action: "retry", delayMs: NETWORK_RETRY_DELAY_MS };
  }
  return { action: "fail" };
}

/** Final error raised once a retryable failure has used every attempt */
export function exhaustedMessage(error: APIError): string {
  if (error.status === 429) return `Rate limited: ${error.message}`;
  if (SERVER_ERROR_STATUSES.has(error.status)) return `Server error: ${error.message}`;
  return error.message;
}
