export * from "./types.js";
export { AnthropicClient, parseMessageResponse, parseRetryAfter, ANTHROPIC_VERSION, DEFAULT_REQUEST_TIMEOUT_MS } from "./anthropic.js";
export type { AnthropicClientOptions } from "./anthropic.js";
export * from "./resilience/index.js";
export * from "./selection/index.js";
export { UsageTracker } from "./usage.js";
export type { TurnUsage } from "./usage.js";
