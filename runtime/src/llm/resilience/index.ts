export { ResilientModelClient, defaultSleep } from "./resilient-client.js";
export type { ResilientClientOptions, SleepFn } from "./resilient-client.js";
export { classifyError, exhaustedMessage, DEFAULT_RETRY_AFTER_SECONDS, NETWORK_RETRY_DELAY_MS } from "./retry.js";
export type { RetryDecision } from "./retry.js";
