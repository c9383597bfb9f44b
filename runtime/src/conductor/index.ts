export { Conductor } from "./conductor.js";
export type { ConductorDeps, ToolRunner } from "./conductor.js";
export { sanitizeMessages, MISSING_RESULT } from "./sanitize.js";
export * from "./summary.js";
export { parseQueryContext } from "./types.js";
export type { QueryContext, TurnRequest, TurnResult, TurnTerminal, TurnReporter, Credentials, ModelClientFactory } from "./types.js";
