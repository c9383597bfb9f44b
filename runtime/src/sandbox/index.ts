export { SandboxExecutor, formatOutput, MAX_OUTPUT_CHARS, type SandboxOptions } from "./executor.js";
export { validateSource, type ValidationResult } from "./validator.js";
export { ALLOWED_MODULES, DENIED_MODULES, isWritable } from "./policy.js";
export type { ExecutionRequest, ExecutionOutcome, FailureKind } from "./types.js";
