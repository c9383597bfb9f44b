/**
 * Error Types
 *
 * Every failure that crosses a module boundary has its own class so callers
 * can branch on `instanceof` instead of parsing messages.
 */

/** Default JSON-RPC error code for tool failures */
export const TOOL_ERROR_CODE = -32000;

/**
 * Non-2xx response, network failure (status 0) or timeout (status 408)
 * from the model provider.
 */
export class APIError extends Error {
  public status: number;
  public retryAfterSeconds?: number;

  constructor(message: string, status: number, retryAfterSeconds?: number) {
    super(message);
    this.name = "APIError";
    this.status = status;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * A tool ran (or was refused) and the model should see the failure as an
 * error result.
 */
export class ToolFailure extends Error {
  public code: number;

  constructor(message: string, code: number = TOOL_ERROR_CODE) {
    super(message);
    this.name = "ToolFailure";
    this.code = code;
  }
}

/** Generated code tried to reach something outside the sandbox's capabilities */
export class SandboxViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SandboxViolation";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Control-plane failure that maps onto a JSON-RPC error response */
export class RpcError extends Error {
  public code: number;

  constructor(code: number, message: string) {
    super(message);
    this.name = "RpcError";
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
