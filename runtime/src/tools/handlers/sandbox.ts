/**
 * run_javascript: generated code in the sandboxed executor.
 */

import { ToolFailure } from "../../errors.js";
import type { ExecutionOutcome } from "../../sandbox/types.js";
import type { ToolHandler } from "../types.js";

function withOutput(message: string, output: string): string {
  return output ? `${message}\n\nOutput before the error:\n${output}` : message;
}

export function unwrapExecution(outcome: ExecutionOutcome): Record<string, unknown> {
  switch (outcome.status) {
    case "ok": {
      const created = [...outcome.artifacts, ...outcome.files];
      return {
        output: outcome.output,
        ...(outcome.result !== undefined ? { result: outcome.result } : {}),
        ...(created.length > 0 ? { output_paths: created } : {}),
      };
    }
    case "failed":
      if (outcome.kind === "violation") {
        throw new ToolFailure(withOutput(`Sandbox violation: ${outcome.message}`, outcome.output));
      }
      if (outcome.kind === "syntax") {
        throw new ToolFailure(`Syntax error: ${outcome.message}`);
      }
      throw new ToolFailure(withOutput(outcome.message, outcome.output));
    case "timed_out":
      throw new ToolFailure(`Code execution timed out after ${Math.round(outcome.timeoutMs / 1000)}s`);
  }
}

export const runJavascript: ToolHandler = async (args, context, deps) => {
  const code = args.code;
  if (typeof code !== "string" || code.trim() === "") {
    throw new ToolFailure("code must be a non-empty string");
  }

  const filePaths = args.file_paths ?? [];
  if (!Array.isArray(filePaths) || !filePaths.every((item): item is string => typeof item === "string")) {
    throw new ToolFailure("file_paths must be a list of paths");
  }

  const outcome = await deps.sandbox.execute({
    code,
    allowedPaths: filePaths,
    outputDir: context.outputDir,
    timeoutMs: context.sandboxTimeoutMs,
  });
  return unwrapExecution(outcome);
};
