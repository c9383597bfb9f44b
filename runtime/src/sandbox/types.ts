/**
 * Sandboxed execution request and outcome.
 */

export interface ExecutionRequest {
  /** JavaScript source; the completion value of the last statement becomes `result` */
  code: string;
  /** Files or directories the code may read through open() */
  allowedPaths: string[];
  /** Directory the code may write beneath; rendered artifacts land here too */
  outputDir?: string;
  timeoutMs: number;
}

export type FailureKind = "violation" | "syntax" | "runtime";

export type ExecutionOutcome =
  | {
      status: "ok";
      output: string;
      /** Inspected completion value, when the code ended on an expression */
      result?: string;
      /** Rendered artifacts saved under outputDir */
      artifacts: string[];
      /** Files the code wrote under outputDir */
      files: string[];
    }
  | { status: "failed"; kind: FailureKind; message: string; output: string }
  | { status: "timed_out"; timeoutMs: number };

export interface WorkerSuccess {
  status: "ok";
  stdout: string[];
  stderr: string[];
  artifacts: string[];
  files: string[];
  result: string | null;
}

export interface WorkerFailure {
  status: "error";
  kind: "violation" | "runtime" | "timeout";
  name: string;
  message: string;
  stdout: string[];
  stderr: string[];
  artifacts: string[];
  files: string[];
}

export type WorkerReply = WorkerSuccess | WorkerFailure;
