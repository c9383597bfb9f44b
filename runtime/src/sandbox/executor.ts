/**
 * Sandboxed Code Executor
 *
 * Validates generated JavaScript, then runs it in a throwaway worker thread
 * while the calling thread races the worker's reply against a deadline. On
 * timeout the caller gets its answer immediately and the worker is
 * terminated in the background.
 */

import { Worker, type ResourceLimits } from "worker_threads";
import * as fs from "fs";
import * as path from "path";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import { timerDelay } from "../timers.js";
import { WORKER_SOURCE } from "./bootstrap.js";
import { ALLOWED_MODULES, DENIED_MODULES, isWritable } from "./policy.js";
import { validateSource } from "./validator.js";
import type { ExecutionOutcome, ExecutionRequest, WorkerReply } from "./types.js";

const log = createComponentLogger("sandbox");

export const MAX_OUTPUT_CHARS = 50_000;

export interface SandboxOptions {
  maxOutputChars?: number;
  resourceLimits?: ResourceLimits;
}

const DEFAULT_RESOURCE_LIMITS: ResourceLimits = {
  maxOldGenerationSizeMb: 128,
  maxYoungGenerationSizeMb: 32,
  stackSizeMb: 4,
};

type RaceResult = WorkerReply | { status: "timed_out" };

// ============================================
// REPLY PARSING
// ============================================

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === "string");
}

function field(value: object, key: string): unknown {
  return key in value ? Reflect.get(value, key) : undefined;
}

/** Worker messages arrive untyped; anything off-shape is a runtime failure. */
export function parseWorkerReply(message: unknown): WorkerReply {
  if (typeof message !== "object" || message === null) {
    return malformed();
  }

  const status = field(message, "status");
  const stdout = field(message, "stdout");
  const stderr = field(message, "stderr");
  const artifacts = field(message, "artifacts");
  const files = field(message, "files");
  if (!isStringArray(stdout) || !isStringArray(stderr) || !isStringArray(artifacts) || !isStringArray(files)) {
    return malformed();
  }

  if (status === "ok") {
    const result = field(message, "result");
    return { status: "ok", stdout, stderr, artifacts, files, result: typeof result === "string" ? result : null };
  }

  const kind = field(message, "kind");
  const name = field(message, "name");
  const text = field(message, "message");
  return {
    status: "error",
    kind: kind === "violation" || kind === "timeout" ? kind : "runtime",
    name: typeof name === "string" ? name : "Error",
    message: typeof text === "string" ? text : "Unknown error",
    stdout,
    stderr,
    artifacts,
    files,
  };
}

function malformed(): WorkerReply {
  return {
    status: "error",
    kind: "runtime",
    name: "Error",
    message: "Sandbox worker sent a malformed reply",
    stdout: [],
    stderr: [],
    artifacts: [],
    files: [],
  };
}

// ============================================
// OUTPUT
// ============================================

export function formatOutput(stdout: string[], stderr: string[], maxChars: number = MAX_OUTPUT_CHARS): string {
  let output = stdout.join("\n");
  if (stderr.length > 0) {
    output += (output ? "\n" : "") + "--- stderr ---\n" + stderr.join("\n");
  }
  if (output.length > maxChars) {
    output = output.slice(0, maxChars) + `\n\n[Output truncated at ${maxChars} characters]`;
  }
  return output;
}

// ============================================
// EXECUTOR
// ============================================

export class SandboxExecutor {
  private readonly maxOutputChars: number;
  private readonly resourceLimits: ResourceLimits;

  constructor(options: SandboxOptions = {}) {
    this.maxOutputChars = options.maxOutputChars ?? MAX_OUTPUT_CHARS;
    this.resourceLimits = options.resourceLimits ?? DEFAULT_RESOURCE_LIMITS;
  }

  async execute(request: ExecutionRequest): Promise<ExecutionOutcome> {
    const validation = validateSource(request.code);
    if (!validation.ok) {
      log.warn("Sandboxed code rejected before running", { kind: validation.kind, reason: validation.message });
      return { status: "failed", kind: validation.kind, message: validation.message, output: "" };
    }

    const started = Date.now();
    const reply = await this.race(request);
    log.debug("Sandbox run finished", { status: reply.status, durationMs: Date.now() - started });

    if (reply.status === "timed_out" || (reply.status === "error" && reply.kind === "timeout")) {
      return { status: "timed_out", timeoutMs: request.timeoutMs };
    }

    const output = formatOutput(reply.stdout, reply.stderr, this.maxOutputChars);

    if (reply.status === "error") {
      return {
        status: "failed",
        kind: reply.kind,
        message: reply.kind === "violation" ? reply.message : `${reply.name}: ${reply.message}`,
        output,
      };
    }

    return {
      status: "ok",
      output,
      ...(reply.result !== null ? { result: reply.result } : {}),
      artifacts: this.harvestArtifacts(reply.artifacts, request.outputDir),
      files: this.checkWrittenFiles(reply.files, request.outputDir),
    };
  }

  /**
   * Resolves with the worker's reply or a timeout, whichever comes first.
   * The worker is always terminated afterwards, without waiting for it.
   */
  private race(request: ExecutionRequest): Promise<RaceResult> {
    return new Promise<RaceResult>((resolve) => {
      const worker = new Worker(WORKER_SOURCE, {
        eval: true,
        env: {},
        resourceLimits: this.resourceLimits,
        workerData: {
          code: request.code,
          allowedModules: [...ALLOWED_MODULES],
          deniedModules: [...DENIED_MODULES],
          allowedPaths: request.allowedPaths,
          outputDir: request.outputDir ?? null,
          timeoutMs: request.timeoutMs,
        },
      });

      let settled = false;
      const finish = (result: RaceResult): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        worker.removeAllListeners();
        // Late errors from a dying worker must not surface as unhandled
        worker.on("error", (err: Error) => log.debug("Worker error after settle", { error: err.message }));
        worker.terminate().catch((err: unknown) => {
          log.warn("Failed to terminate sandbox worker", { error: errorMessage(err) });
        });
        resolve(result);
      };

      const timer = setTimeout(() => {
        log.warn("Sandboxed code timed out", { timeoutMs: request.timeoutMs });
        finish({ status: "timed_out" });
      }, timerDelay(request.timeoutMs));

      worker.once("message", (message: unknown) => finish(parseWorkerReply(message)));
      worker.once("error", (err: Error) => {
        finish({
          status: "error",
          kind: "runtime",
          name: err.name,
          message: err.message,
          stdout: [],
          stderr: [],
          artifacts: [],
          files: [],
        });
      });
      worker.once("exit", (code: number) => {
        finish({
          status: "error",
          kind: "runtime",
          name: "Error",
          // An exit without a reply at code 0 means the event loop drained while awaiting
          message: code === 0
            ? "Sandboxed code finished without a result: an awaited promise never settled"
            : `Sandbox worker exited with code ${code}`,
          stdout: [],
          stderr: [],
          artifacts: [],
          files: [],
        });
      });
    });
  }

  /** The worker reports what it wrote; anything outside outputDir is dropped */
  private checkWrittenFiles(files: string[], outputDir: string | undefined): string[] {
    const kept = files.filter(file => isWritable(file, outputDir));
    if (kept.length < files.length) {
      log.warn("Dropped written files outside the output directory", { count: files.length - kept.length });
    }
    return kept;
  }

  private harvestArtifacts(artifacts: string[], outputDir: string | undefined): string[] {
    if (artifacts.length === 0) return [];
    if (!outputDir) {
      log.warn("Rendered artifacts discarded: no output directory", { count: artifacts.length });
      return [];
    }

    fs.mkdirSync(outputDir, { recursive: true });
    const saved: string[] = [];
    let n = 1;
    for (const svg of artifacts) {
      let target = path.join(outputDir, `plot_${n}.svg`);
      while (fs.existsSync(target)) {
        n++;
        target = path.join(outputDir, `plot_${n}.svg`);
      }
      fs.writeFileSync(target, svg, "utf8");
      saved.push(target);
      n++;
    }
    return saved;
  }
}
