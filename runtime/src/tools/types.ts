/**
 * Shared types for tool dispatch.
 */

import type { BridgeOutcome } from "../bridge/types.js";
import type { ExecutionOutcome, ExecutionRequest } from "../sandbox/types.js";

export const TOOL_NAMES = [
  "web_fetch",
  "headless_browser",
  "read_pdf",
  "create_pdf",
  "convert_document",
  "read_docx",
  "modify_docx",
  "read_pptx",
  "modify_pptx",
  "read_xlsx",
  "modify_xlsx",
  "create_zip",
  "download_media",
  "ffmpeg_process",
  "ocr_image",
  "smart_crop",
  "google_calendar",
  "gmail",
  "file_info",
  "read_file",
  "write_file",
  "run_javascript",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

const TOOL_NAME_SET: ReadonlySet<string> = new Set(TOOL_NAMES);

export function isToolName(name: string): name is ToolName {
  return TOOL_NAME_SET.has(name);
}

export type ToolArgs = Record<string, unknown>;

/** Per-turn values the handlers need */
export interface ToolContext {
  /** Basename → full path for every file seen in this conversation */
  fileMap: ReadonlyMap<string, string>;
  outputDir: string;
  toolTimeoutMs: number;
  sandboxTimeoutMs: number;
  accessToken?: string;
}

/** The slice of HostBridge the handlers use */
export interface NativeToolCaller {
  call(tool: string, args: ToolArgs, timeoutMs: number): Promise<BridgeOutcome>;
}

/** The slice of SandboxExecutor the handlers use */
export interface CodeRunner {
  execute(request: ExecutionRequest): Promise<ExecutionOutcome>;
}

export interface ToolDeps {
  bridge: NativeToolCaller;
  sandbox: CodeRunner;
}

/**
 * Runs one tool call. The returned value is shown to the model (objects as
 * JSON); a thrown ToolFailure becomes an error result.
 */
export type ToolHandler = (args: ToolArgs, context: ToolContext, deps: ToolDeps) => Promise<unknown>;
