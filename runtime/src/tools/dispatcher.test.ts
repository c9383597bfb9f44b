import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ToolDispatcher } from "./dispatcher.js";
import { ToolFailure } from "../errors.js";
import type { BridgeOutcome } from "../bridge/types.js";
import type { ExecutionOutcome, ExecutionRequest } from "../sandbox/types.js";
import type { ToolArgs, ToolContext } from "./types.js";

function setup(outcome: BridgeOutcome = { status: "ok", value: { done: true } }) {
  const call = vi.fn(async (_tool: string, _args: ToolArgs, _timeoutMs: number): Promise<BridgeOutcome> => outcome);
  const execute = vi.fn(async (_request: ExecutionRequest): Promise<ExecutionOutcome> => ({
    status: "ok",
    output: "hi\n",
    artifacts: [],
    files: [],
  }));
  const dispatcher = new ToolDispatcher({ bridge: { call }, sandbox: { execute } });
  return { call, execute, dispatcher };
}

describe("ToolDispatcher", () => {
  let dir: string;
  let context: ToolContext;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "dispatch-"));
    context = {
      fileMap: new Map([["notes.txt", path.join(dir, "notes.txt")]]),
      outputDir: path.join(dir, "out"),
      toolTimeoutMs: 30000,
      sandboxTimeoutMs: 30000,
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("rejects unknown tools", async () => {
    const { dispatcher } = setup();
    await expect(dispatcher.dispatch("launch_rockets", {}, context)).rejects.toThrow("Unknown tool: launch_rockets");
  });

  it("rejects non-object arguments and missing required keys", async () => {
    const { dispatcher, call } = setup();
    await expect(dispatcher.dispatch("web_fetch", "https://example.test", context)).rejects.toThrow("Arguments for web_fetch must be an object");
    await expect(dispatcher.dispatch("ffmpeg_process", { input_path: "a.mp4" }, context))
      .rejects.toThrow("Missing required arguments for ffmpeg_process: output_path, operation");
    expect(call).not.toHaveBeenCalled();
  });

  it("forwards host tools under their host names with scaled timeouts", async () => {
    const { dispatcher, call } = setup();

    await dispatcher.dispatch("ffmpeg_process", { input_path: "notes.txt", output_path: "cut.mp4", operation: "trim" }, context);
    await dispatcher.dispatch("ocr_image", { image_path: "scan.png", _timeout_ms: 5 }, context);

    expect(call.mock.calls[0]).toEqual([
      "ffmpeg",
      { input_path: path.join(dir, "notes.txt"), output_path: path.join(dir, "out", "cut.mp4"), operation: "trim" },
      300000,
    ]);
    expect(call.mock.calls[1]).toEqual(["ocr", { image_path: "scan.png" }, 30000]);
  });

  it("gives smart_crop and download_media the media timeout", async () => {
    const { dispatcher, call } = setup();
    await dispatcher.dispatch("smart_crop", { input_path: "a.mp4", output_path: "/abs/b.mp4" }, context);
    await dispatcher.dispatch("download_media", { url: "https://media.test/clip" }, context);
    await dispatcher.dispatch("web_fetch", { url: "https://example.test" }, context);
    expect(call.mock.calls.map(args => args[2])).toEqual([300000, 300000, 30000]);
  });

  it("maps a bridge timeout to a ToolFailure", async () => {
    const { dispatcher } = setup({ status: "timed_out", timeoutMs: 30000 });
    await expect(dispatcher.dispatch("web_fetch", { url: "https://example.test" }, context))
      .rejects.toThrow("Operation timed out after 30s");
  });

  it("passes a host failure through with its code", async () => {
    const { dispatcher } = setup({ status: "failed", error: new ToolFailure("codec missing", -32010) });
    await expect(dispatcher.dispatch("convert_document", { input_path: "a.docx", output_format: "pdf" }, context))
      .rejects.toMatchObject({ message: "codec missing", code: -32010 });
  });

  it("requires a Google connection for Google tools", async () => {
    const { dispatcher, call } = setup();
    await expect(dispatcher.dispatch("gmail", { action: "list" }, context)).rejects.toThrow("Google account not connected");

    await dispatcher.dispatch("gmail", { action: "list" }, { ...context, accessToken: "test-token" });
    expect(call).toHaveBeenCalledWith("gmail", { action: "list", access_token: "test-token" }, 30000);
  });

  it("checks PDF page ranges before delegating", async () => {
    const { dispatcher, call } = setup();
    await expect(dispatcher.dispatch("read_pdf", { pdf_path: "a.pdf", pages: "0-2" }, context)).rejects.toThrow("page 0 is out of range");
    expect(call).not.toHaveBeenCalled();
  });

  it("runs code in the sandbox with resolved file paths", async () => {
    const { dispatcher, execute } = setup();

    const result = await dispatcher.dispatch("run_javascript", { code: "console.log('hi')", file_paths: ["notes.txt"] }, context);

    expect(result).toEqual({ output: "hi\n" });
    expect(execute).toHaveBeenCalledWith({
      code: "console.log('hi')",
      allowedPaths: [path.join(dir, "notes.txt")],
      outputDir: path.join(dir, "out"),
      timeoutMs: 30000,
    });
  });

  it("labels sandbox violations", async () => {
    const { dispatcher, execute } = setup();
    execute.mockResolvedValueOnce({
      status: "failed",
      kind: "violation",
      message: "Import of 'fs' is not allowed for security reasons",
      output: "",
    });

    await expect(dispatcher.dispatch("run_javascript", { code: "require('fs')" }, context))
      .rejects.toThrow("Sandbox violation: Import of 'fs' is not allowed for security reasons");
  });

  it("reports files created by the sandbox as output paths", async () => {
    const { dispatcher, execute } = setup();
    execute.mockResolvedValueOnce({
      status: "ok",
      output: "",
      result: "42",
      artifacts: ["/out/plot_1.svg"],
      files: ["/out/data.csv"],
    });

    await expect(dispatcher.dispatch("run_javascript", { code: "42" }, context)).resolves.toEqual({
      output: "",
      result: "42",
      output_paths: ["/out/plot_1.svg", "/out/data.csv"],
    });
  });

  it("writes, inspects and reads local files", async () => {
    const { dispatcher, call } = setup();

    const written = await dispatcher.dispatch("write_file", { output_path: "hello.txt", content: "hello world" }, context);
    const target = path.join(dir, "out", "hello.txt");
    expect(written).toEqual({ output_path: target, success: true, size_bytes: 11 });

    const localContext = { ...context, fileMap: new Map([["hello.txt", target]]) };
    await expect(dispatcher.dispatch("file_info", { file_path: "hello.txt" }, localContext)).resolves.toEqual({
      name: "hello.txt",
      path: target,
      size_bytes: 11,
      size_mb: 0,
      extension: "txt",
    });
    await expect(dispatcher.dispatch("read_file", { file_path: "hello.txt" }, localContext)).resolves.toEqual({
      path: target,
      content: "hello world",
      size_bytes: 11,
    });
    expect(call).not.toHaveBeenCalled();
  });

  it("reports a missing file", async () => {
    const { dispatcher } = setup();
    await expect(dispatcher.dispatch("file_info", { file_path: "/nope/missing.bin" }, context))
      .rejects.toThrow("File not found: /nope/missing.bin");
  });

  it("wraps unexpected handler crashes", async () => {
    const dispatcher = new ToolDispatcher(
      { bridge: { call: vi.fn() }, sandbox: { execute: vi.fn() } },
      { handlers: { web_fetch: async () => { throw new Error("socket closed"); } } },
    );
    await expect(dispatcher.dispatch("web_fetch", { url: "https://example.test" }, context)).rejects.toThrow("Tool error: socket closed");
  });
});
