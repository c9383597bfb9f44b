import { describe, it, expect, vi } from "vitest";

vi.mock("../logging.js", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../logging.js")>()),
  createComponentLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    setTurnId: vi.fn(),
  }),
}));

import { Conductor } from "./conductor.js";
import { API_KEY_MISSING, CONTINUE_PROMPT, TOOL_LIMIT_REACHED } from "./summary.js";
import { APIError, ToolFailure } from "../errors.js";
import { DEFAULT_CONFIG, DEFAULT_MODELS } from "../config.js";
import { ConversationSession } from "../session/index.js";
import type { ModelRequest, ModelResponse, ResponseBlock, ToolUseBlock } from "../llm/types.js";
import type { ToolContext } from "../tools/types.js";
import type { Credentials, QueryContext, TurnRequest } from "./types.js";

function reply(stopReason: string, content: ResponseBlock[]): ModelResponse {
  return { id: "msg_test", model: "test-model", content, stopReason, usage: { inputTokens: 10, outputTokens: 5 } };
}

function text(value: string): ResponseBlock {
  return { type: "text", text: value };
}

function toolUse(id: string, name = "lookup", input: Record<string, unknown> = { key: "answer" }): ToolUseBlock {
  return { type: "tool_use", id, name, input };
}

interface SetupOptions {
  replies?: Array<ModelResponse | Error>;
  dispatch?: (name: string, input: unknown, context: ToolContext) => Promise<unknown>;
  credentials?: Credentials;
}

function setup(options: SetupOptions = {}) {
  const queue = [...(options.replies ?? [])];
  const send = vi.fn(async (_request: ModelRequest): Promise<ModelResponse> => {
    const next = queue.shift();
    if (next === undefined) throw new Error("no scripted reply left");
    if (next instanceof Error) throw next;
    return next;
  });
  const createClient = vi.fn((_apiKey: string) => ({ send }));
  const dispatchImpl: (name: string, input: unknown, context: ToolContext) => Promise<unknown> =
    options.dispatch ?? (async () => "42");
  const dispatch = vi.fn(dispatchImpl);
  const reporter = { log: vi.fn(), recordUsage: vi.fn() };
  const session = new ConversationSession();
  const conductor = new Conductor({
    createClient,
    tools: { tools: [], dispatch },
    reporter,
    session,
    config: DEFAULT_CONFIG,
    credentials: () => options.credentials ?? { apiKey: "test-key" },
    loadSystemPrompt: async () => "Default prompt.",
  });
  return { conductor, send, createClient, dispatch, reporter, session };
}

function request(userQuery: string, context: QueryContext = {}, files: string[] = []): TurnRequest {
  return { userQuery, files, context: { preferredModel: "haiku", ...context } };
}

describe("Conductor", () => {
  it("answers directly when the model ends its turn", async () => {
    const { conductor, send, reporter, session } = setup({
      replies: [reply("end_turn", [text("Paris is the capital of France.")])],
    });

    const result = await conductor.runTurn(request("What is the capital of France?"));

    expect(result).toEqual({
      content: "Paris is the capital of France.",
      usage: { iterations: 1, toolCalls: 0, inputTokens: 10, outputTokens: 5 },
      terminal: "completed",
      model: DEFAULT_MODELS.fast,
    });
    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0][0]).toMatchObject({
      model: DEFAULT_MODELS.fast,
      system: "Default prompt.",
      messages: [{ role: "user", content: "What is the capital of France?" }],
      maxTokens: 16384,
    });
    expect(reporter.recordUsage).toHaveBeenCalledWith(DEFAULT_MODELS.fast, 10, 5);
    expect(reporter.log).toHaveBeenCalledWith("Thinking... (step 1/50)", "info", 0.01);
    expect(reporter.log).toHaveBeenCalledWith("Done!", "info", 1.0);
    expect(session.messages.map(m => [m.role, m.content])).toEqual([
      ["user", "What is the capital of France?"],
      ["assistant", "Paris is the capital of France."],
    ]);
  });

  it("runs a tool and feeds its result back to the model", async () => {
    const firstReply = reply("tool_use", [text("Let me look that up."), toolUse("t1")]);
    const { conductor, send, dispatch, reporter } = setup({
      replies: [firstReply, reply("end_turn", [text("The answer is 42.")])],
    });

    const result = await conductor.runTurn(request("What is the answer?"));

    expect(result.content).toBe("The answer is 42.");
    expect(result.usage).toEqual({ iterations: 2, toolCalls: 1, inputTokens: 20, outputTokens: 10 });
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0][0]).toBe("lookup");
    expect(dispatch.mock.calls[0][1]).toEqual({ key: "answer" });
    expect(reporter.log).toHaveBeenCalledWith("Executing 1 tool(s)...");
    expect(reporter.log).toHaveBeenCalledWith("Tool: lookup - params: key", "info", 0.5);
    expect(send.mock.calls[1][0].messages).toEqual([
      { role: "user", content: "What is the answer?" },
      { role: "assistant", content: firstReply.content },
      { role: "user", content: [{ type: "tool_result", tool_use_id: "t1", content: "42" }] },
    ]);
  });

  it("refuses calls beyond the tool-call ceiling without counting them", async () => {
    const calls = ["t1", "t2", "t3", "t4", "t5"].map(id => toolUse(id));
    const { conductor, send, dispatch } = setup({
      replies: [reply("tool_use", calls), reply("end_turn", [text("Done with three.")])],
      dispatch: async () => ({ ok: true }),
    });

    const result = await conductor.runTurn(request("Look up five things", { maxToolCalls: 3 }));

    expect(dispatch).toHaveBeenCalledTimes(3);
    expect(result.usage.toolCalls).toBe(3);
    expect(result.content).toBe("Done with three.");
    expect(send.mock.calls[1][0].messages[2]).toEqual({
      role: "user",
      content: [
        { type: "tool_result", tool_use_id: "t1", content: "{\"ok\":true}" },
        { type: "tool_result", tool_use_id: "t2", content: "{\"ok\":true}" },
        { type: "tool_result", tool_use_id: "t3", content: "{\"ok\":true}" },
        { type: "tool_result", tool_use_id: "t4", content: TOOL_LIMIT_REACHED, is_error: true },
        { type: "tool_result", tool_use_id: "t5", content: TOOL_LIMIT_REACHED, is_error: true },
      ],
    });
  });

  it("ends with the step-limit summary when tools are requested after the ceiling", async () => {
    const { conductor, dispatch, session } = setup({
      replies: [reply("tool_use", [toolUse("t1")]), reply("tool_use", [toolUse("t2")])],
    });

    const result = await conductor.runTurn(request("Keep looking", { maxToolCalls: 1 }));

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(result.terminal).toBe("budget_exhausted");
    expect(result.content).toBe(
      "I've reached my step limit after 2 iterations and 1 tool calls. I used these tools: lookup. Here's what I found so far...",
    );
    expect(session.messages[session.messages.length - 1].content).toBe(result.content);
  });

  it("stops at the iteration ceiling", async () => {
    const { conductor, send } = setup({
      replies: [
        reply("tool_use", [toolUse("t1", "web_fetch", { url: "https://example.test" })]),
        reply("tool_use", [toolUse("t2", "file_info", { file_path: "a.txt" })]),
      ],
    });

    const result = await conductor.runTurn(request("Research this", { maxIterations: 2 }));

    expect(send).toHaveBeenCalledTimes(2);
    expect(result.terminal).toBe("budget_exhausted");
    expect(result.content).toBe(
      "I've reached my step limit after 2 iterations and 2 tool calls. I used these tools: file_info, web_fetch. Here's what I found so far...",
    );
  });

  it("asks the model to continue after a length cap", async () => {
    const { conductor, send } = setup({
      replies: [reply("max_tokens", [text("Part one")]), reply("end_turn", [text("Part two")])],
    });

    const result = await conductor.runTurn(request("Write a long story"));

    expect(result.content).toBe("Part two");
    const messages = send.mock.calls[1][0].messages;
    expect(messages.slice(-2)).toEqual([
      { role: "assistant", content: [{ type: "text", text: "Part one" }] },
      { role: "user", content: CONTINUE_PROMPT },
    ]);
  });

  it("returns partial text on an unexpected stop reason", async () => {
    const { conductor } = setup({ replies: [reply("refusal", [text("I can't help with that.")])] });

    const result = await conductor.runTurn(request("Do something odd"));

    expect(result.terminal).toBe("unexpected");
    expect(result.content).toBe("I can't help with that.");
  });

  it("falls back to the step-limit summary on an unexpected stop with no text", async () => {
    const { conductor } = setup({ replies: [reply("refusal", [])] });

    const result = await conductor.runTurn(request("Do something odd"));

    expect(result.terminal).toBe("budget_exhausted");
    expect(result.content).toBe(
      "I've reached my step limit after 1 iterations and 0 tool calls. I was analyzing your request but couldn't complete it.",
    );
  });

  it("refuses to start without an API key", async () => {
    const { conductor, createClient, session } = setup({ credentials: {} });

    const result = await conductor.runTurn(request("Hello?"));

    expect(result.content).toBe(API_KEY_MISSING);
    expect(result.error).toBe(true);
    expect(createClient).not.toHaveBeenCalled();
    expect(session.messages).toHaveLength(0);
  });

  it.each([
    [new APIError("bad key", 401), "Invalid API key. Please check your configuration in Settings."],
    [new APIError("slow down", 429), "Too many requests. Please wait 60 seconds."],
    [new APIError("overloaded", 503), "AI service is busy. Retrying automatically..."],
    [new APIError("Request timed out", 408), "Operation timed out after 120s. The file may be too large."],
    [new APIError("teapot", 418), "Sorry, I encountered an error: teapot"],
    [new Error("boom"), "An unexpected error occurred: boom"],
  ])("maps %s to user-facing text and stores one reply", async (error, expected) => {
    const { conductor, session, reporter } = setup({ replies: [error] });

    const result = await conductor.runTurn(request("Hello?"));

    expect(result).toMatchObject({ content: expected, error: true, terminal: "failed" });
    expect(reporter.log).toHaveBeenCalledWith(expected, "error");
    expect(session.messages.map(m => m.role)).toEqual(["user", "assistant"]);
  });

  it("notes attached files in the user message and the file map", async () => {
    const { conductor, send, session } = setup({ replies: [reply("end_turn", [text("A report.")])] });

    await conductor.runTurn(request("Summarize", {}, ["/data/in/report.pdf"]));

    expect(send.mock.calls[0][0].messages).toEqual([
      { role: "user", content: "Summarize\n\n[Attached files: report.pdf]" },
    ]);
    expect(session.fileMap.get("report.pdf")).toBe("/data/in/report.pdf");
  });

  it("tracks files the tools create", async () => {
    const { conductor, session, reporter } = setup({
      replies: [
        reply("tool_use", [toolUse("t1", "create_pdf", { output_path: "a.pdf" })]),
        reply("end_turn", [text("Created it.")]),
      ],
      dispatch: async () => ({ output_path: "/out/a.pdf", success: true }),
    });

    const result = await conductor.runTurn(request("Make a PDF"));

    expect(result.createdFiles).toEqual(["/out/a.pdf"]);
    expect(session.fileMap.get("a.pdf")).toBe("/out/a.pdf");
    expect(reporter.log).toHaveBeenCalledWith("File: /out/a.pdf");
  });

  it("turns tool failures into error results", async () => {
    const { conductor, send } = setup({
      replies: [reply("tool_use", [toolUse("t1")]), reply("end_turn", [text("It failed.")])],
      dispatch: async () => {
        throw new ToolFailure("File not found: x.txt");
      },
    });

    await conductor.runTurn(request("Try"));
    expect(send.mock.calls[1][0].messages[2]).toEqual({
      role: "user",
      content: [{ type: "tool_result", tool_use_id: "t1", content: "File not found: x.txt", is_error: true }],
    });
  });

  it("reports unexpected tool exceptions with a prefix", async () => {
    const { conductor, send } = setup({
      replies: [reply("tool_use", [toolUse("t1")]), reply("end_turn", [text("ok")])],
      dispatch: async () => {
        throw new Error("kaput");
      },
    });

    await conductor.runTurn(request("Try"));
    expect(send.mock.calls[1][0].messages[2]).toEqual({
      role: "user",
      content: [{ type: "tool_result", tool_use_id: "t1", content: "Tool error: kaput", is_error: true }],
    });
  });

  it("truncates long tool results", async () => {
    const long = "a".repeat(6000) + "b".repeat(6000);
    const { conductor, send } = setup({
      replies: [reply("tool_use", [toolUse("t1")]), reply("end_turn", [text("ok")])],
      dispatch: async () => long,
    });

    await conductor.runTurn(request("Read it"));
    const results = send.mock.calls[1][0].messages[2].content;
    expect(results).toEqual([
      {
        type: "tool_result",
        tool_use_id: "t1",
        content: `${"a".repeat(5000)}\n\n[Output truncated...]\n\n${"b".repeat(2000)}`,
      },
    ]);
  });

  it("uses a custom system prompt and the stored access token", async () => {
    const { conductor, send, dispatch } = setup({
      replies: [reply("tool_use", [toolUse("t1", "gmail", { action: "list" })]), reply("end_turn", [text("ok")])],
      credentials: { apiKey: "test-key", accessToken: "test-access" },
    });

    await conductor.runTurn(request("Check mail", { systemPrompt: "Be brief." }));

    expect(send.mock.calls[0][0].system).toBe("Be brief.");
    expect(dispatch.mock.calls[0][2].accessToken).toBe("test-access");
  });

  it("prefers the access token sent with the query", async () => {
    const { conductor, dispatch } = setup({
      replies: [reply("tool_use", [toolUse("t1", "gmail", { action: "list" })]), reply("end_turn", [text("ok")])],
      credentials: { apiKey: "test-key", accessToken: "test-access" },
    });

    await conductor.runTurn(request("Check mail", { accessToken: "query-access" }));

    expect(dispatch.mock.calls[0][2].accessToken).toBe("query-access");
  });

  it("sends prior conversation before the new message", async () => {
    const { conductor, send, session } = setup({ replies: [reply("end_turn", [text("Still Paris.")])] });
    session.addMessage("user", "Capital of France?");
    session.addMessage("assistant", "Paris.");

    await conductor.runTurn(request("Are you sure?"));

    expect(send.mock.calls[0][0].messages).toEqual([
      { role: "user", content: "Capital of France?" },
      { role: "assistant", content: "Paris." },
      { role: "user", content: "Are you sure?" },
    ]);
  });
});
