import { describe, it, expect, vi } from "vitest";

vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { RpcHandler } from "./handler.js";
import { CredentialStore } from "../credentials.js";
import { ConversationSession } from "../session/index.js";
import type { TurnRequest, TurnResult } from "../conductor/types.js";
import type { SelfImproveRequest, SelfImproveResult } from "../improve/index.js";
import type { LogEntry } from "@pocketmind/shared/logging";

function turnResult(content: string, extra: Partial<TurnResult> = {}): TurnResult {
  return {
    content,
    usage: { iterations: 1, toolCalls: 0, inputTokens: 10, outputTokens: 5 },
    terminal: "completed",
    ...extra,
  };
}

function setup(runTurn: (request: TurnRequest) => Promise<TurnResult> = async () => turnResult("ok")) {
  const session = new ConversationSession();
  const credentials = new CredentialStore();
  const turn = vi.fn(runTurn);
  const improve = vi.fn(async (_request: SelfImproveRequest): Promise<SelfImproveResult> => ({ improved_prompt: "Better." }));
  const recentLogs = vi.fn((count: number): LogEntry[] =>
    Array.from({ length: count }, (_, i) => ({
      timestamp: `2026-01-01T00:00:0${i}.000Z`,
      level: "info" as const,
      component: "runtime.test",
      message: `entry ${i}`,
    })),
  );
  const handler = new RpcHandler({ runTurn: turn, selfImprove: improve, session, credentials, recentLogs });
  return { handler, session, credentials, turn, improve, recentLogs };
}

function call(method: string, params: unknown = {}, id: string | number = 1): string {
  return JSON.stringify({ jsonrpc: "2.0", id, method, params });
}

describe("RpcHandler", () => {
  it("rejects unparseable input", async () => {
    const { handler } = setup();
    const response = JSON.parse(await handler.handle("{not json"));
    expect(response.id).toBeNull();
    expect(response.error.code).toBe(-32700);
    expect(response.error.message).toMatch(/^Parse error: /);
  });

  it("rejects requests without a method", async () => {
    const { handler } = setup();
    expect(JSON.parse(await handler.handle(JSON.stringify({ jsonrpc: "2.0", id: 4 })))).toEqual({
      jsonrpc: "2.0",
      id: 4,
      error: { code: -32600, message: "Invalid request: method is required" },
    });
  });

  it("reports unknown methods", async () => {
    const { handler } = setup();
    expect(JSON.parse(await handler.handle(call("reboot")))).toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32601, message: "Method not found: reboot" },
    });
  });

  it("runs a query and returns the host's result shape", async () => {
    const { handler, turn } = setup(async () =>
      turnResult("Made it.", { createdFiles: ["/out/a.pdf"], usage: { iterations: 2, toolCalls: 1, inputTokens: 30, outputTokens: 12 } }),
    );

    const response = JSON.parse(await handler.handle(call("process_query", {
      user_query: "Make a PDF",
      files: ["/in/photo.jpg"],
      context: { max_iterations: 5, preferred_model: "sonnet" },
    }, "q1")));

    expect(turn).toHaveBeenCalledWith({
      userQuery: "Make a PDF",
      files: ["/in/photo.jpg"],
      context: { maxIterations: 5, preferredModel: "sonnet" },
    });
    expect(response).toEqual({
      jsonrpc: "2.0",
      id: "q1",
      result: {
        content: "Made it.",
        created_files: ["/out/a.pdf"],
        usage: { iterations: 2, tool_calls: 1, input_tokens: 30, output_tokens: 12 },
      },
    });
  });

  it("marks failed turns with error true", async () => {
    const { handler } = setup(async () => turnResult("API key not configured.", { error: true, terminal: "failed" }));
    const response = JSON.parse(await handler.handle(call("process_query", { user_query: "hi" })));
    expect(response.result.error).toBe(true);
  });

  it("rejects non-string file lists", async () => {
    const { handler, turn } = setup();
    const response = JSON.parse(await handler.handle(call("process_query", { user_query: "hi", files: [3] })));
    expect(response.error).toEqual({ code: -32602, message: "Invalid params: files must be a list of paths" });
    expect(turn).not.toHaveBeenCalled();
  });

  it("runs one turn at a time", async () => {
    let releaseFirst: () => void = () => undefined;
    const order: string[] = [];
    const { handler } = setup(async request => {
      order.push(`start ${request.userQuery}`);
      if (request.userQuery === "first") {
        await new Promise<void>(resolve => {
          releaseFirst = resolve;
        });
      }
      order.push(`end ${request.userQuery}`);
      return turnResult(request.userQuery);
    });

    const first = handler.handle(call("process_query", { user_query: "first" }, 1));
    const second = handler.handle(call("process_query", { user_query: "second" }, 2));
    await new Promise(resolve => setTimeout(resolve, 10));
    expect(order).toEqual(["start first"]);

    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["start first", "end first", "start second", "end second"]);
  });

  it("keeps serving turns after one throws", async () => {
    const { handler } = setup(async request => {
      if (request.userQuery === "bad") throw new Error("boom");
      return turnResult("fine");
    });

    const bad = JSON.parse(await handler.handle(call("process_query", { user_query: "bad" })));
    expect(bad.error).toEqual({ code: -32603, message: "Internal error: boom" });

    const good = JSON.parse(await handler.handle(call("process_query", { user_query: "good" })));
    expect(good.result.content).toBe("fine");
  });

  it("applies session deltas", async () => {
    const { handler, session } = setup();
    const response = JSON.parse(await handler.handle(call("apply_delta", {
      action: "add_message",
      message: { id: 1, role: "user", content: "hello" },
    })));
    expect(response.result).toEqual({ success: true });
    expect(session.messages.map(m => m.content)).toEqual(["hello"]);
  });

  it("rejects malformed deltas as invalid params", async () => {
    const { handler } = setup();
    const response = JSON.parse(await handler.handle(call("apply_delta", { action: "explode" })));
    expect(response.error).toEqual({ code: -32602, message: "Invalid params: Unknown delta action: explode" });
  });

  it("stores credentials", async () => {
    const { handler, credentials } = setup();
    await handler.handle(call("set_api_key", { api_key: "test-key" }));
    await handler.handle(call("set_access_token", { access_token: "test-access" }));
    expect(credentials.get()).toEqual({ apiKey: "test-key", accessToken: "test-access" });
  });

  it("runs self-improvement with the stored key when none is given", async () => {
    const { handler, credentials, improve } = setup();
    credentials.setApiKey("test-key");

    const response = JSON.parse(await handler.handle(call("self_improve", {
      conversation: [{ role: "user", content: "hi" }],
      current_prompt: "Be helpful.",
    })));

    expect(improve).toHaveBeenCalledWith({
      conversation: [{ role: "user", content: "hi" }],
      currentPrompt: "Be helpful.",
      apiKey: "test-key",
    });
    expect(response.result).toEqual({ improved_prompt: "Better." });
  });

  it("returns recent log entries", async () => {
    const { handler, recentLogs } = setup();

    const response = JSON.parse(await handler.handle(call("get_logs", { count: 2 })));
    expect(recentLogs).toHaveBeenCalledWith(2);
    expect(response.result.logs.map((entry: LogEntry) => entry.message)).toEqual(["entry 0", "entry 1"]);

    await handler.handle(call("get_logs"));
    expect(recentLogs).toHaveBeenLastCalledWith(100);

    const bad = JSON.parse(await handler.handle(call("get_logs", { count: 0 })));
    expect(bad.error).toEqual({ code: -32602, message: "Invalid params: count must be a positive integer" });
  });
});
