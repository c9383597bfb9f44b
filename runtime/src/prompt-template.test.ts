import { describe, it, expect, vi } from "vitest";

vi.mock("./logging.js", () => ({
  createComponentLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { renderTemplate, loadPrompt, loadSystemPrompt } from "./prompt-template.js";

describe("renderTemplate", () => {
  it("fills placeholders case-insensitively and tolerates inner spaces", () => {
    expect(renderTemplate("A |* Tool Names *| B |*conversation*|", { "tool names": "x, y", Conversation: "hi" }))
      .toBe("A x, y B hi");
  });

  it("marks unknown fields", () => {
    expect(renderTemplate("|* Nope *|", {})).toBe("[MISSING: Nope]");
  });
});

describe("loadPrompt", () => {
  it("renders the self-improvement template with every field filled", async () => {
    const prompt = await loadPrompt("self-improve.md", {
      "Current Prompt": "Be helpful.",
      "Tool Names": "file_info, read_file",
      Conversation: "[User]: hi\n\n",
    });

    expect(prompt).toContain("---\nBe helpful.\n---");
    expect(prompt).toContain("file_info, read_file");
    expect(prompt).not.toContain("[MISSING:");
  });

  it("rejects a template that does not exist", async () => {
    await expect(loadPrompt("missing.md")).rejects.toThrow("Prompt template not found");
  });

  it("loads the default system prompt", async () => {
    const prompt = await loadSystemPrompt();
    expect(prompt.startsWith("You are Pocketmind")).toBe(true);
    expect(prompt).toContain("run_javascript");
  });
});
