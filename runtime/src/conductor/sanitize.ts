/**
 * Message Sanitization
 *
 * Every tool_result must answer a tool_use from the assistant message right
 * before it, and every tool_use must be answered; the API rejects anything
 * else. Run before each model call: orphaned results are dropped and
 * unanswered invocations get a placeholder error result.
 */

import { createComponentLogger } from "../logging.js";
import type { ContentBlock, ModelMessage, ToolResultBlock } from "../llm/types.js";

const log = createComponentLogger("conductor.sanitize");

export const MISSING_RESULT = "(no result: tool execution was skipped)";

function pendingToolUseIds(message: ModelMessage | undefined): string[] {
  if (!message || message.role !== "assistant" || typeof message.content === "string") return [];
  return message.content.flatMap(block => (block.type === "tool_use" ? [block.id] : []));
}

function placeholders(ids: readonly string[]): ToolResultBlock[] {
  return ids.map(id => ({ type: "tool_result", tool_use_id: id, content: MISSING_RESULT, is_error: true }));
}

export function sanitizeMessages(messages: readonly ModelMessage[]): ModelMessage[] {
  const out: ModelMessage[] = [];

  for (const message of messages) {
    const expected = pendingToolUseIds(out[out.length - 1]);

    if (message.role === "assistant") {
      if (expected.length > 0) {
        log.warn(`sanitizeMessages: patching ${expected.length} missing tool results`, { index: out.length });
        out.push({ role: "user", content: placeholders(expected) });
      }
      out.push(message);
      continue;
    }

    if (typeof message.content === "string") {
      if (expected.length === 0) {
        out.push(message);
        continue;
      }
      log.warn(`sanitizeMessages: patching ${expected.length} missing tool results`, { index: out.length });
      out.push({ role: "user", content: [...placeholders(expected), { type: "text", text: message.content }] });
      continue;
    }

    const known = new Set(expected);
    const results: ToolResultBlock[] = [];
    const others: ContentBlock[] = [];
    let dropped = 0;

    for (const block of message.content) {
      if (block.type !== "tool_result") {
        others.push(block);
      } else if (known.has(block.tool_use_id)) {
        results.push(block);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      log.warn(`sanitizeMessages: dropping ${dropped} orphaned tool results`, { index: out.length });
    }

    const answered = new Set(results.map(block => block.tool_use_id));
    const missing = expected.filter(id => !answered.has(id));
    if (missing.length > 0) {
      log.warn(`sanitizeMessages: patching ${missing.length} missing tool results`, { index: out.length });
    }

    // Results lead the message, in the order they were requested
    const ordered = [...results, ...placeholders(missing)].sort(
      (a, b) => expected.indexOf(a.tool_use_id) - expected.indexOf(b.tool_use_id),
    );
    const content: ContentBlock[] = [...ordered, ...others];
    if (content.length > 0) {
      out.push({ role: "user", content });
    }
  }

  const trailing = pendingToolUseIds(out[out.length - 1]);
  if (trailing.length > 0) {
    log.warn(`sanitizeMessages: patching ${trailing.length} missing tool results`, { index: out.length });
    out.push({ role: "user", content: placeholders(trailing) });
  }

  return out;
}
