/**
 * Validation of host-sent session deltas.
 */

import type { HostMessage, SessionAttachment, SessionDelta } from "./types.js";

export class InvalidDeltaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDeltaError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseConversationId(value: unknown): string | number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string" || typeof value === "number") return value;
  throw new InvalidDeltaError("conversation_id must be a string or a number");
}

function parseAttachments(value: unknown): SessionAttachment[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter(isRecord).map(item => ({
    ...(typeof item.local_path === "string" ? { local_path: item.local_path } : {}),
    ...(typeof item.original_name === "string" ? { original_name: item.original_name } : {}),
  }));
}

function parseMessage(value: unknown): HostMessage {
  if (!isRecord(value)) {
    throw new InvalidDeltaError("message must be an object");
  }
  const attachments = parseAttachments(value.attachments);
  return {
    ...(typeof value.id === "number" ? { id: value.id } : {}),
    role: typeof value.role === "string" ? value.role : "",
    content: typeof value.content === "string" ? value.content : "",
    ...(typeof value.token_count === "number" ? { token_count: value.token_count } : {}),
    ...(attachments ? { attachments } : {}),
  };
}

export function parseDelta(value: unknown): SessionDelta {
  if (!isRecord(value)) {
    throw new InvalidDeltaError("delta must be an object");
  }

  switch (value.action) {
    case "new_conversation":
      return { action: "new_conversation", conversation_id: parseConversationId(value.conversation_id) };

    case "add_message":
      return { action: "add_message", message: parseMessage(value.message) };

    case "set_summary":
      if (typeof value.summary !== "string" || typeof value.summarized_up_to_id !== "number") {
        throw new InvalidDeltaError("set_summary needs summary and summarized_up_to_id");
      }
      return { action: "set_summary", summary: value.summary, summarized_up_to_id: value.summarized_up_to_id };

    case "sync_full": {
      if (!Array.isArray(value.messages)) {
        throw new InvalidDeltaError("sync_full needs a messages list");
      }
      const fileMap = isRecord(value.file_map)
        ? Object.fromEntries(
            Object.entries(value.file_map).filter((entry): entry is [string, string] => typeof entry[1] === "string"),
          )
        : undefined;
      return {
        action: "sync_full",
        conversation_id: parseConversationId(value.conversation_id),
        messages: value.messages.map(parseMessage),
        summary: typeof value.summary === "string" ? value.summary : null,
        ...(fileMap ? { file_map: fileMap } : {}),
      };
    }

    default:
      throw new InvalidDeltaError(`Unknown delta action: ${String(value.action)}`);
  }
}
