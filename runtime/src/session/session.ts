/**
 * Conversation Session
 *
 * In-memory copy of the current conversation, kept for the lifetime of the
 * process. The host owns durable storage and keeps this copy current with
 * deltas; the Conductor reads a token-bounded window from it each turn.
 */

import { basename } from "path";
import { createComponentLogger } from "../logging.js";
import type { ModelMessage } from "../llm/types.js";
import {
  SUMMARY_ACKNOWLEDGEMENT,
  SUMMARY_PREFIX,
  type HostMessage,
  type SessionAttachment,
  type SessionDelta,
  type SessionMessage,
  type SessionRole,
} from "./types.js";

const log = createComponentLogger("session");

const SESSION_ROLES: ReadonlySet<string> = new Set(["user", "assistant", "system", "tool_result"]);

function isSessionRole(role: string): role is SessionRole {
  return SESSION_ROLES.has(role);
}

/** Rough token estimate used throughout: a quarter of the character count */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

function attachmentEntry(attachment: SessionAttachment): [string, string] | null {
  const localPath = attachment.local_path;
  if (!localPath) return null;
  return [attachment.original_name || basename(localPath), localPath];
}

export class ConversationSession {
  conversationId: string | number | null = null;
  messages: SessionMessage[] = [];
  summary: string | null = null;
  summarizedUpToId: number | null = null;
  /** Basename → full path of every file attached or created in this conversation */
  readonly fileMap = new Map<string, string>();

  private nextId = 1;

  get totalTokens(): number {
    return this.messages.reduce((sum, message) => sum + message.tokenCount, 0);
  }

  // ============================================
  // DELTAS
  // ============================================

  applyDelta(delta: SessionDelta): void {
    switch (delta.action) {
      case "new_conversation":
        this.reset(delta.conversation_id ?? null);
        break;

      case "add_message":
        this.appendHostMessage(delta.message);
        break;

      case "set_summary":
        this.summary = delta.summary;
        this.summarizedUpToId = delta.summarized_up_to_id;
        this.messages = this.messages.filter(message => message.id > delta.summarized_up_to_id);
        break;

      case "sync_full":
        this.reset(delta.conversation_id ?? null);
        this.summary = delta.summary ?? null;
        for (const message of delta.messages) {
          this.appendHostMessage(message);
        }
        for (const message of this.messages) {
          for (const attachment of message.attachments ?? []) {
            const entry = attachmentEntry(attachment);
            if (entry) this.fileMap.set(entry[0], entry[1]);
          }
        }
        for (const [name, path] of Object.entries(delta.file_map ?? {})) {
          this.fileMap.set(name, path);
        }
        break;
    }

    log.debug("Session delta applied", {
      action: delta.action,
      messages: this.messages.length,
      files: this.fileMap.size,
    });
  }

  private reset(conversationId: string | number | null): void {
    this.conversationId = conversationId;
    this.messages = [];
    this.summary = null;
    this.summarizedUpToId = null;
    this.fileMap.clear();
    this.nextId = 1;
  }

  private appendHostMessage(message: HostMessage): void {
    if (!message.role || !message.content) {
      log.debug("Ignoring empty session message", { role: message.role });
      return;
    }
    const role: SessionRole = isSessionRole(message.role) ? message.role : "user";
    const id = message.id ?? this.nextId;
    this.nextId = Math.max(this.nextId, id + 1);
    this.messages.push({
      id,
      role,
      content: message.content,
      tokenCount: message.token_count ?? estimateTokens(message.content),
      ...(message.attachments?.length ? { attachments: message.attachments } : {}),
    });
  }

  // ============================================
  // LOCAL UPDATES
  // ============================================

  addMessage(role: SessionRole, content: string, attachments?: SessionAttachment[]): SessionMessage {
    const message: SessionMessage = {
      id: this.nextId++,
      role,
      content,
      tokenCount: estimateTokens(content),
      ...(attachments?.length ? { attachments } : {}),
    };
    this.messages.push(message);
    return message;
  }

  /** Register files by basename so later tool calls can refer to them */
  trackFiles(paths: readonly string[]): void {
    for (const path of paths) {
      this.fileMap.set(basename(path), path);
    }
  }

  // ============================================
  // CONTEXT WINDOW
  // ============================================

  /**
   * Messages for the next model call: the summary (as a user/assistant
   * pair) plus the newest messages that fit in `maxTokens`, starting on a
   * user turn with no two consecutive messages from the same role.
   */
  getContextForLlm(maxTokens: number = 150000): ModelMessage[] {
    let remaining = maxTokens;
    const prefix: ModelMessage[] = [];

    if (this.summary) {
      const summaryText = `${SUMMARY_PREFIX}${this.summary}`;
      prefix.push(
        { role: "user", content: summaryText },
        { role: "assistant", content: SUMMARY_ACKNOWLEDGEMENT },
      );
      remaining -= estimateTokens(summaryText) + estimateTokens(SUMMARY_ACKNOWLEDGEMENT);
    }

    const window: ModelMessage[] = [];
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const message = this.messages[i];
      if (this.summarizedUpToId !== null && message.id <= this.summarizedUpToId) break;
      if (remaining - message.tokenCount < 0) break;
      remaining -= message.tokenCount;
      window.unshift(formatMessage(message));
    }

    while (window.length > 0 && window[0].role === "assistant") {
      window.shift();
    }

    return mergeConsecutive([...prefix, ...window]);
  }
}

function formatMessage(message: SessionMessage): ModelMessage {
  let content = message.content;
  if (message.attachments?.length) {
    const names = message.attachments.map(attachment =>
      attachment.original_name || (attachment.local_path ? basename(attachment.local_path) : "file"),
    );
    content += `\n\n[Attachments: ${names.join(", ")}]`;
  }
  return { role: message.role === "assistant" ? "assistant" : "user", content };
}

/** Join neighbouring string messages from the same role with a blank line */
export function mergeConsecutive(messages: ModelMessage[]): ModelMessage[] {
  const merged: ModelMessage[] = [];
  for (const message of messages) {
    const previous = merged[merged.length - 1];
    if (previous && previous.role === message.role && typeof previous.content === "string" && typeof message.content === "string") {
      merged[merged.length - 1] = { role: previous.role, content: `${previous.content}\n\n${message.content}` };
    } else {
      merged.push(message);
    }
  }
  return merged;
}
