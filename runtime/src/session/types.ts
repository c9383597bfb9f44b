/**
 * Session Types
 *
 * Deltas arrive from the host in its own snake_case shape; SessionMessage is
 * the runtime's view of a stored message.
 */

export type SessionRole = "user" | "assistant" | "system" | "tool_result";

export interface SessionAttachment {
  local_path?: string;
  original_name?: string;
}

export interface SessionMessage {
  id: number;
  role: SessionRole;
  content: string;
  tokenCount: number;
  attachments?: SessionAttachment[];
}

/** Message as the host sends it */
export interface HostMessage {
  id?: number;
  role: string;
  content: string;
  token_count?: number;
  attachments?: SessionAttachment[];
}

export type SessionDelta =
  | { action: "new_conversation"; conversation_id?: string | number }
  | { action: "add_message"; message: HostMessage }
  | { action: "set_summary"; summary: string; summarized_up_to_id: number }
  | {
      action: "sync_full";
      conversation_id?: string | number;
      messages: HostMessage[];
      summary?: string | null;
      file_map?: Record<string, string>;
    };

export const SUMMARY_PREFIX = "[Previous conversation summary]\n";
export const SUMMARY_ACKNOWLEDGEMENT = "I understand the context from our previous conversation.";
