/**
 * Model Client Types
 *
 * Conversation messages use the provider's content-block shape directly:
 * the Conductor builds them, the client sends them verbatim.
 */

// ============================================
// CONTENT BLOCKS
// ============================================

export interface TextBlock {
  type: "text";
  text: string;
}

export interface ToolUseBlock {
  type: "tool_use";
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: "tool_result";
  tool_use_id: string;
  content: string;
  is_error?: boolean;
}

/** Extended-thinking output; never shown to the user */
export interface ThinkingBlock {
  type: "thinking";
  thinking: string;
  signature?: string;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock | ThinkingBlock;

export type ResponseBlock = TextBlock | ToolUseBlock | ThinkingBlock;

// ============================================
// MESSAGES
// ============================================

export type MessageRole = "user" | "assistant";

export interface ModelMessage {
  role: MessageRole;
  content: string | ContentBlock[];
}

// ============================================
// TOOLS
// ============================================

export interface JsonSchemaProperty {
  type?: string;
  description?: string;
  enum?: string[];
  default?: unknown;
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: ToolInputSchema;
}

// ============================================
// REQUEST / RESPONSE
// ============================================

export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "stop_sequence" | "pause_turn" | "refusal";

export interface ModelRequest {
  model: string;
  system?: string;
  messages: ModelMessage[];
  tools?: ToolDefinition[];
  maxTokens: number;
  temperature?: number;
  /** Extended thinking budget; requires temperature 1 */
  thinkingBudgetTokens?: number;
  /** Per-request timeout (default 120s) */
  timeoutMs?: number;
}

export interface ModelUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ModelResponse {
  id: string;
  model: string;
  content: ResponseBlock[];
  /** Provider-reported reason; unknown values are passed through */
  stopReason: StopReason | string | null;
  usage: ModelUsage;
}

export interface ModelClient {
  send(request: ModelRequest): Promise<ModelResponse>;
}

// ============================================
// HELPERS
// ============================================

export function extractText(blocks: readonly ContentBlock[]): string {
  return blocks
    .filter((block): block is TextBlock => block.type === "text")
    .map(block => block.text)
    .join("\n");
}

export function extractToolUses(blocks: readonly ContentBlock[]): ToolUseBlock[] {
  return blocks.filter((block): block is ToolUseBlock => block.type === "tool_use");
}
