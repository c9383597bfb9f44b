export {
  selfImprove,
  formatConversation,
  parseConversation,
  SELF_IMPROVE_TIMEOUT_MS,
  SELF_IMPROVE_MAX_TOKENS,
  SELF_IMPROVE_THINKING_TOKENS,
} from "./self-improve.js";
export type { ConversationEntry, SelfImproveDeps, SelfImproveRequest, SelfImproveResult } from "./self-improve.js";
