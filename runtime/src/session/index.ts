export { ConversationSession, estimateTokens, mergeConsecutive } from "./session.js";
export { parseDelta, InvalidDeltaError } from "./delta.js";
export { SUMMARY_PREFIX, SUMMARY_ACKNOWLEDGEMENT } from "./types.js";
export type { SessionDelta, SessionMessage, SessionRole, SessionAttachment, HostMessage } from "./types.js";
