export { HostBridge } from "./host-bridge.js";
export { QueueTransport } from "./transport.js";
export { AsyncChannel } from "./channel.js";
export type {
  BridgeOutcome,
  BridgeLogLevel,
  BridgeTransport,
  NativeToolRequest,
  LogNotification,
  UsageNotification,
  OutboundMessage,
  InboundResponse,
} from "./types.js";
