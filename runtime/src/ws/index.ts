export { HostLinkServer, isBridgeResponse } from "./server.js";
export type { ControlHandler, HostLinkOptions } from "./server.js";
