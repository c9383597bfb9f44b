export { RpcHandler, toWireResult } from "./handler.js";
export type { RpcDeps } from "./handler.js";
export * from "./types.js";
