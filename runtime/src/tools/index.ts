export { ToolDispatcher, validateArguments } from "./dispatcher.js";
export type { DispatcherOptions } from "./dispatcher.js";
export { loadCatalog, parseCatalog, getToolNames, CATALOG_PATH } from "./catalog.js";
export { TOOL_HANDLERS, GOOGLE_NOT_CONNECTED, MEDIA_TIMEOUT_MULTIPLIER } from "./handlers/index.js";
export {
  prepareArguments,
  resolveFilePaths,
  resolveOutputPath,
  stripInternalKeys,
  parsePageRange,
  PATH_KEYS,
  PATH_LIST_KEYS,
} from "./resolve.js";
export type { PageSpan, PageSelection } from "./resolve.js";
export { TOOL_NAMES, isToolName } from "./types.js";
export type { ToolName, ToolArgs, ToolContext, ToolDeps, ToolHandler, NativeToolCaller, CodeRunner } from "./types.js";
