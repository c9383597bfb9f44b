/**
 * Sandbox capability policy: which modules generated code may load, which
 * names it may not touch, and where it may read and write.
 */

import { relative, isAbsolute, resolve } from "path";

// ============================================
// MODULES
// ============================================

/** Pure utility modules with no process, filesystem or network reach. */
export const ALLOWED_MODULES: readonly string[] = [
  "assert",
  "buffer",
  "crypto",
  "events",
  "path",
  "querystring",
  "string_decoder",
  "url",
  "util",
];

export const DENIED_MODULES: readonly string[] = [
  "child_process",
  "cluster",
  "dgram",
  "dns",
  "fs",
  "http",
  "http2",
  "https",
  "inspector",
  "module",
  "net",
  "os",
  "perf_hooks",
  "process",
  "readline",
  "repl",
  "tls",
  "trace_events",
  "tty",
  "v8",
  "vm",
  "wasi",
  "worker_threads",
];

/** "node:fs/promises" -> "fs" */
export function moduleRoot(name: string): string {
  const bare = name.startsWith("node:") ? name.slice("node:".length) : name;
  return bare.split("/")[0];
}

/** Violation message for a module request, or null when it may load. */
export function moduleViolation(name: string): string | null {
  const root = moduleRoot(name);
  if (DENIED_MODULES.includes(root)) {
    return `Import of '${name}' is not allowed for security reasons`;
  }
  if (!ALLOWED_MODULES.includes(root)) {
    return `Import of '${name}' is not available in the sandbox. Available modules: ${ALLOWED_MODULES.join(", ")}`;
  }
  return null;
}

// ============================================
// IDENTIFIERS
// ============================================

/**
 * Names that reach the host realm, rebuild code from strings or change how
 * objects resolve properties. Matched as whole identifiers outside strings
 * and comments.
 */
export const DENIED_IDENTIFIERS: ReadonlyArray<[RegExp, string]> = [
  [/(?<![\w$])eval(?![\w$])/, "eval"],
  [/(?<![\w$])Function(?![\w$])/, "Function"],
  [/(?<![\w$])constructor(?![\w$])/, "constructor"],
  [/(?<![\w$])__proto__(?![\w$])/, "__proto__"],
  [/(?<![\w$])__(?:define|lookup)(?:Getter|Setter)__(?![\w$])/, "__defineGetter__/__lookupGetter__"],
  [/(?<![\w$])process(?![\w$])/, "process"],
  [/(?<![\w$])globalThis(?![\w$])/, "globalThis"],
  [/(?<![\w$.])global(?![\w$])/, "global"],
  [/(?<![\w$])Reflect(?![\w$])/, "Reflect"],
  [/(?<![\w$])Proxy(?![\w$])/, "Proxy"],
  [/(?<![\w$])WebAssembly(?![\w$])/, "WebAssembly"],
  [/(?<![\w$])Atomics(?![\w$])/, "Atomics"],
  [/(?<![\w$])SharedArrayBuffer(?![\w$])/, "SharedArrayBuffer"],
];

/** Property names that must not appear as string keys either (obj["constructor"]). */
export const DENIED_PROPERTY_NAMES: readonly string[] = [
  "constructor",
  "__proto__",
  "__defineGetter__",
  "__defineSetter__",
  "__lookupGetter__",
  "__lookupSetter__",
];

// ============================================
// PATHS
// ============================================

/** True when target is root itself or somewhere beneath it. */
function isWithin(target: string, root: string): boolean {
  const rel = relative(resolve(root), resolve(target));
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

/** Writes must land strictly beneath the output directory. */
export function isWritable(target: string, outputDir: string | undefined): boolean {
  if (!outputDir) return false;
  return isWithin(target, outputDir) && resolve(target) !== resolve(outputDir);
}
