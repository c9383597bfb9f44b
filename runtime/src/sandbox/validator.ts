/**
 * Static validation, run before any generated code executes.
 *
 * Rejects module loads outside the allow-list, non-literal module loads,
 * reflection and host-realm names, and code that does not compile.
 */

import * as vm from "vm";
import { SandboxViolation, errorMessage } from "../errors.js";
import { scanSource, type ScannedSource } from "./lexer.js";
import {
  DENIED_IDENTIFIERS,
  DENIED_PROPERTY_NAMES,
  moduleViolation,
} from "./policy.js";

export type ValidationResult =
  | { ok: true; modules: string[] }
  | { ok: false; kind: "violation" | "syntax"; message: string };

// require("x") and import("x"); the literal must start right after the paren
const CALL_LOADERS: ReadonlyArray<[RegExp, string]> = [
  [/(?<![\w$.])require\s*\(\s*/g, "require()"],
  [/(?<![\w$.])import\s*\(\s*/g, "import()"],
];

// import x from "y", import "y", export { x } from "y"
const DECLARATION_LOADERS: readonly RegExp[] = [
  /(?<![\w$.])import\s+(?:[\w$*{}\s,]+?\s+from\s*)?(?=["'])/g,
  /(?<![\w$.])export\s+[\w$*{}\s,]+?\s+from\s*(?=["'])/g,
];

/** Module names the code loads; a non-literal load is a violation */
function collectModules(scanned: ScannedSource): string[] {
  const modules: string[] = [];

  for (const [pattern, label] of CALL_LOADERS) {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(scanned.code)) !== null) {
      const literalAt = match.index + match[0].length;
      const name = scanned.literals.get(literalAt);
      if (name === undefined) {
        throw new SandboxViolation(`${label} must be called with a string literal module name`);
      }
      modules.push(name);
    }
  }

  for (const pattern of DECLARATION_LOADERS) {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(scanned.code)) !== null) {
      const name = scanned.literals.get(match.index + match[0].length);
      if (name !== undefined) {
        modules.push(name);
      }
    }
  }

  return modules;
}

function checkCapabilities(scanned: ScannedSource): string[] {
  const modules = collectModules(scanned);

  for (const name of modules) {
    const problem = moduleViolation(name);
    if (problem) throw new SandboxViolation(problem);
  }

  for (const [pattern, name] of DENIED_IDENTIFIERS) {
    if (pattern.test(scanned.code)) {
      throw new SandboxViolation(`Use of '${name}' is not allowed in sandboxed code`);
    }
  }

  for (const value of scanned.literals.values()) {
    if (DENIED_PROPERTY_NAMES.includes(value)) {
      throw new SandboxViolation(`Access to '${value}' is not allowed in sandboxed code`);
    }
  }

  return modules;
}

export function validateSource(code: string): ValidationResult {
  let modules: string[];
  try {
    modules = checkCapabilities(scanSource(code));
  } catch (err) {
    if (err instanceof SandboxViolation) {
      return { ok: false, kind: "violation", message: err.message };
    }
    throw err;
  }

  try {
    // Compiles only; nothing runs
    new vm.Script(code, { filename: "sandbox.js" });
  } catch (err) {
    return { ok: false, kind: "syntax", message: errorMessage(err) };
  }

  return { ok: true, modules };
}
