import { describe, it, expect } from "vitest";
import { validateSource } from "./validator.js";
import { scanSource } from "./lexer.js";

describe("validateSource", () => {
  it("names a denied process-spawning import", () => {
    const result = validateSource('const cp = require("child_process");\ncp.execSync("ls");');

    expect(result).toEqual({
      ok: false,
      kind: "violation",
      message: "Import of 'child_process' is not allowed for security reasons",
    });
  });

  it("treats node: prefixes and subpaths as their root module", () => {
    const result = validateSource("const fsp = require('node:fs/promises');");

    expect(result).toEqual({
      ok: false,
      kind: "violation",
      message: "Import of 'node:fs/promises' is not allowed for security reasons",
    });
  });

  it("checks static import declarations and dynamic import()", () => {
    const declaration = validateSource('import { readFileSync } from "fs";');
    const dynamic = validateSource('import("net").then(() => 1);');

    expect(declaration.ok === false && declaration.message).toBe("Import of 'fs' is not allowed for security reasons");
    expect(dynamic.ok === false && dynamic.message).toBe("Import of 'net' is not allowed for security reasons");
  });

  it("rejects modules missing from the allow-list", () => {
    const result = validateSource('const _ = require("lodash");');

    expect(result.ok).toBe(false);
    expect(result.ok === false && result.message).toMatch(/^Import of 'lodash' is not available in the sandbox/);
  });

  it("rejects module names that are not string literals", () => {
    const result = validateSource('const name = "fs";\nrequire(name);');

    expect(result).toEqual({
      ok: false,
      kind: "violation",
      message: "require() must be called with a string literal module name",
    });
  });

  it("rejects reflection escapes", () => {
    expect(validateSource("({}).constructor").ok).toBe(false);
    expect(validateSource("eval('1')").ok).toBe(false);
    expect(validateSource("new Function('return 1')").ok).toBe(false);
    expect(validateSource("const p = globalThis;").ok).toBe(false);

    const result = validateSource("[].map.constructor");
    expect(result.ok === false && result.message).toBe("Use of 'constructor' is not allowed in sandboxed code");
  });

  it("rejects denied property names written as strings", () => {
    const result = validateSource('const o = {};\no["__proto__"];');

    expect(result.ok === false && result.message).toBe("Access to '__proto__' is not allowed in sandboxed code");
  });

  it("ignores denied words inside strings and comments", () => {
    const result = validateSource('// eval and process are mentioned here\nconsole.log("process complete");');

    expect(result).toEqual({ ok: true, modules: [] });
  });

  it("still sees code inside template expressions", () => {
    const result = validateSource("const s = `pid ${process.pid}`;");

    expect(result.ok === false && result.message).toBe("Use of 'process' is not allowed in sandboxed code");
  });

  it("reports syntax errors separately from violations", () => {
    const result = validateSource("let = ;");

    expect(result.ok).toBe(false);
    expect(result.ok === false && result.kind).toBe("syntax");
  });

  it("accepts allowed modules and lists them", () => {
    const result = validateSource('const path = require("path");\nconst { inspect } = require("node:util");\npath.join("a", "b")');

    expect(result).toEqual({ ok: true, modules: ["path", "node:util"] });
  });
});

describe("scanSource", () => {
  it("keeps offsets and records literal values", () => {
    const source = 'a("x\\ty") // c';
    const scanned = scanSource(source);

    expect(scanned.code).toHaveLength(source.length);
    expect(scanned.code).toBe('a("    ")     ');
    expect(scanned.literals.get(2)).toBe("x\ty");
  });

  it("records plain template literals but not ones with substitutions", () => {
    const scanned = scanSource("f(`plain`, `with ${x}`)");

    expect(scanned.literals.get(2)).toBe("plain");
    expect([...scanned.literals.values()]).toEqual(["plain"]);
    expect(scanned.code).toContain("${x}");
  });
});
