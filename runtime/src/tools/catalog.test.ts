import { describe, it, expect, vi } from "vitest";

vi.mock("../logging.js", () => ({
  createComponentLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { loadCatalog, parseCatalog } from "./catalog.js";
import { TOOL_NAMES } from "./types.js";

describe("tool catalog", () => {
  const catalog = loadCatalog();

  it("has one entry per handler", () => {
    expect(catalog).toHaveLength(22);
    expect(catalog.map(tool => tool.name).sort()).toEqual([...TOOL_NAMES].sort());
  });

  it("declares every required property", () => {
    for (const tool of catalog) {
      for (const key of tool.input_schema.required ?? []) {
        expect(Object.keys(tool.input_schema.properties)).toContain(key);
      }
    }
  });

  it("describes the code runner", () => {
    const runner = catalog.find(tool => tool.name === "run_javascript");
    expect(runner?.input_schema.required).toEqual(["code"]);
    expect(runner?.input_schema.properties.file_paths.type).toBe("array");
  });
});

describe("parseCatalog", () => {
  const entry = (name: string, required: string[] = []) => ({
    name,
    description: "d",
    input_schema: { type: "object", properties: { a: { type: "string" } }, required },
  });

  it("rejects a required key with no property", () => {
    expect(() => parseCatalog([entry("file_info", ["b"])])).toThrow('file_info: required property "b" is not declared');
  });

  it("rejects tools without handlers", () => {
    expect(() => parseCatalog([entry("launch_rockets")])).toThrow('Tool "launch_rockets" has no handler');
  });

  it("rejects duplicates", () => {
    expect(() => parseCatalog([entry("gmail"), entry("gmail")])).toThrow("Duplicate tool in catalog: gmail");
  });

  it("reports handlers missing from the catalog", () => {
    expect(() => parseCatalog([entry("gmail")])).toThrow(/^Tool catalog is missing: web_fetch, /);
  });
});
