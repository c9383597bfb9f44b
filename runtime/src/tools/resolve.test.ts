import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  resolveFilePaths,
  resolveOutputPath,
  stripInternalKeys,
  prepareArguments,
  parsePageRange,
} from "./resolve.js";
import { ToolFailure } from "../errors.js";

const FILE_MAP = new Map([
  ["photo.jpg", "/data/uploads/photo.jpg"],
  ["report.pdf", "/data/uploads/report.pdf"],
]);

describe("resolveFilePaths", () => {
  it("resolves basenames and guessed full paths", () => {
    const resolved = resolveFilePaths(
      { image_path: "photo.jpg", pdf_path: "/sdcard/Download/report.pdf", url: "photo.jpg" },
      FILE_MAP,
    );
    expect(resolved).toEqual({
      image_path: "/data/uploads/photo.jpg",
      pdf_path: "/data/uploads/report.pdf",
      url: "photo.jpg",
    });
  });

  it("resolves path lists and leaves unknown entries alone", () => {
    const resolved = resolveFilePaths({ file_paths: ["photo.jpg", "other.txt", 7] }, FILE_MAP);
    expect(resolved.file_paths).toEqual(["/data/uploads/photo.jpg", "other.txt", 7]);
  });

  it("does not mutate its input", () => {
    const args = { file_path: "photo.jpg" };
    resolveFilePaths(args, FILE_MAP);
    expect(args.file_path).toBe("photo.jpg");
  });
});

describe("resolveOutputPath", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "resolve-")), "out");
  });

  afterEach(() => {
    fs.rmSync(path.dirname(outputDir), { recursive: true, force: true });
  });

  it("joins relative output paths under the output directory and creates it", () => {
    expect(resolveOutputPath({ output_path: "clip.mp4" }, outputDir).output_path).toBe(path.join(outputDir, "clip.mp4"));
    expect(fs.existsSync(outputDir)).toBe(true);
  });

  it("keeps absolute output paths", () => {
    expect(resolveOutputPath({ output_path: "/abs/clip.mp4" }, outputDir).output_path).toBe("/abs/clip.mp4");
  });

  it("runs the whole preparation in order", () => {
    const args = prepareArguments({ input_path: "photo.jpg", output_path: "small.jpg", _context: { x: 1 } }, FILE_MAP, outputDir);
    expect(args).toEqual({ input_path: "/data/uploads/photo.jpg", output_path: path.join(outputDir, "small.jpg") });
  });
});

describe("stripInternalKeys", () => {
  it("removes underscore-prefixed keys", () => {
    expect(stripInternalKeys({ _timeout_ms: 5, _file_map: {}, url: "x" })).toEqual({ url: "x" });
  });
});

describe("parsePageRange", () => {
  it("accepts all, single pages, spans and lists", () => {
    expect(parsePageRange("all")).toBe("all");
    expect(parsePageRange("3")).toEqual([{ start: 3, end: 3 }]);
    expect(parsePageRange("1-5, 8")).toEqual([{ start: 1, end: 5 }, { start: 8, end: 8 }]);
  });

  it("handles open ends", () => {
    expect(parsePageRange("-4")).toEqual([{ start: 1, end: 4 }]);
    expect(parsePageRange("6-")).toEqual([{ start: 6 }]);
    expect(parsePageRange("6-", 9)).toEqual([{ start: 6, end: 9 }]);
  });

  it("rejects page zero explicitly", () => {
    expect(() => parsePageRange("0")).toThrow(ToolFailure);
    expect(() => parsePageRange("0-3")).toThrow('Invalid page range "0-3": page 0 is out of range, pages start at 1');
  });

  it("rejects pages beyond a known count", () => {
    expect(() => parsePageRange("2-12", 10)).toThrow('Invalid page range "2-12": page 12 is out of range, the document has 10 pages');
    expect(() => parsePageRange("11-", 10)).toThrow("page 11 is out of range");
  });

  it("rejects backwards spans and junk", () => {
    expect(() => parsePageRange("5-2")).toThrow("5-2 runs backwards");
    expect(() => parsePageRange("two")).toThrow('"two" is not a page number');
    expect(() => parsePageRange("-")).toThrow("names no pages");
  });
});
