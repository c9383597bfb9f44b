/**
 * Argument preparation for tool calls.
 *
 * The model refers to attached files by basename (or by a guessed full
 * path); these helpers swap in the real paths from the conversation's file
 * map and anchor relative output paths in the output directory.
 */

import { mkdirSync } from "fs";
import { basename, isAbsolute, join } from "path";
import { ToolFailure } from "../errors.js";
import type { ToolArgs } from "./types.js";

export const PATH_KEYS = [
  "image_path",
  "input_path",
  "pdf_path",
  "file_path",
  "path",
  "docx_path",
  "pptx_path",
  "xlsx_path",
] as const;

export const PATH_LIST_KEYS = ["image_paths", "file_paths"] as const;

// ============================================
// FILE PATHS
// ============================================

/** Direct key first, then the basename of whatever the model wrote */
export function resolveFilePath(value: string, fileMap: ReadonlyMap<string, string>): string {
  return fileMap.get(value) ?? fileMap.get(basename(value)) ?? value;
}

export function resolveFilePaths(args: ToolArgs, fileMap: ReadonlyMap<string, string>): ToolArgs {
  if (fileMap.size === 0) return args;
  const resolved: ToolArgs = { ...args };

  for (const key of PATH_KEYS) {
    const value = resolved[key];
    if (typeof value === "string") {
      resolved[key] = resolveFilePath(value, fileMap);
    }
  }

  for (const key of PATH_LIST_KEYS) {
    const value = resolved[key];
    if (Array.isArray(value)) {
      resolved[key] = value.map((item: unknown) => (typeof item === "string" ? resolveFilePath(item, fileMap) : item));
    }
  }

  return resolved;
}

/** Anchor a relative output_path under outputDir, creating the directory */
export function resolveOutputPath(args: ToolArgs, outputDir: string): ToolArgs {
  const value = args.output_path;
  if (typeof value !== "string" || isAbsolute(value)) return args;
  mkdirSync(outputDir, { recursive: true });
  return { ...args, output_path: join(outputDir, value) };
}

/** Drop keys starting with "_"; the model sometimes echoes internal fields back */
export function stripInternalKeys(args: ToolArgs): ToolArgs {
  return Object.fromEntries(Object.entries(args).filter(([key]) => !key.startsWith("_")));
}

export function prepareArguments(args: ToolArgs, fileMap: ReadonlyMap<string, string>, outputDir: string): ToolArgs {
  return resolveOutputPath(resolveFilePaths(stripInternalKeys(args), fileMap), outputDir);
}

// ============================================
// PAGE RANGES
// ============================================

/** Inclusive 1-based span; `end` is absent for an open end with no known page count */
export interface PageSpan {
  start: number;
  end?: number;
}

export type PageSelection = "all" | PageSpan[];

function parsePage(text: string, range: string): number {
  if (!/^\d+$/.test(text)) {
    throw new ToolFailure(`Invalid page range "${range}": "${text}" is not a page number`);
  }
  const page = Number(text);
  if (page === 0) {
    throw new ToolFailure(`Invalid page range "${range}": page 0 is out of range, pages start at 1`);
  }
  return page;
}

function checkUpperBound(page: number, range: string, pageCount: number | undefined): void {
  if (pageCount !== undefined && page > pageCount) {
    throw new ToolFailure(`Invalid page range "${range}": page ${page} is out of range, the document has ${pageCount} pages`);
  }
}

/**
 * Parse "all", "N", "A-B", "-B", "A-" and comma lists of those.
 *
 * Without `pageCount` only the lower bound is checked and an open end stays
 * open; the host enforces the upper bound.
 */
export function parsePageRange(range: string, pageCount?: number): PageSelection {
  const trimmed = range.trim().toLowerCase();
  if (trimmed === "" || trimmed === "all") return "all";

  return trimmed.split(",").map((part): PageSpan => {
    const item = part.trim();
    const dash = item.indexOf("-");

    if (dash === -1) {
      const page = parsePage(item, range);
      checkUpperBound(page, range, pageCount);
      return { start: page, end: page };
    }

    const startText = item.slice(0, dash).trim();
    const endText = item.slice(dash + 1).trim();
    if (startText === "" && endText === "") {
      throw new ToolFailure(`Invalid page range "${range}": "${item}" names no pages`);
    }

    const start = startText === "" ? 1 : parsePage(startText, range);
    checkUpperBound(start, range, pageCount);

    if (endText === "") {
      return pageCount === undefined ? { start } : { start, end: pageCount };
    }

    const end = parsePage(endText, range);
    if (end < start) {
      throw new ToolFailure(`Invalid page range "${range}": ${start}-${end} runs backwards`);
    }
    checkUpperBound(end, range, pageCount);
    return { start, end };
  });
}
