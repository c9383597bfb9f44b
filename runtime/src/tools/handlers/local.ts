/**
 * Local file tools: metadata, text reads and text writes, handled in
 * process without a host round trip.
 */

import { promises as fs } from "fs";
import { basename, dirname, extname } from "path";
import { ToolFailure, errorMessage } from "../../errors.js";
import type { ToolArgs, ToolHandler } from "../types.js";

export const READ_LIMIT_BYTES = 1024 * 1024;
export const WRITE_LIMIT_CHARS = 1_000_000;

function stringArg(args: ToolArgs, key: string): string {
  const value = args[key];
  if (typeof value !== "string" || value === "") {
    throw new ToolFailure(`${key} must be a non-empty string`);
  }
  return value;
}

async function statFile(path: string): Promise<{ size: number }> {
  try {
    const stats = await fs.stat(path);
    if (!stats.isFile()) throw new ToolFailure(`Not a file: ${path}`);
    return stats;
  } catch (err) {
    if (err instanceof ToolFailure) throw err;
    throw new ToolFailure(`File not found: ${path}`);
  }
}

export const fileInfo: ToolHandler = async (args) => {
  const path = stringArg(args, "file_path");
  const { size } = await statFile(path);
  return {
    name: basename(path),
    path,
    size_bytes: size,
    size_mb: Math.round((size / (1024 * 1024)) * 100) / 100,
    extension: extname(path).replace(/^\./, ""),
  };
};

export const readFile: ToolHandler = async (args) => {
  const path = stringArg(args, "file_path");
  const { size } = await statFile(path);

  let content: string;
  try {
    const handle = await fs.open(path, "r");
    try {
      const length = Math.min(size, READ_LIMIT_BYTES);
      const buffer = Buffer.alloc(length);
      await handle.read(buffer, 0, length, 0);
      content = buffer.toString("utf-8");
    } finally {
      await handle.close();
    }
  } catch (err) {
    throw new ToolFailure(`Failed to read file: ${errorMessage(err)}`);
  }

  if (size > READ_LIMIT_BYTES) {
    content += "\n\n[Content truncated...]";
  }
  return { path, content, size_bytes: size };
};

export const writeFile: ToolHandler = async (args) => {
  const outputPath = stringArg(args, "output_path");
  const content = args.content;
  if (typeof content !== "string") {
    throw new ToolFailure("content must be a string");
  }
  if (content.length > WRITE_LIMIT_CHARS) {
    throw new ToolFailure(`Content too large: ${content.length} chars. Maximum: ${WRITE_LIMIT_CHARS} chars.`);
  }

  try {
    await fs.mkdir(dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, content, "utf-8");
    const { size } = await fs.stat(outputPath);
    return { output_path: outputPath, success: true, size_bytes: size };
  } catch (err) {
    throw new ToolFailure(`Failed to write file: ${errorMessage(err)}`);
  }
};
