/**
 * File Transport
 *
 * JSON-lines (or plain text) log files with size-based rotation and one
 * file per day.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// FILE TRANSPORT
// ============================================

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "pocketmind") */
  filename?: string;
  /** Bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Rotated files to keep (default: 5) */
  maxFiles?: number;
  /** Write JSON lines (default: true) */
  jsonFormat?: boolean;
}

export function formatPlainText(entry: LogEntry): string {
  const parts = [
    entry.timestamp,
    entry.level.toUpperCase().padEnd(5),
    `[${entry.component}]`,
    entry.message,
  ];

  if (entry.turnId) {
    parts.push(`turn=${entry.turnId}`);
  }

  if (entry.data) {
    parts.push(JSON.stringify(entry.data));
  }

  if (entry.error) {
    parts.push(`ERROR: ${entry.error.name}: ${entry.error.message}`);
    if (entry.error.stack) {
      parts.push(entry.error.stack);
    }
  }

  return parts.join(" ");
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private readonly logDir: string;
  private readonly filename: string;
  private readonly maxSize: number;
  private readonly maxFiles: number;
  private readonly jsonFormat: boolean;
  private currentPath: string;
  private writeStream: fs.WriteStream | null = null;
  private currentSize = 0;
  private writeQueue: string[] = [];
  private isWriting = false;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.logDir = options.logDir;
    this.filename = options.filename ?? "pocketmind";
    this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;
    this.jsonFormat = options.jsonFormat ?? true;
    this.currentPath = this.getLogPath();

    fs.mkdirSync(this.logDir, { recursive: true });
    this.openStream();
  }

  getCurrentPath(): string {
    return this.currentPath;
  }

  private getLogPath(): string {
    const date = new Date().toISOString().slice(0, 10); // YYYY-MM-DD
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private openStream(): void {
    this.currentPath = this.getLogPath();

    try {
      this.currentSize = fs.statSync(this.currentPath).size;
    } catch {
      // No file yet for today
      this.currentSize = 0;
    }

    this.writeStream = fs.createWriteStream(this.currentPath, { flags: "a" });
    this.writeStream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
  }

  log(entry: LogEntry): void {
    const line = (this.jsonFormat ? JSON.stringify(entry) : formatPlainText(entry)) + "\n";
    this.writeQueue.push(line);
    this.processQueue();
  }

  private processQueue(): void {
    const stream = this.writeStream;
    if (this.isWriting || !stream) {
      return;
    }
    const line = this.writeQueue.shift();
    if (line === undefined) {
      return;
    }

    this.isWriting = true;

    if (this.currentSize + line.length > this.maxSize) {
      this.rotate();
    } else if (this.getLogPath() !== this.currentPath) {
      // New day, new file
      stream.end();
      this.openStream();
    }

    const target = this.writeStream ?? stream;
    target.write(line, (err: Error | null | undefined) => {
      if (!err) {
        this.currentSize += line.length;
      }
      this.isWriting = false;
      this.processQueue();
    });
  }

  private rotate(): void {
    this.writeStream?.end();

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${this.currentPath}.${i}`;
      if (!fs.existsSync(oldPath)) continue;
      if (i === this.maxFiles - 1) {
        fs.unlinkSync(oldPath);
      } else {
        fs.renameSync(oldPath, `${this.currentPath}.${i + 1}`);
      }
    }

    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    this.openStream();
  }

  async flush(): Promise<void> {
    while (this.writeQueue.length > 0 || this.isWriting) {
      await new Promise<void>((resolve) => setTimeout(resolve, 10));
    }
  }

  async close(): Promise<void> {
    await this.flush();
    const stream = this.writeStream;
    this.writeStream = null;
    if (!stream) return;
    await new Promise<void>((resolve) => stream.end(() => resolve()));
  }
}
