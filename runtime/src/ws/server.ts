/**
 * Host Link Server
 *
 * WebSocket endpoint for the host application. One host connection at a
 * time. The same socket carries both directions:
 *
 * - host → runtime control requests (`method` set), answered in place
 * - runtime → host bridge requests and notifications, flushed from the
 *   QueueTransport as they are queued
 * - host → runtime bridge responses (`id` plus `result` or `error`), handed
 *   to QueueTransport.deliver()
 */

import { WebSocketServer, WebSocket } from "ws";
import { createComponentLogger } from "../logging.js";
import { errorMessage } from "../errors.js";
import type { QueueTransport } from "../bridge/transport.js";

const log = createComponentLogger("ws");

export interface ControlHandler {
  handle(raw: string): Promise<string>;
}

export interface HostLinkOptions {
  host: string;
  port: number;
}

/** True for `{id, result}` / `{id, error}` messages without a method */
export function isBridgeResponse(raw: string): boolean {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    // The control handler answers with a parse error
    return false;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return false;
  if ("method" in parsed || !("id" in parsed)) return false;
  return "result" in parsed || "error" in parsed;
}

export class HostLinkServer {
  private wss: WebSocketServer | null = null;
  private host: WebSocket | null = null;
  private detachOutbound: (() => void) | null = null;

  constructor(
    private readonly transport: QueueTransport,
    private readonly control: ControlHandler,
    private readonly options: HostLinkOptions,
  ) {}

  /** Listen and resolve with the bound port (useful when port is 0) */
  start(): Promise<number> {
    const wss = new WebSocketServer({ host: this.options.host, port: this.options.port });
    this.wss = wss;
    this.detachOutbound = this.transport.onOutbound(() => this.flush());
    wss.on("connection", ws => this.attach(ws));

    return new Promise((resolve, reject) => {
      wss.once("error", reject);
      wss.once("listening", () => {
        wss.off("error", reject);
        wss.on("error", err => log.error("Server error", err));
        const address = wss.address();
        const port = typeof address === "object" && address !== null ? address.port : this.options.port;
        log.info(`Host link listening on ${this.options.host}:${port}`);
        resolve(port);
      });
    });
  }

  attach(ws: WebSocket): void {
    if (this.host && this.host.readyState === WebSocket.OPEN) {
      log.warn("Second host connection refused");
      ws.close(1013, "Host already connected");
      return;
    }

    this.host = ws;
    log.info("Host connected");

    ws.on("message", async data => {
      const raw = data.toString();
      try {
        if (isBridgeResponse(raw)) {
          this.transport.deliver(raw);
          return;
        }
        const reply = await this.control.handle(raw);
        this.send(ws, reply);
      } catch (err) {
        log.error("Failed to handle host message", err);
      }
    });

    ws.on("close", () => {
      if (this.host === ws) this.host = null;
      log.info("Host disconnected");
    });

    ws.on("error", err => {
      log.error("Host socket error", err);
    });

    // Anything queued while no host was connected
    this.flush();
  }

  private flush(): void {
    const host = this.host;
    if (!host || host.readyState !== WebSocket.OPEN) return;
    for (const message of this.transport.drain()) {
      this.send(host, message);
    }
  }

  private send(ws: WebSocket, message: string): void {
    if (ws.readyState !== WebSocket.OPEN) {
      log.warn("Reply dropped, host socket closed");
      return;
    }
    ws.send(message, err => {
      if (err) log.warn("Send to host failed", { error: errorMessage(err) });
    });
  }

  async stop(): Promise<void> {
    this.detachOutbound?.();
    this.detachOutbound = null;
    this.host?.close(1001, "Runtime shutting down");
    this.host = null;

    const wss = this.wss;
    this.wss = null;
    if (!wss) return;
    await new Promise<void>((resolve, reject) => {
      wss.close(err => (err ? reject(err) : resolve()));
    });
    log.info("Host link closed");
  }
}
