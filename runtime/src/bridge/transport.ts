/**
 * Queue Transport
 *
 * The host polls an outbound queue for requests and pushes responses back
 * through deliver(). Responses may arrive in any order. A listener can be
 * attached so a socket link flushes outbound messages as soon as they exist
 * instead of waiting for a poll.
 */

import { AsyncChannel } from "./channel.js";
import type { BridgeTransport } from "./types.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("bridge.transport");

type OutboundListener = () => void;

export class QueueTransport implements BridgeTransport {
  private outbound: string[] = [];
  private readonly inboundChannel = new AsyncChannel<string>();
  private readonly listeners = new Set<OutboundListener>();

  // ----------------------------------------
  // Runtime side
  // ----------------------------------------

  send(message: string): void {
    this.outbound.push(message);
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (err) {
        log.error("Outbound listener failed", err);
      }
    }
  }

  inbound(): AsyncIterable<string> {
    return this.inboundChannel;
  }

  // ----------------------------------------
  // Host side
  // ----------------------------------------

  /** Next outbound message, oldest first */
  poll(): string | undefined {
    return this.outbound.shift();
  }

  /** Every queued outbound message, oldest first */
  drain(): string[] {
    return this.outbound.splice(0);
  }

  hasPending(): boolean {
    return this.outbound.length > 0;
  }

  deliver(raw: string): void {
    if (!this.inboundChannel.push(raw)) {
      log.debug("Inbound message after close dropped");
    }
  }

  onOutbound(listener: OutboundListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  close(): void {
    this.inboundChannel.close();
    this.listeners.clear();
  }
}
