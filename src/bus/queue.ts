import { AsyncQueue } from "./async-queue.js";
import type { InboundMessage, OutboundMessage } from "./events.js";
import { createLogger } from "../utils/logger.js";

export type OutboundCallback = (msg: OutboundMessage) => Promise<void>;

const log = createLogger("bus");

export class MessageBus {
  readonly inbound = new AsyncQueue<InboundMessage>();
  readonly outbound = new AsyncQueue<OutboundMessage>();
  private readonly subscribers = new Map<string, OutboundCallback>();
  private dispatching = false;
  private dropped = 0;

  constructor(private readonly pollIntervalMs = 1000) {}

  async publishInbound(msg: InboundMessage): Promise<void> {
    this.inbound.push(msg);
  }

  /** Waits forever when no timeout is given; otherwise resolves null on timeout. */
  consumeInbound(): Promise<InboundMessage>;
  consumeInbound(timeoutMs: number): Promise<InboundMessage | null>;
  async consumeInbound(timeoutMs?: number): Promise<InboundMessage | null> {
    return timeoutMs === undefined ? this.inbound.pop() : this.inbound.popWithin(timeoutMs);
  }

  async publishOutbound(msg: OutboundMessage): Promise<void> {
    this.outbound.push(msg);
  }

  consumeOutbound(): Promise<OutboundMessage>;
  consumeOutbound(timeoutMs: number): Promise<OutboundMessage | null>;
  async consumeOutbound(timeoutMs?: number): Promise<OutboundMessage | null> {
    return timeoutMs === undefined ? this.outbound.pop() : this.outbound.popWithin(timeoutMs);
  }

  /** One callback per channel; a later registration replaces the earlier one. */
  subscribeOutbound(channel: string, callback: OutboundCallback): void {
    if (this.subscribers.has(channel)) log.debug("Replacing outbound subscriber", { channel });
    this.subscribers.set(channel, callback);
  }

  async dispatchOutbound(): Promise<void> {
    this.dispatching = true;
    while (this.dispatching) {
      const msg = await this.outbound.popWithin(this.pollIntervalMs);
      if (msg) await this.deliver(msg);
    }
  }

  stopDispatch(): void {
    this.dispatching = false;
  }

  private async deliver(msg: OutboundMessage): Promise<void> {
    const callback = this.subscribers.get(msg.channel);
    if (!callback) {
      this.dropped++;
      log.warn("No subscriber for outbound message, dropping", { channel: msg.channel, chatId: msg.chatId });
      return;
    }
    try {
      await callback(msg);
    } catch (err) {
      log.error("Outbound delivery failed", { channel: msg.channel, chatId: msg.chatId, error: String(err) });
    }
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get inboundSize(): number {
    return this.inbound.size();
  }

  get outboundSize(): number {
    return this.outbound.size();
  }
}
