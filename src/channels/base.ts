import type { MessageBus } from "../bus/queue.js";
import type { OutboundMessage } from "../bus/events.js";
import { truncate } from "../utils/helpers.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface ChannelConfig {
  allowFrom: string[];
}

/** A transport adapter: turns platform events into inbound bus messages and delivers outbound ones. */
export abstract class BaseChannel<TConfig extends ChannelConfig = ChannelConfig> {
  protected running = false;

  constructor(protected readonly config: TConfig, protected readonly bus: MessageBus) {}

  abstract readonly name: string;
  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;
  abstract send(msg: OutboundMessage): Promise<void>;

  protected get log(): Logger {
    return createLogger(`channel:${this.name}`);
  }

  /** Empty allow-list admits everyone; "id|@username" senders match on either part. */
  protected isAllowed(senderId: string): boolean {
    const allowFrom = this.config.allowFrom;
    if (!allowFrom.length) return true;
    if (allowFrom.includes(senderId)) return true;
    return senderId.includes("|") && senderId.split("|").some((p) => allowFrom.includes(p));
  }

  protected async handleMessage(input: { senderId: string; chatId: string; content: string; media?: string[]; metadata?: Record<string, unknown> }): Promise<void> {
    if (!this.isAllowed(input.senderId)) {
      this.log.warn("Blocked sender", { from: input.senderId });
      return;
    }
    this.log.info("Inbound", { from: input.senderId, chat: input.chatId, text: truncate(input.content, 80, "…") });
    await this.bus.publishInbound({
      channel: this.name,
      senderId: input.senderId,
      chatId: input.chatId,
      content: input.content,
      timestamp: new Date(),
      media: input.media ?? [],
      metadata: input.metadata ?? {},
    });
  }

  get isRunning(): boolean {
    return this.running;
  }
}
