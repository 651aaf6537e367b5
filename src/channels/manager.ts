import type { Config } from "../config/schema.js";
import type { MessageBus } from "../bus/queue.js";
import type { OutboundMessage } from "../bus/events.js";
import { errorMessage } from "../utils/helpers.js";
import { createLogger } from "../utils/logger.js";
import type { BaseChannel } from "./base.js";
import { TelegramChannel } from "./telegram.js";

const log = createLogger("channels");

export class ChannelManager {
  readonly channels = new Map<string, BaseChannel>();
  private dispatchLoop: Promise<void> | null = null;

  constructor(private readonly config: Config, private readonly bus: MessageBus) {
    if (config.channels.telegram.enabled) this.add(new TelegramChannel(config.channels.telegram, bus));
  }

  add(channel: BaseChannel): void {
    this.channels.set(channel.name, channel);
  }

  /** Wires every channel to the bus, starts outbound dispatch, then runs the channels until they stop. */
  async startAll(): Promise<void> {
    for (const channel of this.channels.values()) {
      this.bus.subscribeOutbound(channel.name, (msg) => this.deliver(channel, msg));
    }
    this.dispatchLoop = this.bus.dispatchOutbound();
    await Promise.all([...this.channels.values()].map((c) =>
      c.start().catch((err) => log.error("Channel failed to start", { channel: c.name, error: errorMessage(err) }))));
  }

  async stopAll(): Promise<void> {
    this.bus.stopDispatch();
    await Promise.all([...this.channels.values()].map((c) =>
      c.stop().catch((err) => log.error("Channel failed to stop", { channel: c.name, error: errorMessage(err) }))));
    await this.dispatchLoop;
    this.dispatchLoop = null;
  }

  /** Progress updates are optional per config; everything else goes straight to the channel. */
  private async deliver(channel: BaseChannel, msg: OutboundMessage): Promise<void> {
    if (msg.metadata?._progress) {
      const isToolHint = !!msg.metadata._tool_hint;
      if (isToolHint && !this.config.channels.sendToolHints) return;
      if (!isToolHint && !this.config.channels.sendProgress) return;
    }
    await channel.send(msg);
  }

  get enabledChannels(): string[] {
    return [...this.channels.keys()];
  }

  getStatus(): Record<string, { enabled: boolean; running: boolean }> {
    return Object.fromEntries([...this.channels].map(([name, c]) => [name, { enabled: true, running: c.isRunning }]));
  }
}
