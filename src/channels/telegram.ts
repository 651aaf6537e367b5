import type { OutboundMessage } from "../bus/events.js";
import type { MessageBus } from "../bus/queue.js";
import type { TelegramConfig } from "../config/schema.js";
import { errorMessage } from "../utils/helpers.js";
import { BaseChannel } from "./base.js";

interface TelegramUpdate {
  update_id: number;
  message?: {
    message_id: number;
    chat: { id: number | string };
    from?: { id: number | string; username?: string; is_bot?: boolean };
    text?: string;
    caption?: string;
  };
}

interface TelegramUpdates {
  ok: boolean;
  result?: TelegramUpdate[];
}

const RETRY_DELAY_MS = 1500;

export function splitMessage(content: string, maxLen = 4000): string[] {
  if (content.length <= maxLen) return [content];
  const chunks: string[] = [];
  let rest = content;
  while (rest.length > maxLen) {
    const window = rest.slice(0, maxLen);
    let idx = Math.max(window.lastIndexOf("\n"), window.lastIndexOf(" "));
    if (idx <= 0) idx = maxLen;
    chunks.push(rest.slice(0, idx));
    rest = rest.slice(idx).trimStart();
  }
  if (rest) chunks.push(rest);
  return chunks;
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class TelegramChannel extends BaseChannel<TelegramConfig> {
  readonly name = "telegram";
  private offset = 0;

  constructor(config: TelegramConfig, bus: MessageBus) {
    super(config, bus);
  }

  private api(method: string): string {
    return `https://api.telegram.org/bot${this.config.token}/${method}`;
  }

  /** Long-polls getUpdates until stop(). */
  async start(): Promise<void> {
    if (!this.config.token) {
      this.log.error("Telegram token not configured");
      return;
    }

    this.running = true;
    while (this.running) {
      try {
        const url = new URL(this.api("getUpdates"));
        url.searchParams.set("timeout", "25");
        url.searchParams.set("offset", String(this.offset));
        url.searchParams.set("allowed_updates", JSON.stringify(["message"]));

        const res = await fetch(url);
        if (!res.ok) {
          this.log.warn("getUpdates failed", { status: res.status });
          await sleep(RETRY_DELAY_MS);
          continue;
        }

        const data = (await res.json()) as TelegramUpdates;
        if (!data.ok) continue;

        for (const update of data.result ?? []) {
          this.offset = update.update_id + 1;
          const msg = update.message;
          if (!msg || msg.from?.is_bot) continue;

          const senderBase = String(msg.from?.id ?? "unknown");
          await this.handleMessage({
            senderId: msg.from?.username ? `${senderBase}|@${msg.from.username}` : senderBase,
            chatId: String(msg.chat.id),
            content: msg.text ?? msg.caption ?? "[Unsupported message]",
            metadata: { message_id: msg.message_id },
          });
        }
      } catch (err) {
        this.log.warn("Polling error", { error: errorMessage(err) });
        await sleep(RETRY_DELAY_MS);
      }
    }
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  async send(msg: OutboundMessage): Promise<void> {
    if (!this.config.token) return;
    for (const chunk of splitMessage(msg.content || "")) {
      const payload: Record<string, unknown> = { chat_id: msg.chatId, text: chunk };
      if (this.config.replyToMessage && msg.replyTo) payload.reply_parameters = { message_id: Number(msg.replyTo) };

      const res = await fetch(this.api("sendMessage"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
      });
      if (!res.ok) throw new Error(`sendMessage failed with status ${res.status}`);
    }
  }
}
