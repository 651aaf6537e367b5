export const SYSTEM_CHANNEL = "system";

export interface InboundMessage {
  readonly channel: string;
  readonly senderId: string;
  readonly chatId: string;
  readonly content: string;
  readonly timestamp?: Date;
  readonly media?: readonly string[];
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface OutboundMessage {
  channel: string;
  chatId: string;
  content: string;
  replyTo?: string;
  media?: string[];
  metadata?: Record<string, unknown>;
}

export interface Origin {
  channel: string;
  chatId: string;
}

export function sessionKey(msg: Pick<InboundMessage, "channel" | "chatId">): string {
  return `${msg.channel}:${msg.chatId}`;
}

export function encodeOrigin(origin: Origin): string {
  return `${origin.channel}:${origin.chatId}`;
}

/** Splits on the first ':' only, so chat ids may contain colons. A bare id falls back to the cli channel. */
export function decodeOrigin(chatId: string): Origin {
  const idx = chatId.indexOf(":");
  if (idx < 0) return { channel: "cli", chatId };
  return { channel: chatId.slice(0, idx), chatId: chatId.slice(idx + 1) };
}
