import type { OutboundMessage } from "../../bus/events.js";
import { errorMessage } from "../../utils/helpers.js";
import { stringArg, type Tool, type ToolContext } from "./base.js";

export type SendCallback = (msg: OutboundMessage) => Promise<void>;

/**
 * Publishes straight to the outbound side of the bus, so a cycle can speak more than once.
 * Always addresses the conversation the call came from.
 */
export class MessageTool implements Tool {
  readonly name = "message";
  readonly description = "Send a message to the user right away, before your final answer. Use it for progress updates or when more than one message is needed.";
  readonly parameters = {
    type: "object",
    properties: {
      content: { type: "string", description: "The message content to send" },
      media: { type: "array", items: { type: "string" }, description: "Optional file attachments" },
    },
    required: ["content"],
  };

  constructor(private readonly send?: SendCallback) {}

  async execute(args: Record<string, unknown>, ctx: ToolContext): Promise<string> {
    const content = stringArg(args, "content") ?? "";
    const { channel, chatId } = ctx;
    const media = Array.isArray(args.media) ? args.media.filter((m): m is string => typeof m === "string") : [];

    if (!channel || !chatId) return "Error: No target channel/chat specified";
    if (!this.send) return "Error: Message sending not configured";

    try {
      await this.send({ channel, chatId, content, media, metadata: ctx.messageId ? { message_id: ctx.messageId } : {} });
      return `Message sent to ${channel}:${chatId}${media.length ? ` with ${media.length} attachments` : ""}`;
    } catch (err) {
      return `Error sending message: ${errorMessage(err)}`;
    }
  }
}
