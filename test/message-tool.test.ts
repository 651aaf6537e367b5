import { describe, expect, test } from "vitest";
import { MessageTool } from "../src/agent/tools/message.js";
import type { OutboundMessage } from "../src/bus/events.js";

describe("message tool", () => {
  test("returns error when no target context", async () => {
    const tool = new MessageTool();
    const result = await tool.execute({ content: "test" }, { channel: "", chatId: "", sessionKey: "" });
    expect(result).toBe("Error: No target channel/chat specified");
  });

  test("returns error when sending is not configured", async () => {
    const tool = new MessageTool();
    const result = await tool.execute({ content: "test" }, { channel: "cli", chatId: "direct", sessionKey: "cli:direct" });
    expect(result).toBe("Error: Message sending not configured");
  });

  test("sends to the calling conversation", async () => {
    const sent: OutboundMessage[] = [];
    const tool = new MessageTool(async (msg) => { sent.push(msg); });
    const result = await tool.execute({ content: "working on it" }, { channel: "telegram", chatId: "42", sessionKey: "telegram:42", messageId: "7" });
    expect(result).toBe("Message sent to telegram:42");
    expect(sent).toEqual([{ channel: "telegram", chatId: "42", content: "working on it", media: [], metadata: { message_id: "7" } }]);
  });

  test("a target in the arguments is ignored in favour of the calling conversation", async () => {
    const sent: OutboundMessage[] = [];
    const tool = new MessageTool(async (msg) => { sent.push(msg); });
    const result = await tool.execute({ content: "hi", channel: "discord", chat_id: "999" }, { channel: "telegram", chatId: "42", sessionKey: "telegram:42" });
    expect(result).toBe("Message sent to telegram:42");
    expect(sent.map((m) => [m.channel, m.chatId])).toEqual([["telegram", "42"]]);
  });

  test("the schema offers no way to pick another destination", () => {
    expect(Object.keys(new MessageTool().parameters.properties)).toEqual(["content", "media"]);
  });
});
