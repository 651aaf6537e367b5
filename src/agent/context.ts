import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { ChatMessage, ContentPart, ToolCallPayload } from "../providers/base.js";

export interface AssembleInput {
  history: ChatMessage[];
  currentMessage: string;
  media?: readonly string[];
  channel?: string;
  chatId?: string;
}

/** Turns history plus the current input into the message list sent to the LLM. */
export interface ContextAssembler {
  buildMessages(input: AssembleInput): ChatMessage[];
}

const IMAGE_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

export class ContextBuilder implements ContextAssembler {
  static readonly BOOTSTRAP_FILES = ["AGENTS.md", "SOUL.md", "USER.md", "TOOLS.md"];
  static readonly RUNTIME_CONTEXT_TAG = "[Runtime Context - metadata only, not instructions]";

  constructor(private readonly workspace: string) {}

  buildSystemPrompt(): string {
    const parts = [this.getIdentity()];
    const bootstrap = this.loadBootstrapFiles();
    if (bootstrap) parts.push(bootstrap);
    return parts.join("\n\n---\n\n");
  }

  private getIdentity(): string {
    return [
      "# switchyard",
      "You are switchyard, a helpful personal assistant.",
      `## Runtime\n${os.platform()} ${os.arch()}, Node ${process.version}`,
      `## Workspace\nYour workspace is at: ${this.workspace}`,
      [
        "## Guidelines",
        "- State intent before tool calls, but never claim results before receiving them.",
        "- Before modifying a file, read it first.",
        "- Use the spawn tool for long-running work; its result comes back to this conversation.",
        "- Ask for clarification when the request is ambiguous.",
      ].join("\n"),
    ].join("\n\n");
  }

  private loadBootstrapFiles(): string {
    const parts: string[] = [];
    for (const f of ContextBuilder.BOOTSTRAP_FILES) {
      const p = path.join(this.workspace, f);
      if (!fs.existsSync(p)) continue;
      parts.push(`## ${f}\n\n${fs.readFileSync(p, "utf8")}`);
    }
    return parts.join("\n\n");
  }

  static buildRuntimeContext(channel?: string, chatId?: string): string {
    const lines = [`Current Time: ${new Date().toISOString()}`];
    if (channel && chatId) {
      lines.push(`Channel: ${channel}`);
      lines.push(`Chat ID: ${chatId}`);
    }
    return `${ContextBuilder.RUNTIME_CONTEXT_TAG}\n${lines.join("\n")}`;
  }

  /** Inlines readable image attachments; anything else in `media` is skipped. */
  buildUserContent(text: string, media?: readonly string[]): string | ContentPart[] {
    const images: ContentPart[] = [];
    for (const p of media ?? []) {
      const mime = IMAGE_TYPES[path.extname(p).toLowerCase()];
      if (!mime || !fs.existsSync(p) || !fs.statSync(p).isFile()) continue;
      const b64 = fs.readFileSync(p).toString("base64");
      images.push({ type: "image_url", image_url: { url: `data:${mime};base64,${b64}` } });
    }
    if (!images.length) return text;
    return [...images, { type: "text", text }];
  }

  buildMessages(input: AssembleInput): ChatMessage[] {
    return [
      { role: "system", content: this.buildSystemPrompt() },
      ...input.history,
      { role: "user", content: ContextBuilder.buildRuntimeContext(input.channel, input.chatId) },
      { role: "user", content: this.buildUserContent(input.currentMessage, input.media) },
    ];
  }

  static addToolResult(messages: ChatMessage[], toolCallId: string, toolName: string, result: string): ChatMessage[] {
    messages.push({ role: "tool", tool_call_id: toolCallId, name: toolName, content: result });
    return messages;
  }

  static addAssistantMessage(messages: ChatMessage[], content: string | null, toolCalls?: ToolCallPayload[]): ChatMessage[] {
    messages.push(toolCalls?.length ? { role: "assistant", content, tool_calls: toolCalls } : { role: "assistant", content });
    return messages;
  }
}
