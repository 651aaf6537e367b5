import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { describe, expect, test } from "vitest";
import { ContextBuilder } from "../src/agent/context.js";

describe("context runtime separation", () => {
  test("runtime context is separate untrusted user message", () => {
    const workspace = fs.mkdtempSync(path.join(os.tmpdir(), "switchyard-ctx-"));
    fs.writeFileSync(path.join(workspace, "AGENTS.md"), "agent", "utf8");
    const ctx = new ContextBuilder(workspace);
    const messages = ctx.buildMessages({ history: [], currentMessage: "Return exactly: OK", channel: "cli", chatId: "direct" });

    expect(messages[0].role).toBe("system");
    expect(String(messages[0].content)).not.toContain("## Current Session");

    const runtimeContent = String(messages[messages.length - 2].content);
    expect(messages[messages.length - 2].role).toBe("user");
    expect(runtimeContent).toContain(ContextBuilder.RUNTIME_CONTEXT_TAG);
    expect(runtimeContent).toContain("Current Time:");
    expect(runtimeContent).toContain("Channel: cli");
    expect(runtimeContent).toContain("Chat ID: direct");

    expect(messages[messages.length - 1].role).toBe("user");
    expect(messages[messages.length - 1].content).toBe("Return exactly: OK");
  });
});

describe("context history", () => {
  test("history sits between system prompt and runtime context", () => {
    const workspace = fs.mkdtempSync(path.join(os.tmpdir(), "switchyard-ctx-"));
    const ctx = new ContextBuilder(workspace);
    const messages = ctx.buildMessages({
      history: [{ role: "user", content: "earlier" }, { role: "assistant", content: "reply" }],
      currentMessage: "now",
    });
    expect(messages.map((m) => m.role)).toEqual(["system", "user", "assistant", "user", "user"]);
    expect(messages[1].content).toBe("earlier");
    expect(String(messages[3].content)).not.toContain("Channel:");
  });

  test("bootstrap files are appended to the system prompt", () => {
    const workspace = fs.mkdtempSync(path.join(os.tmpdir(), "switchyard-ctx-"));
    fs.writeFileSync(path.join(workspace, "SOUL.md"), "be kind", "utf8");
    const prompt = new ContextBuilder(workspace).buildSystemPrompt();
    expect(prompt).toContain("## SOUL.md\n\nbe kind");
  });

  test("image attachments become data urls ahead of the text", () => {
    const workspace = fs.mkdtempSync(path.join(os.tmpdir(), "switchyard-ctx-"));
    const img = path.join(workspace, "a.png");
    fs.writeFileSync(img, Buffer.from([1, 2, 3]));
    const content = new ContextBuilder(workspace).buildUserContent("look", [img, path.join(workspace, "notes.txt")]);
    expect(content).toEqual([
      { type: "image_url", image_url: { url: "data:image/png;base64,AQID" } },
      { type: "text", text: "look" },
    ]);
  });
});
