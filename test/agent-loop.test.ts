import path from "node:path";
import { describe, expect, test } from "vitest";
import { AgentLoop, ERROR_REPLY } from "../src/agent/loop.js";
import type { ContextAssembler } from "../src/agent/context.js";
import type { Tool } from "../src/agent/tools/base.js";
import { MessageBus } from "../src/bus/queue.js";
import { MetricsCollector } from "../src/metrics/collector.js";
import { errorResponse } from "../src/providers/base.js";
import { SessionManager } from "../src/session/manager.js";
import { ScriptedProvider, tempDir, text, toolCall } from "./fakes.js";

function setup(provider: ScriptedProvider, extra: { maxIterations?: number; contextAssembler?: ContextAssembler } = {}) {
  const workspace = tempDir();
  const bus = new MessageBus(10);
  const metrics = new MetricsCollector(path.join(workspace, "metrics"));
  const loop = new AgentLoop({ bus, provider, workspace, metrics, pollIntervalMs: 10, ...extra });
  const turns = (key: string) => new SessionManager(workspace).getOrCreate(key).turns.map((t) => [t.role, t.content]);
  return { workspace, bus, metrics, loop, turns };
}

describe("agent loop", () => {
  test("answers a plain question over the bus and records both turns", async () => {
    const provider = new ScriptedProvider([text("4")]);
    const { bus, loop, turns } = setup(provider);

    const running = loop.run();
    expect(loop.isRunning).toBe(true);
    await bus.publishInbound({ channel: "cli", senderId: "user", chatId: "direct", content: "what is 2+2" });
    const out = await bus.consumeOutbound(2000);
    loop.stop();
    await running;

    expect(out).toEqual({ channel: "cli", chatId: "direct", content: "4", metadata: {} });
    expect(turns("cli:direct")).toEqual([["user", "what is 2+2"], ["assistant", "4"]]);
    expect(provider.requests).toHaveLength(1);
    expect(provider.requests[0].model).toBe("test-model");
    expect(provider.requests[0].tools?.map((t) => t.function.name)).toEqual([
      "read_file", "write_file", "edit_file", "list_dir", "exec", "web_search", "web_fetch", "message", "spawn",
    ]);
  });

  test("replies leave in the order messages arrived", async () => {
    const provider = new ScriptedProvider([text("first"), text("second")]);
    const { bus, loop } = setup(provider);
    await bus.publishInbound({ channel: "cli", senderId: "user", chatId: "a", content: "one" });
    await bus.publishInbound({ channel: "cli", senderId: "user", chatId: "b", content: "two" });

    const running = loop.run();
    const first = await bus.consumeOutbound(2000);
    const second = await bus.consumeOutbound(2000);
    loop.stop();
    await running;

    expect([first?.chatId, first?.content]).toEqual(["a", "first"]);
    expect([second?.chatId, second?.content]).toEqual(["b", "second"]);
  });

  test("an unknown tool is reported back to the model, which gets another turn", async () => {
    const provider = new ScriptedProvider([toolCall("unknown_tool", {}), text("recovered")]);
    const { loop, turns, workspace } = setup(provider);

    expect(await loop.processDirect("try it")).toBe("recovered");
    expect(provider.requests).toHaveLength(2);
    const last = provider.requests[1].messages.at(-1);
    expect(last?.role).toBe("tool");
    expect(last?.content).toContain("Error: Unknown tool 'unknown_tool'");

    const session = new SessionManager(workspace).getOrCreate("cli:direct");
    expect(turns("cli:direct")).toEqual([["user", "try it"], ["assistant", "recovered"]]);
    expect(session.turns[1].toolsUsed).toEqual(["unknown_tool"]);
  });

  test("a tool that throws is reported to the model as an error result", async () => {
    const explode: Tool = {
      name: "explode",
      description: "always throws",
      parameters: { type: "object", properties: {} },
      execute: async () => { throw new Error("boom"); },
    };
    const provider = new ScriptedProvider([toolCall("explode", {}), text("handled")]);
    const { loop } = setup(provider);
    loop.tools.register(explode);

    expect(await loop.processDirect("go")).toBe("handled");
    const last = provider.requests[1].messages.at(-1);
    expect(last?.role).toBe("tool");
    expect(typeof last?.content === "string" && last.content.startsWith("Error executing explode: boom")).toBe(true);
  });

  test("interim messages go to the calling conversation whatever target the model names", async () => {
    const provider = new ScriptedProvider([
      toolCall("message", { content: "hi", channel: "discord", chat_id: "999" }),
      text("done"),
    ]);
    const { bus, loop } = setup(provider);

    expect(await loop.processDirect("go", { channel: "telegram", chatId: "42" })).toBe("done");
    const out = await bus.consumeOutbound(2000);
    expect([out?.channel, out?.chatId, out?.content]).toEqual(["telegram", "42", "hi"]);
  });

  test("stops after the iteration budget and answers with the last interim text", async () => {
    const provider = new ScriptedProvider([toolCall("list_dir", { path: "." }, "c1", "still looking")]);
    const { loop, metrics } = setup(provider, { maxIterations: 3 });

    expect(await loop.processDirect("find it")).toBe("still looking");
    expect(provider.requests).toHaveLength(3);

    const [summary] = metrics.readSessions();
    expect(summary.success).toBe(false);
    expect(summary.failureReason).toBe("max_iterations");
    expect(summary.totalIterations).toBe(3);
    expect(summary.totalToolCalls).toBe(3);
    expect(summary.toolsUsed).toEqual(["list_dir"]);
    expect(metrics.readLlmEvents().map((e) => e.iteration)).toEqual([1, 2, 3]);
    expect(metrics.readToolEvents().every((e) => e.toolName === "list_dir" && e.toolSuccess)).toBe(true);
  });

  test("a failing cycle apologises and the next message still works", async () => {
    const provider = new ScriptedProvider([
      () => { throw new Error("boom"); },
      text("fine"),
    ]);
    const { loop, turns, metrics } = setup(provider);

    expect(await loop.processDirect("first")).toBe(ERROR_REPLY);
    expect(await loop.processDirect("again")).toBe("fine");
    expect(turns("cli:direct")).toEqual([["user", "again"], ["assistant", "fine"]]);
    expect(metrics.readSessions().map((s) => [s.success, s.failureReason])).toEqual([[false, "boom"], [true, null]]);
  });

  test("an engine error ends the cycle with its description", async () => {
    const provider = new ScriptedProvider([errorResponse("Error calling LLM: rate limited")]);
    const { loop, metrics } = setup(provider);

    expect(await loop.processDirect("hello")).toBe("Error calling LLM: rate limited");
    expect(metrics.readSessions()[0].failureReason).toBe("error");
  });

  test("an empty final answer becomes the apology and is not stored", async () => {
    const provider = new ScriptedProvider([text("<think>nothing to say</think>")]);
    const { loop, turns } = setup(provider);

    expect(await loop.processDirect("hello")).toBe(ERROR_REPLY);
    expect(turns("cli:direct")).toEqual([]);
  });

  test("reasoning blocks are stripped from the answer", async () => {
    const provider = new ScriptedProvider([text("<think>plan</think>Answer")]);
    const { loop } = setup(provider);
    expect(await loop.processDirect("q")).toBe("Answer");
  });

  test("interim text and tool hints are reported as progress", async () => {
    const provider = new ScriptedProvider([toolCall("list_dir", { path: "." }, "c1", "Let me look"), text("done")]);
    const { loop } = setup(provider);
    const progress: Array<[string, boolean]> = [];

    const reply = await loop.processDirect("look around", {
      onProgress: async (content, meta) => { progress.push([content, meta.toolHint]); },
    });

    expect(reply).toBe("done");
    expect(progress).toEqual([["Let me look", false], ['list_dir(".")', true]]);
  });

  test("progress goes to the bus tagged as progress when no callback is given", async () => {
    const provider = new ScriptedProvider([toolCall("list_dir", { path: "." }, "c1", "Let me look"), text("done")]);
    const { loop, bus } = setup(provider);

    await loop.processDirect("look around", { channel: "telegram", chatId: "42" });
    const interim = await bus.consumeOutbound(100);
    const hint = await bus.consumeOutbound(100);
    expect(interim).toEqual({ channel: "telegram", chatId: "42", content: "Let me look", metadata: { _progress: true, _tool_hint: false } });
    expect(hint?.metadata).toEqual({ _progress: true, _tool_hint: true });
  });

  test("system messages are answered in the conversation they encode", async () => {
    const provider = new ScriptedProvider([text("Your report is ready.")]);
    const { loop, turns } = setup(provider);

    const out = await loop.processMessage({
      channel: "system",
      senderId: "subagent",
      chatId: "telegram:42",
      content: "[Subagent 'report' completed successfully]",
      metadata: { subagentId: "abc" },
    });

    expect(out).toEqual({ channel: "telegram", chatId: "42", content: "Your report is ready.", metadata: {} });
    expect(turns("telegram:42")).toEqual([["user", "[Subagent 'report' completed successfully]"], ["assistant", "Your report is ready."]]);
  });

  test("an apology for a failed system message goes to the encoded origin", async () => {
    const provider = new ScriptedProvider([text("unused")]);
    const assembler: ContextAssembler = { buildMessages: () => { throw new Error("bad template"); } };
    const { bus, loop } = setup(provider, { contextAssembler: assembler });

    const running = loop.run();
    await bus.publishInbound({ channel: "system", senderId: "subagent", chatId: "telegram:42", content: "done" });
    const out = await bus.consumeOutbound(2000);
    loop.stop();
    await running;

    expect(out).toEqual({ channel: "telegram", chatId: "42", content: ERROR_REPLY });
    expect(provider.requests).toHaveLength(0);
  });

  test("replies thread onto the incoming message id", async () => {
    const provider = new ScriptedProvider([text("ok")]);
    const { loop } = setup(provider);
    const out = await loop.processMessage({ channel: "telegram", senderId: "7", chatId: "42", content: "hi", metadata: { message_id: 99 } });
    expect(out.replyTo).toBe("99");
    expect(out.metadata).toEqual({ message_id: 99 });
  });

  test("history from earlier turns is handed to the model", async () => {
    const provider = new ScriptedProvider([text("hello"), text("again")]);
    const { loop } = setup(provider);
    await loop.processDirect("hi");
    await loop.processDirect("hi again");
    const roles = provider.requests[1].messages.map((m) => [m.role, m.content]);
    expect(roles.slice(1, 3)).toEqual([["user", "hi"], ["assistant", "hello"]]);
  });

  test("/help answers without calling the model", async () => {
    const provider = new ScriptedProvider([text("unused")]);
    const { loop } = setup(provider);
    expect(await loop.processDirect("/help")).toContain("/help - Show available commands");
    expect(provider.requests).toHaveLength(0);
  });
});
