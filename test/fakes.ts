import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ChatRequest, LLMProvider, LLMResponse } from "../src/providers/base.js";
import { EMPTY_USAGE } from "../src/providers/base.js";

type Step = LLMResponse | ((req: ChatRequest) => LLMResponse | Promise<LLMResponse>);

/** Replays a fixed script of responses; the last step repeats once the script runs out. */
export class ScriptedProvider implements LLMProvider {
  readonly requests: ChatRequest[] = [];

  constructor(private readonly steps: Step[]) {}

  async chat(req: ChatRequest): Promise<LLMResponse> {
    this.requests.push({ ...req, messages: structuredClone(req.messages) });
    const step = this.steps[Math.min(this.requests.length, this.steps.length) - 1];
    return typeof step === "function" ? step(req) : step;
  }

  getDefaultModel(): string {
    return "test-model";
  }
}

export function text(content: string | null, usage = { promptTokens: 10, completionTokens: 5, totalTokens: 15 }): LLMResponse {
  return { content, toolCalls: [], finishReason: "stop", usage };
}

export function toolCall(name: string, args: Record<string, unknown>, id = `call_${name}`, content: string | null = null): LLMResponse {
  return { content, toolCalls: [{ id, name, arguments: args }], finishReason: "tool_calls", usage: { ...EMPTY_USAGE } };
}

export function tempDir(prefix = "switchyard-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export async function until(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!check()) {
    if (Date.now() - started > timeoutMs) throw new Error("condition not met in time");
    await new Promise((r) => setTimeout(r, 5));
  }
}
