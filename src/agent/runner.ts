import type { MetricsCollector } from "../metrics/collector.js";
import type { ChatMessage, LLMProvider, TokenUsage, ToolCallPayload, ToolCallRequest } from "../providers/base.js";
import { nowIso } from "../utils/helpers.js";
import { createLogger } from "../utils/logger.js";
import { ContextBuilder } from "./context.js";
import type { ToolContext } from "./tools/base.js";
import type { ToolRegistry } from "./tools/registry.js";

const log = createLogger("runner");

export type ProgressFn = (content: string, meta: { toolHint: boolean }) => Promise<void>;

/** Why the reasoning/acting cycle ended. */
export type StopReason = "completed" | "error" | "max_iterations";

export interface RunnerOptions {
  provider: LLMProvider;
  model: string;
  temperature: number;
  maxTokens: number;
  maxIterations: number;
  metrics: MetricsCollector;
}

export interface RunInput {
  messages: ChatMessage[];
  tools: ToolRegistry;
  ctx: ToolContext;
  onProgress?: ProgressFn;
}

export interface RunResult {
  /** null when the engine produced nothing usable (see EmptyResponseError). */
  finalContent: string | null;
  stopReason: StopReason;
  iterations: number;
  llmCalls: number;
  toolsUsed: string[];
  usage: TokenUsage;
}

export class EmptyResponseError extends Error {
  constructor(readonly stopReason: StopReason) {
    super(`LLM produced no final content (${stopReason})`);
    this.name = "EmptyResponseError";
  }
}

export function stripThink(text: string | null): string | null {
  if (!text) return null;
  return text.replace(/<think>[\s\S]*?<\/think>/g, "").trim() || null;
}

export function toolHint(toolCalls: ToolCallRequest[]): string {
  return toolCalls.map((tc) => {
    const val = Object.values(tc.arguments)[0];
    if (typeof val !== "string") return tc.name;
    return val.length > 40 ? `${tc.name}("${val.slice(0, 40)}...")` : `${tc.name}("${val}")`;
  }).join(", ");
}

function toPayload(tc: ToolCallRequest): ToolCallPayload {
  return { id: tc.id, type: "function", function: { name: tc.name, arguments: JSON.stringify(tc.arguments) } };
}

/**
 * The bounded reasoning/acting cycle: ask the LLM, run any requested tools in order,
 * feed their results back, repeat until a plain answer, an engine error or the iteration budget.
 * Shared by the foreground loop and by subagents.
 */
export class AgentRunner {
  constructor(private readonly options: RunnerOptions) {}

  get model(): string {
    return this.options.model;
  }

  get maxIterations(): number {
    return this.options.maxIterations;
  }

  async run(input: RunInput): Promise<RunResult> {
    const { provider, metrics, model } = this.options;
    const messages = [...input.messages];
    const toolsUsed: string[] = [];
    const usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
    const definitions = input.tools.getDefinitions();
    let lastContent: string | null = null;

    const result = (finalContent: string | null, stopReason: StopReason, iterations: number): RunResult =>
      ({ finalContent, stopReason, iterations, llmCalls: iterations, toolsUsed, usage });

    for (let iteration = 1; iteration <= this.options.maxIterations; iteration++) {
      const started = Date.now();
      const response = await provider.chat({
        messages,
        tools: definitions,
        model,
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
      });
      usage.promptTokens += response.usage.promptTokens;
      usage.completionTokens += response.usage.completionTokens;
      usage.totalTokens += response.usage.totalTokens;
      metrics.recordLlmEvent({
        ts: nowIso(),
        sessionId: input.ctx.sessionKey,
        model,
        promptTokens: response.usage.promptTokens,
        completionTokens: response.usage.completionTokens,
        totalTokens: response.usage.totalTokens,
        hasToolCalls: response.toolCalls.length > 0,
        numToolCalls: response.toolCalls.length,
        latencyMs: Date.now() - started,
        iteration,
        finishReason: response.finishReason,
      });

      if (response.finishReason === "error") {
        log.warn("LLM returned an error, ending cycle", { session: input.ctx.sessionKey, iteration });
        return result(response.content || null, "error", iteration);
      }

      const clean = stripThink(response.content);
      if (!response.toolCalls.length) {
        return result(clean, "completed", iteration);
      }

      lastContent = clean;
      if (input.onProgress) {
        if (clean) await input.onProgress(clean, { toolHint: false });
        await input.onProgress(toolHint(response.toolCalls), { toolHint: true });
      }

      ContextBuilder.addAssistantMessage(messages, response.content, response.toolCalls.map(toPayload));
      for (const call of response.toolCalls) {
        toolsUsed.push(call.name);
        const callStarted = Date.now();
        const output = await input.tools.execute(call.name, call.arguments, input.ctx);
        const ok = !output.startsWith("Error");
        metrics.recordToolEvent({
          ts: nowIso(),
          sessionId: input.ctx.sessionKey,
          toolName: call.name,
          toolSuccess: ok,
          latencyMs: Date.now() - callStarted,
          inputSize: JSON.stringify(call.arguments).length,
          outputSize: output.length,
          error: ok ? null : output.slice(0, 500),
          iteration,
        });
        ContextBuilder.addToolResult(messages, call.id, call.name, output);
      }
    }

    log.warn("Iteration budget exhausted", { session: input.ctx.sessionKey, maxIterations: this.options.maxIterations });
    return result(lastContent ?? "", "max_iterations", this.options.maxIterations);
  }
}
