import OpenAI from "openai";
import type { ChatCompletionMessageParam, ChatCompletionTool } from "openai/resources/chat/completions";
import { nanoid } from "nanoid";
import type { ChatMessage, ChatRequest, LLMProvider, LLMResponse, ToolCallRequest, ToolDefinition } from "./base.js";
import { EMPTY_USAGE, errorResponse, sanitizeEmptyContent } from "./base.js";
import { errorMessage, isRecord } from "../utils/helpers.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("provider");

export interface ProviderOptions {
  providerName: string;
  apiKey: string;
  apiBase: string;
  defaultModel: string;
  /** Gateways route on the full "vendor/model" id, so the prefix is kept. */
  gateway: boolean;
  extraHeaders?: Record<string, string> | null;
}

// Groq serves these under their prefixed id.
const KEEP_PREFIX = new Set(["groq/compound", "groq/compound-mini"]);

function canonicalize(s: string): string {
  return s.toLowerCase().replace(/-/g, "_");
}

function toParam(msg: ChatMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case "system":
      return { role: "system", content: msg.content };
    case "user":
      return { role: "user", content: msg.content };
    case "assistant":
      return msg.tool_calls?.length
        ? { role: "assistant", content: msg.content, tool_calls: msg.tool_calls }
        : { role: "assistant", content: msg.content };
    case "tool":
      return { role: "tool", tool_call_id: msg.tool_call_id, content: msg.content };
  }
}

function toTool(def: ToolDefinition): ChatCompletionTool {
  return { type: "function", function: { name: def.function.name, description: def.function.description, parameters: def.function.parameters } };
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw || "{}");
    return isRecord(parsed) ? parsed : {};
  } catch (err) {
    log.warn("Tool call arguments are not valid JSON", { error: errorMessage(err) });
    return {};
  }
}

export class OpenAICompatibleProvider implements LLMProvider {
  private readonly client: OpenAI;

  constructor(private readonly options: ProviderOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey || "no-key",
      baseURL: options.apiBase,
      defaultHeaders: options.extraHeaders ?? undefined,
    });
  }

  getDefaultModel(): string {
    return this.options.defaultModel;
  }

  resolveModel(model: string): string {
    if (this.options.gateway || !model.includes("/") || KEEP_PREFIX.has(model)) return model;
    const idx = model.indexOf("/");
    const prefix = model.slice(0, idx);
    if (canonicalize(prefix) === canonicalize(this.options.providerName)) return model.slice(idx + 1);
    return model;
  }

  async chat(input: ChatRequest): Promise<LLMResponse> {
    const model = this.resolveModel(input.model ?? this.options.defaultModel);
    try {
      const tools = input.tools?.length ? input.tools.map(toTool) : undefined;
      const res = await this.client.chat.completions.create({
        model,
        messages: sanitizeEmptyContent(input.messages).map(toParam),
        tools,
        tool_choice: tools ? "auto" : undefined,
        max_tokens: Math.max(1, input.maxTokens ?? 4096),
        temperature: input.temperature ?? 0.7,
      });
      const choice = res.choices[0];
      if (!choice) return errorResponse(`Error calling LLM: empty choices from ${this.options.providerName}`);

      const toolCalls: ToolCallRequest[] = (choice.message.tool_calls ?? []).map((tc) => ({
        id: tc.id || nanoid(9),
        name: tc.function.name,
        arguments: parseArguments(tc.function.arguments),
      }));
      return {
        content: choice.message.content,
        toolCalls,
        finishReason: choice.finish_reason ?? "stop",
        usage: res.usage
          ? { promptTokens: res.usage.prompt_tokens, completionTokens: res.usage.completion_tokens, totalTokens: res.usage.total_tokens }
          : { ...EMPTY_USAGE },
      };
    } catch (err) {
      log.error("LLM request failed", { provider: this.options.providerName, model, error: errorMessage(err) });
      return errorResponse(`Error calling LLM: ${errorMessage(err)}`);
    }
  }
}
