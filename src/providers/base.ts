export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolCallPayload {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string | ContentPart[] }
  | { role: "assistant"; content: string | null; tool_calls?: ToolCallPayload[] }
  | { role: "tool"; tool_call_id: string; name: string; content: string };

export interface ToolDefinition {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string | null;
  toolCalls: ToolCallRequest[];
  /** "error" marks a transport or provider failure whose description is in `content`. */
  finishReason: string;
  usage: TokenUsage;
}

export interface ChatRequest {
  messages: ChatMessage[];
  tools?: ToolDefinition[];
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LLMProvider {
  chat(input: ChatRequest): Promise<LLMResponse>;
  getDefaultModel(): string;
}

export const EMPTY_USAGE: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

export function errorResponse(message: string): LLMResponse {
  return { content: message, toolCalls: [], finishReason: "error", usage: { ...EMPTY_USAGE } };
}

export function sanitizeEmptyContent(messages: ChatMessage[]): ChatMessage[] {
  return messages.map((msg): ChatMessage => {
    if (msg.role === "assistant") {
      if (msg.content === "") return { ...msg, content: msg.tool_calls?.length ? null : "(empty)" };
      return msg;
    }
    if (msg.role === "user" && Array.isArray(msg.content)) {
      const parts = msg.content.filter((p) => p.type !== "text" || p.text.length > 0);
      if (parts.length === msg.content.length) return msg;
      return { ...msg, content: parts.length ? parts : "(empty)" };
    }
    if (typeof msg.content === "string" && msg.content.length === 0) return { ...msg, content: "(empty)" };
    return msg;
  });
}
