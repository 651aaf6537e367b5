import { z } from "zod";

export const ToolEventSchema = z.object({
  ts: z.string(),
  sessionId: z.string(),
  toolName: z.string(),
  toolSuccess: z.boolean(),
  latencyMs: z.number(),
  /** Length of the JSON-encoded arguments. */
  inputSize: z.number(),
  outputSize: z.number(),
  error: z.string().nullable().default(null),
  iteration: z.number().default(0),
});

export const LLMEventSchema = z.object({
  ts: z.string(),
  sessionId: z.string(),
  model: z.string(),
  promptTokens: z.number(),
  completionTokens: z.number(),
  totalTokens: z.number(),
  hasToolCalls: z.boolean(),
  numToolCalls: z.number(),
  latencyMs: z.number(),
  iteration: z.number(),
  finishReason: z.string().default("stop"),
});

export const SessionSummarySchema = z.object({
  sessionId: z.string(),
  startedAt: z.string(),
  endedAt: z.string(),
  durationMs: z.number(),
  success: z.boolean(),
  totalIterations: z.number(),
  totalToolCalls: z.number(),
  totalLlmCalls: z.number(),
  totalPromptTokens: z.number(),
  totalCompletionTokens: z.number(),
  totalTokens: z.number(),
  toolsUsed: z.array(z.string()).default([]),
  failureReason: z.string().nullable().default(null),
  channel: z.string().default(""),
  model: z.string().default(""),
});

export type ToolEvent = z.infer<typeof ToolEventSchema>;
export type LLMEvent = z.infer<typeof LLMEventSchema>;
export type SessionSummary = z.infer<typeof SessionSummarySchema>;
