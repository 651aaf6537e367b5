import path from "node:path";
import { z } from "zod";
import { LOG_LEVELS } from "../utils/logger.js";

export const ProviderConfigSchema = z.object({
  apiKey: z.string().default(""),
  apiBase: z.string().nullable().default(null),
  extraHeaders: z.record(z.string()).nullable().default(null),
});

const TelegramConfigSchema = z.object({
  enabled: z.boolean().default(false),
  token: z.string().default(""),
  allowFrom: z.array(z.coerce.string()).default([]),
  replyToMessage: z.boolean().default(false),
});

const ChannelsConfigSchema = z.object({
  sendProgress: z.boolean().default(true),
  sendToolHints: z.boolean().default(false),
  telegram: TelegramConfigSchema.default({}),
});

const AgentDefaultsSchema = z.object({
  workspace: z.string().default(path.join("~", ".switchyard", "workspace")),
  model: z.string().default("openai/gpt-4.1-mini"),
  provider: z.string().default("auto"),
  maxTokens: z.number().int().positive().default(8192),
  temperature: z.number().min(0).max(2).default(0.1),
  maxToolIterations: z.number().int().positive().default(20),
  subagentMaxIterations: z.number().int().positive().default(15),
  memoryWindow: z.number().int().nonnegative().default(50),
});

const ToolsConfigSchema = z.object({
  web: z.object({
    search: z.object({
      apiKey: z.string().default(""),
      maxResults: z.number().int().min(1).max(10).default(5),
    }).default({}),
  }).default({}),
  exec: z.object({
    timeout: z.number().positive().default(60),
    pathAppend: z.string().default(""),
  }).default({}),
  restrictToWorkspace: z.boolean().default(false),
});

export const ConfigSchema = z.object({
  agents: z.object({ defaults: AgentDefaultsSchema.default({}) }).default({}),
  channels: ChannelsConfigSchema.default({}),
  providers: z.record(ProviderConfigSchema).default({}),
  gateway: z.object({ pollIntervalMs: z.number().int().positive().default(1000) }).default({}),
  tools: ToolsConfigSchema.default({}),
  metrics: z.object({
    enabled: z.boolean().default(true),
    dir: z.string().nullable().default(null),
  }).default({}),
  logging: z.object({ level: z.enum(LOG_LEVELS).default("info") }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type TelegramConfig = z.infer<typeof TelegramConfigSchema>;

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}
