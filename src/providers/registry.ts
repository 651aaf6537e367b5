import type { Config, ProviderConfig } from "../config/schema.js";
import type { LLMProvider } from "./base.js";
import { OpenAICompatibleProvider } from "./openai-provider.js";

export interface ProviderSpec {
  name: string;
  keywords: readonly string[];
  isGateway: boolean;
  isLocal: boolean;
  defaultApiBase: string;
  detectByKeyPrefix?: string;
}

export const PROVIDERS: readonly ProviderSpec[] = [
  { name: "custom", keywords: [], isGateway: false, isLocal: true, defaultApiBase: "http://localhost:8000/v1" },
  { name: "openrouter", keywords: ["openrouter"], isGateway: true, isLocal: false, defaultApiBase: "https://openrouter.ai/api/v1", detectByKeyPrefix: "sk-or-" },
  { name: "siliconflow", keywords: ["siliconflow"], isGateway: true, isLocal: false, defaultApiBase: "https://api.siliconflow.cn/v1" },
  { name: "openai", keywords: ["openai", "gpt"], isGateway: false, isLocal: false, defaultApiBase: "https://api.openai.com/v1" },
  { name: "deepseek", keywords: ["deepseek"], isGateway: false, isLocal: false, defaultApiBase: "https://api.deepseek.com/v1" },
  { name: "groq", keywords: ["groq"], isGateway: false, isLocal: false, defaultApiBase: "https://api.groq.com/openai/v1" },
  { name: "moonshot", keywords: ["moonshot", "kimi"], isGateway: false, isLocal: false, defaultApiBase: "https://api.moonshot.ai/v1" },
  { name: "minimax", keywords: ["minimax"], isGateway: false, isLocal: false, defaultApiBase: "https://api.minimax.io/v1" },
  { name: "dashscope", keywords: ["qwen", "dashscope"], isGateway: false, isLocal: false, defaultApiBase: "https://dashscope.aliyuncs.com/compatible-mode/v1" },
  { name: "zhipu", keywords: ["zhipu", "glm", "zai"], isGateway: false, isLocal: false, defaultApiBase: "https://open.bigmodel.cn/api/paas/v4" },
  { name: "vllm", keywords: ["vllm"], isGateway: false, isLocal: true, defaultApiBase: "http://localhost:8000/v1" },
];

function normalize(name: string): string {
  return name.toLowerCase().replace(/-/g, "_");
}

function modelPrefix(model: string): string {
  return model.includes("/") ? normalize(model.split("/", 1)[0]) : "";
}

/** Local providers count as configured once they have an API base. */
function isConfigured(spec: ProviderSpec, p: ProviderConfig | undefined): boolean {
  if (!p) return false;
  return spec.isLocal ? !!(p.apiKey || p.apiBase) : !!p.apiKey;
}

export function findSpec(name: string): ProviderSpec | undefined {
  return PROVIDERS.find((s) => s.name === name);
}

export function getProviderName(config: Config, model?: string): string | null {
  const forced = config.agents.defaults.provider;
  if (forced !== "auto") return config.providers[forced] ? forced : null;

  const m = (model ?? config.agents.defaults.model).toLowerCase();
  const prefix = modelPrefix(m);

  for (const spec of PROVIDERS) {
    if (prefix && prefix === spec.name && isConfigured(spec, config.providers[spec.name])) return spec.name;
  }
  for (const spec of PROVIDERS) {
    const p = config.providers[spec.name];
    if (spec.detectByKeyPrefix && p?.apiKey.startsWith(spec.detectByKeyPrefix)) return spec.name;
  }
  for (const spec of PROVIDERS) {
    if (spec.keywords.some((kw) => m.includes(kw) || normalize(m).includes(normalize(kw))) && isConfigured(spec, config.providers[spec.name])) return spec.name;
  }
  for (const spec of PROVIDERS) {
    if (isConfigured(spec, config.providers[spec.name])) return spec.name;
  }
  return null;
}

export function getApiBase(config: Config, model?: string): string | null {
  const name = getProviderName(config, model);
  if (!name) return null;
  return config.providers[name]?.apiBase || findSpec(name)?.defaultApiBase || null;
}

export function makeProvider(config: Config): LLMProvider {
  const model = config.agents.defaults.model;
  const providerName = getProviderName(config, model);
  if (!providerName) {
    throw new Error("No provider could be resolved from config. Run `switchyard onboard` and set a provider API key.");
  }
  const spec = findSpec(providerName);
  const p = config.providers[providerName];
  const apiBase = getApiBase(config, model);
  if (!apiBase) throw new Error(`No API base configured for provider '${providerName}'.`);
  if (!spec?.isLocal && !p?.apiKey.trim()) {
    throw new Error(`No API key configured for provider '${providerName}'. Edit ~/.switchyard/config.json.`);
  }
  return new OpenAICompatibleProvider({
    providerName,
    apiKey: p?.apiKey ?? "",
    apiBase,
    defaultModel: model,
    gateway: spec?.isGateway ?? false,
    extraHeaders: p?.extraHeaders,
  });
}
