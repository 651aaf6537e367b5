import fs from "node:fs";
import path from "node:path";
import { ConfigSchema, defaultConfig, type Config } from "./schema.js";
import { getDataPath } from "../utils/helpers.js";
import { createLogger, isLogLevel } from "../utils/logger.js";

const log = createLogger("config");

export function getConfigPath(): string {
  return path.join(getDataPath(), "config.json");
}

/** Environment wins over the file; `.env` is loaded by the entrypoint before this runs. */
function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv): Config {
  const out = structuredClone(config);
  if (env.SWITCHYARD_MODEL) out.agents.defaults.model = env.SWITCHYARD_MODEL;
  if (env.SWITCHYARD_WORKSPACE) out.agents.defaults.workspace = env.SWITCHYARD_WORKSPACE;
  const level = env.SWITCHYARD_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) out.logging.level = level;
  return out;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const p = configPath ?? getConfigPath();
  if (!fs.existsSync(p)) return applyEnvOverrides(defaultConfig(), env);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (err) {
    log.warn("Failed to read config, using defaults", { path: p, error: String(err) });
    return applyEnvOverrides(defaultConfig(), env);
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    log.warn("Invalid config, using defaults", { path: p, issues });
    return applyEnvOverrides(defaultConfig(), env);
  }
  return applyEnvOverrides(parsed.data, env);
}

export function saveConfig(config: Config, configPath?: string): void {
  const p = configPath ?? getConfigPath();
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, JSON.stringify(ConfigSchema.parse(config), null, 2), "utf8");
}
