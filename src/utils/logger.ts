import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
type EmitLevel = Exclude<LogLevel, "silent">;

const PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

const COLORS: Record<EmitLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

const META_MAX_CHARS = 200;

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

function timestamp(now: Date): string {
  const pad = (n: number, w = 2) => String(n).padStart(w, "0");
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}.${pad(now.getMilliseconds(), 3)}`;
}

function formatMeta(meta?: Record<string, unknown>): string {
  if (!meta) return "";
  const parts = Object.entries(meta).map(([k, v]) => {
    const text = typeof v === "string" ? v : v instanceof Error ? v.message : JSON.stringify(v);
    const clipped = text && text.length > META_MAX_CHARS ? `${text.slice(0, META_MAX_CHARS)}…` : text;
    return `${k}=${clipped}`;
  });
  return parts.length ? ` ${chalk.dim(parts.join(" "))}` : "";
}

export function createLogger(scope: string): Logger {
  const emit = (level: EmitLevel, message: string, meta?: Record<string, unknown>) => {
    if (PRIORITY[level] < PRIORITY[currentLevel]) return;
    const tag = COLORS[level](level.toUpperCase().padEnd(5));
    process.stderr.write(`${chalk.dim(timestamp(new Date()))} ${tag} [${chalk.bold(scope)}] ${message}${formatMeta(meta)}\n`);
  };
  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}
