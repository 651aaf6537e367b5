import fs from "node:fs";
import path from "node:path";
import type { ZodType, ZodTypeDef } from "zod";
import { errorMessage, getDataPath } from "../utils/helpers.js";
import { createLogger } from "../utils/logger.js";
import {
  LLMEventSchema,
  SessionSummarySchema,
  ToolEventSchema,
  type LLMEvent,
  type SessionSummary,
  type ToolEvent,
} from "./models.js";

const log = createLogger("metrics");

/**
 * Append-only JSONL metrics writer.
 *
 * Files under the metrics directory:
 *   tool_events.jsonl  one line per tool invocation
 *   llm_events.jsonl   one line per LLM call
 *   sessions.jsonl     one line per finished cycle
 */
export class MetricsCollector {
  readonly metricsDir: string;

  constructor(metricsDir?: string | null, readonly enabled = true) {
    this.metricsDir = metricsDir ?? path.join(getDataPath(), "metrics");
  }

  static disabled(): MetricsCollector {
    return new MetricsCollector("", false);
  }

  private get toolPath(): string {
    return path.join(this.metricsDir, "tool_events.jsonl");
  }

  private get llmPath(): string {
    return path.join(this.metricsDir, "llm_events.jsonl");
  }

  private get sessionPath(): string {
    return path.join(this.metricsDir, "sessions.jsonl");
  }

  recordToolEvent(event: ToolEvent): void {
    this.append(this.toolPath, event);
  }

  recordLlmEvent(event: LLMEvent): void {
    this.append(this.llmPath, event);
  }

  recordSession(summary: SessionSummary): void {
    this.append(this.sessionPath, summary);
  }

  readToolEvents(limit = 0): ToolEvent[] {
    return this.read(this.toolPath, ToolEventSchema, limit);
  }

  readLlmEvents(limit = 0): LLMEvent[] {
    return this.read(this.llmPath, LLMEventSchema, limit);
  }

  readSessions(limit = 0): SessionSummary[] {
    return this.read(this.sessionPath, SessionSummarySchema, limit);
  }

  /** Returns false when there was nothing to delete. */
  reset(): boolean {
    if (!this.enabled || !fs.existsSync(this.metricsDir)) return false;
    fs.rmSync(this.metricsDir, { recursive: true, force: true });
    return true;
  }

  private append(file: string, data: object): void {
    if (!this.enabled) return;
    try {
      fs.mkdirSync(this.metricsDir, { recursive: true });
      fs.appendFileSync(file, `${JSON.stringify(data)}\n`, "utf8");
    } catch (err) {
      log.warn("Metrics write failed", { file: path.basename(file), error: errorMessage(err) });
    }
  }

  private read<T>(file: string, schema: ZodType<T, ZodTypeDef, unknown>, limit: number): T[] {
    if (!this.enabled || !fs.existsSync(file)) return [];
    const rows: T[] = [];
    try {
      for (const line of fs.readFileSync(file, "utf8").split("\n")) {
        if (!line.trim()) continue;
        const parsed = schema.safeParse(JSON.parse(line));
        if (parsed.success) rows.push(parsed.data);
      }
    } catch (err) {
      log.warn("Metrics read failed", { file: path.basename(file), error: errorMessage(err) });
    }
    return limit > 0 ? rows.slice(-limit) : rows;
  }
}
