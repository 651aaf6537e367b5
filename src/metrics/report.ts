import type { MetricsCollector } from "./collector.js";
import type { SessionSummary, ToolEvent } from "./models.js";

function since<T>(events: T[], hours: number, ts: (e: T) => string): T[] {
  const cutoff = new Date(Date.now() - hours * 3600_000).toISOString();
  return events.filter((e) => ts(e) >= cutoff);
}

function pct(part: number, whole: number): number {
  return whole ? Math.round((part / whole) * 1000) / 10 : 0;
}

export interface SummaryReport {
  periodHours: number;
  overview: { totalSessions: number; successRate: number; avgIterationsPerSession: number };
  tokens: { totalPrompt: number; totalCompletion: number; total: number; avgPerSession: number; perSuccess: number };
  tools: { totalCalls: number; successRate: number };
  llmCalls: number;
}

export function summaryReport(collector: MetricsCollector, hours = 24): SummaryReport {
  const sessions = since(collector.readSessions(), hours, (s) => s.endedAt);
  const llmEvents = since(collector.readLlmEvents(), hours, (e) => e.ts);
  const toolEvents = since(collector.readToolEvents(), hours, (e) => e.ts);

  const totalSessions = sessions.length;
  const successCount = sessions.filter((s) => s.success).length;
  const total = sessions.reduce((n, s) => n + s.totalTokens, 0);
  const iterations = sessions.reduce((n, s) => n + s.totalIterations, 0);

  return {
    periodHours: hours,
    overview: {
      totalSessions,
      successRate: pct(successCount, totalSessions),
      avgIterationsPerSession: totalSessions ? Math.round((iterations / totalSessions) * 10) / 10 : 0,
    },
    tokens: {
      totalPrompt: sessions.reduce((n, s) => n + s.totalPromptTokens, 0),
      totalCompletion: sessions.reduce((n, s) => n + s.totalCompletionTokens, 0),
      total,
      avgPerSession: totalSessions ? Math.floor(total / totalSessions) : 0,
      perSuccess: successCount ? Math.floor(total / successCount) : 0,
    },
    tools: {
      totalCalls: toolEvents.length,
      successRate: pct(toolEvents.filter((t) => t.toolSuccess).length, toolEvents.length),
    },
    llmCalls: llmEvents.length,
  };
}

export interface ToolReportRow {
  tool: string;
  calls: number;
  successRate: number;
  avgLatencyMs: number;
  avgInputSize: number;
  avgOutputSize: number;
  topErrors: Record<string, number>;
}

/** Per-tool rows, busiest first. */
export function toolReport(collector: MetricsCollector, hours = 24): ToolReportRow[] {
  const byTool = new Map<string, ToolEvent[]>();
  for (const e of since(collector.readToolEvents(), hours, (ev) => ev.ts)) {
    const list = byTool.get(e.toolName) ?? [];
    list.push(e);
    byTool.set(e.toolName, list);
  }

  return [...byTool.entries()]
    .sort((a, b) => b[1].length - a[1].length)
    .map(([tool, events]) => {
      const calls = events.length;
      const avg = (f: (e: ToolEvent) => number) => Math.floor(events.reduce((n, e) => n + f(e), 0) / Math.max(calls, 1));
      const errorCounts = new Map<string, number>();
      for (const e of events) {
        if (!e.error) continue;
        const key = e.error.slice(0, 120);
        errorCounts.set(key, (errorCounts.get(key) ?? 0) + 1);
      }
      const topErrors = Object.fromEntries([...errorCounts.entries()].sort((a, b) => b[1] - a[1]).slice(0, 3));
      return {
        tool,
        calls,
        successRate: pct(events.filter((e) => e.toolSuccess).length, calls),
        avgLatencyMs: avg((e) => e.latencyMs),
        avgInputSize: avg((e) => e.inputSize),
        avgOutputSize: avg((e) => e.outputSize),
        topErrors,
      };
    });
}

export interface SessionReportRow {
  sessionId: string;
  startedAt: string;
  success: boolean;
  iterations: number;
  toolCalls: number;
  totalTokens: number;
  durationMs: number;
  model: string;
  toolsUsed: string[];
  failureReason: string | null;
}

/** Most recent `lastN` cycles, newest first. */
export function sessionReport(collector: MetricsCollector, lastN = 20): SessionReportRow[] {
  return collector.readSessions(lastN).reverse().map((s) => ({
    sessionId: s.sessionId,
    startedAt: s.startedAt,
    success: s.success,
    iterations: s.totalIterations,
    toolCalls: s.totalToolCalls,
    totalTokens: s.totalTokens,
    durationMs: s.durationMs,
    model: s.model || "?",
    toolsUsed: s.toolsUsed,
    failureReason: s.failureReason,
  }));
}

export interface ModelReportRow {
  model: string;
  sessions: number;
  successRate: number;
  totalTokens: number;
  tokensPerSession: number;
  tokensPerSuccess: number;
}

export function modelReport(collector: MetricsCollector, hours = 168): ModelReportRow[] {
  const byModel = new Map<string, SessionSummary[]>();
  for (const s of since(collector.readSessions(), hours, (x) => x.endedAt)) {
    const key = s.model || "?";
    byModel.set(key, [...(byModel.get(key) ?? []), s]);
  }
  return [...byModel.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([model, sessions]) => {
      const ok = sessions.filter((s) => s.success).length;
      const tokens = sessions.reduce((n, s) => n + s.totalTokens, 0);
      return {
        model,
        sessions: sessions.length,
        successRate: pct(ok, sessions.length),
        totalTokens: tokens,
        tokensPerSession: Math.floor(tokens / Math.max(sessions.length, 1)),
        tokensPerSuccess: Math.floor(tokens / Math.max(ok, 1)),
      };
    });
}
