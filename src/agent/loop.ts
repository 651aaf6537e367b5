import path from "node:path";
import { ContextBuilder, type ContextAssembler } from "./context.js";
import { AgentRunner, EmptyResponseError, type ProgressFn, type RunResult } from "./runner.js";
import { SubagentManager } from "./subagent.js";
import { fileTools } from "./tools/filesystem.js";
import { ExecTool } from "./tools/shell.js";
import { WebFetchTool, WebSearchTool, type WebSearchOptions } from "./tools/web.js";
import { MessageTool } from "./tools/message.js";
import { SpawnTool } from "./tools/spawn.js";
import { ToolRegistry } from "./tools/registry.js";
import type { Tool, ToolContext } from "./tools/base.js";
import type { MessageBus } from "../bus/queue.js";
import { SYSTEM_CHANNEL, decodeOrigin, sessionKey, type InboundMessage, type Origin, type OutboundMessage } from "../bus/events.js";
import type { LLMProvider } from "../providers/base.js";
import { MetricsCollector } from "../metrics/collector.js";
import { SessionManager, type SessionStore } from "../session/manager.js";
import { errorMessage } from "../utils/helpers.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("agent");

export const DIRECT_CHANNEL = "cli";
export const DIRECT_CHAT_ID = "direct";
export const ERROR_REPLY = "Sorry, I encountered an error.";

const HELP_TEXT = "switchyard commands:\n/help - Show available commands";

export interface AgentLoopOptions {
  bus: MessageBus;
  provider: LLMProvider;
  workspace: string;
  model?: string;
  maxIterations?: number;
  subagentMaxIterations?: number;
  temperature?: number;
  maxTokens?: number;
  /** Number of past turns handed to the context assembler. */
  memoryWindow?: number;
  execConfig?: { timeout: number; pathAppend: string };
  /** Brave Search settings; without an API key web_search reports itself unconfigured. */
  webSearch?: WebSearchOptions;
  restrictToWorkspace?: boolean;
  sessionStore?: SessionStore;
  contextAssembler?: ContextAssembler;
  metrics?: MetricsCollector;
  /** Upper bound on one wait for inbound messages, so stop() is noticed promptly. */
  pollIntervalMs?: number;
}

export interface DirectOptions {
  channel?: string;
  chatId?: string;
  onProgress?: ProgressFn;
}

function messageId(msg: InboundMessage): string | undefined {
  const id = msg.metadata?.message_id;
  return typeof id === "string" || typeof id === "number" ? String(id) : undefined;
}

/** Where replies for `msg` go: the message's own chat, or the origin encoded in a system message. */
export function replyTarget(msg: Pick<InboundMessage, "channel" | "chatId">): Origin {
  return msg.channel === SYSTEM_CHANNEL ? decodeOrigin(msg.chatId) : { channel: msg.channel, chatId: msg.chatId };
}

export class AgentLoop {
  readonly tools: ToolRegistry;
  readonly subagents: SubagentManager;
  private readonly context: ContextAssembler;
  private readonly sessions: SessionStore;
  private readonly runner: AgentRunner;
  private readonly metrics: MetricsCollector;
  private readonly workspace: string;
  private running = false;

  constructor(private readonly options: AgentLoopOptions) {
    this.workspace = path.resolve(options.workspace);
    this.context = options.contextAssembler ?? new ContextBuilder(this.workspace);
    this.sessions = options.sessionStore ?? new SessionManager(this.workspace);
    this.metrics = options.metrics ?? MetricsCollector.disabled();

    const model = options.model ?? options.provider.getDefaultModel();
    const runnerOptions = {
      provider: options.provider,
      model,
      temperature: options.temperature ?? 0.1,
      maxTokens: options.maxTokens ?? 4096,
      metrics: this.metrics,
    };
    this.runner = new AgentRunner({ ...runnerOptions, maxIterations: options.maxIterations ?? 20 });

    this.tools = new ToolRegistry();
    const subagentTools = new ToolRegistry();
    for (const tool of this.workerTools()) {
      this.tools.register(tool);
      subagentTools.register(tool);
    }
    this.subagents = new SubagentManager(
      new AgentRunner({ ...runnerOptions, maxIterations: options.subagentMaxIterations ?? 15 }),
      subagentTools,
      options.bus,
      this.workspace,
    );
    this.tools.register(new MessageTool((msg) => options.bus.publishOutbound(msg)));
    this.tools.register(new SpawnTool(this.subagents));
  }

  get model(): string {
    return this.runner.model;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** File, shell and web tools, shared with subagents. */
  private workerTools(): Tool[] {
    const allowedDir = this.options.restrictToWorkspace ? this.workspace : undefined;
    const exec = this.options.execConfig ?? { timeout: 60, pathAppend: "" };
    return [
      ...fileTools({ workspace: this.workspace, allowedDir }),
      new ExecTool({ timeout: exec.timeout, workingDir: this.workspace, restrictToWorkspace: !!this.options.restrictToWorkspace, pathAppend: exec.pathAppend }),
      new WebSearchTool(this.options.webSearch ?? { apiKey: "", maxResults: 5 }),
      new WebFetchTool(),
    ];
  }

  /** Drains the inbound queue one message at a time until stop() is called. */
  async run(): Promise<void> {
    this.running = true;
    log.info("Agent loop started", { model: this.model });
    const poll = this.options.pollIntervalMs ?? 1000;
    while (this.running) {
      const msg = await this.options.bus.consumeInbound(poll);
      if (!msg) continue;
      await this.options.bus.publishOutbound(await this.handle(msg));
    }
    log.info("Agent loop stopped");
  }

  stop(): void {
    this.running = false;
  }

  /** Runs one cycle outside the bus and returns the reply text. */
  async processDirect(content: string, opts: DirectOptions = {}): Promise<string> {
    const msg: InboundMessage = {
      channel: opts.channel ?? DIRECT_CHANNEL,
      senderId: "user",
      chatId: opts.chatId ?? DIRECT_CHAT_ID,
      content,
    };
    const out = await this.handle(msg, opts.onProgress);
    return out.content;
  }

  /** Outermost boundary: whatever escapes a cycle becomes an apology to the same conversation. */
  private async handle(msg: InboundMessage, onProgress?: ProgressFn): Promise<OutboundMessage> {
    try {
      return await this.processMessage(msg, onProgress);
    } catch (err) {
      const target = replyTarget(msg);
      log.error("Error processing message", { channel: target.channel, chatId: target.chatId, error: errorMessage(err) });
      return { channel: target.channel, chatId: target.chatId, content: ERROR_REPLY };
    }
  }

  async processMessage(msg: InboundMessage, onProgress?: ProgressFn): Promise<OutboundMessage> {
    const isSystem = msg.channel === SYSTEM_CHANNEL;
    const target = replyTarget(msg);
    const key = sessionKey(target);
    const replyTo = isSystem ? undefined : messageId(msg);
    const reply = (content: string): OutboundMessage => ({
      channel: target.channel,
      chatId: target.chatId,
      content,
      ...(replyTo ? { replyTo } : {}),
      metadata: isSystem ? {} : { ...(msg.metadata ?? {}) },
    });

    if (!isSystem && msg.content.trim().toLowerCase() === "/help") return reply(HELP_TEXT);

    log.info(isSystem ? "Processing subagent result" : "Processing message", { session: key, sender: msg.senderId });
    const startedAt = new Date();
    let result: RunResult | null = null;
    try {
      const session = this.sessions.getOrCreate(key);
      const history = session.getHistory(this.options.memoryWindow ?? 50);
      const messages = this.context.buildMessages({
        history,
        currentMessage: msg.content,
        media: msg.media,
        channel: target.channel,
        chatId: target.chatId,
      });

      const ctx: ToolContext = { channel: target.channel, chatId: target.chatId, sessionKey: key, messageId: replyTo };
      result = await this.runner.run({
        messages,
        tools: this.tools,
        ctx,
        onProgress: onProgress ?? (isSystem ? undefined : this.busProgress(target, msg)),
      });
      if (result.finalContent === null) throw new EmptyResponseError(result.stopReason);

      session.append("user", msg.content);
      session.append("assistant", result.finalContent, result.toolsUsed);
      this.sessions.save(session);
      this.recordSummary(key, target.channel, startedAt, result, result.stopReason === "completed" ? null : result.stopReason);
      return reply(result.finalContent);
    } catch (err) {
      this.recordSummary(key, target.channel, startedAt, result, errorMessage(err));
      throw err;
    }
  }

  private busProgress(target: Origin, msg: InboundMessage): ProgressFn {
    return async (content, meta) => {
      await this.options.bus.publishOutbound({
        channel: target.channel,
        chatId: target.chatId,
        content,
        metadata: { ...(msg.metadata ?? {}), _progress: true, _tool_hint: meta.toolHint },
      });
    };
  }

  private recordSummary(key: string, channel: string, startedAt: Date, result: RunResult | null, failureReason: string | null): void {
    const endedAt = new Date();
    this.metrics.recordSession({
      sessionId: key,
      startedAt: startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: endedAt.getTime() - startedAt.getTime(),
      success: failureReason === null,
      totalIterations: result?.iterations ?? 0,
      totalToolCalls: result?.toolsUsed.length ?? 0,
      totalLlmCalls: result?.llmCalls ?? 0,
      totalPromptTokens: result?.usage.promptTokens ?? 0,
      totalCompletionTokens: result?.usage.completionTokens ?? 0,
      totalTokens: result?.usage.totalTokens ?? 0,
      toolsUsed: [...new Set(result?.toolsUsed ?? [])],
      failureReason,
      channel,
      model: this.model,
    });
  }
}
