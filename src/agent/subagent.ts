import { nanoid } from "nanoid";
import { SYSTEM_CHANNEL, encodeOrigin, type Origin } from "../bus/events.js";
import type { MessageBus } from "../bus/queue.js";
import { errorMessage, truncate } from "../utils/helpers.js";
import { createLogger } from "../utils/logger.js";
import type { AgentRunner, RunResult } from "./runner.js";
import type { ToolRegistry } from "./tools/registry.js";

const log = createLogger("subagent");

export interface SpawnRequest {
  task: string;
  label: string | null;
  originChannel: string;
  originChatId: string;
}

interface RunningTask {
  label: string;
  origin: Origin;
  done: Promise<void>;
}

export class SubagentManager {
  private readonly running = new Map<string, RunningTask>();

  constructor(
    private readonly runner: AgentRunner,
    private readonly tools: ToolRegistry,
    private readonly bus: MessageBus,
    private readonly workspace: string,
  ) {}

  /** Returns at once; the result arrives later as a system-channel inbound message addressed to the origin. */
  async spawn(input: SpawnRequest): Promise<string> {
    const taskId = nanoid(8);
    const label = input.label || truncate(input.task, 30);
    const origin: Origin = { channel: input.originChannel, chatId: input.originChatId };

    const done = this.runSubagent(taskId, input.task, label, origin)
      .catch((err) => log.error("Subagent could not report back", { taskId, error: errorMessage(err) }))
      .finally(() => this.running.delete(taskId));
    this.running.set(taskId, { label, origin, done });

    log.info("Subagent started", { taskId, label, origin: encodeOrigin(origin) });
    return `Subagent [${label}] started (id: ${taskId}). I'll notify you when it completes.`;
  }

  private async runSubagent(taskId: string, task: string, label: string, origin: Origin): Promise<void> {
    let content: string;
    try {
      const result = await this.runner.run({
        messages: [
          { role: "system", content: this.buildSubagentPrompt() },
          { role: "user", content: task },
        ],
        tools: this.tools,
        ctx: { channel: origin.channel, chatId: origin.chatId, sessionKey: `subagent:${taskId}` },
      });
      content = this.announce(label, task, result);
      log.info("Subagent finished", { taskId, stopReason: result.stopReason, iterations: result.iterations });
    } catch (err) {
      log.error("Subagent failed", { taskId, error: errorMessage(err) });
      content = `[Subagent '${label}' failed]\n\nTask: ${task}\n\nError: ${errorMessage(err)}\n\nLet the user know the background task did not finish.`;
    }

    await this.bus.publishInbound({
      channel: SYSTEM_CHANNEL,
      senderId: "subagent",
      chatId: encodeOrigin(origin),
      content,
      metadata: { subagentId: taskId, label },
    });
  }

  private announce(label: string, task: string, result: RunResult): string {
    const status = result.stopReason === "completed"
      ? "completed successfully"
      : result.stopReason === "error" ? "failed" : "stopped at its iteration limit";
    const body = result.finalContent || "Task completed but no final response was generated.";
    return `[Subagent '${label}' ${status}]\n\nTask: ${task}\n\nResult:\n${body}\n\nSummarize this naturally for the user. Keep it brief (1-2 sentences).`;
  }

  private buildSubagentPrompt(): string {
    return [
      "# Subagent",
      `Current Time: ${new Date().toISOString()}`,
      "You are a subagent spawned by the main agent to complete a specific task. Stay focused and concise.",
      "You can read and write files, run shell commands and search or fetch from the web.",
      "You cannot message the user or spawn further subagents; your final answer is reported back for you.",
      `Workspace: ${this.workspace}`,
    ].join("\n\n");
  }

  getRunningCount(): number {
    return this.running.size;
  }

  /** Settles once every subagent running at call time has reported back. */
  async waitForAll(): Promise<void> {
    await Promise.all([...this.running.values()].map((t) => t.done));
  }
}
