import type { SubagentManager } from "../subagent.js";
import { stringArg, type Tool, type ToolContext } from "./base.js";

export class SpawnTool implements Tool {
  readonly name = "spawn";
  readonly description = "Spawn a subagent to handle a task in the background. Its result is reported back into this conversation when it finishes.";
  readonly parameters = {
    type: "object",
    properties: {
      task: { type: "string", description: "The task for the subagent to complete", minLength: 1 },
      label: { type: "string", description: "Optional short label" },
    },
    required: ["task"],
  };

  constructor(private readonly manager: SubagentManager) {}

  async execute(args: Record<string, unknown>, ctx: ToolContext): Promise<string> {
    return this.manager.spawn({
      task: stringArg(args, "task") ?? "",
      label: stringArg(args, "label") ?? null,
      originChannel: ctx.channel,
      originChatId: ctx.chatId,
    });
  }
}
