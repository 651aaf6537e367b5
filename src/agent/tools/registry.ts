import type { ToolDefinition } from "../../providers/base.js";
import { errorMessage } from "../../utils/helpers.js";
import { createLogger } from "../../utils/logger.js";
import { toDefinition, validateParams, type Tool, type ToolContext } from "./base.js";

const log = createLogger("tools");

export const RETRY_HINT = "\n\n[Analyze the error above and try a different approach.]";

export class ToolRegistry {
  private tools = new Map<string, Tool>();

  /** Re-registering a name replaces the earlier tool but keeps its position. */
  register(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getDefinitions(): ToolDefinition[] {
    return [...this.tools.values()].map(toDefinition);
  }

  get toolNames(): string[] {
    return [...this.tools.keys()];
  }

  /** Never throws: unknown names, bad arguments and tool failures all come back as text. */
  async execute(name: string, params: Record<string, unknown>, ctx: ToolContext): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) return `Error: Unknown tool '${name}'. Available: ${this.toolNames.join(", ")}`;
    try {
      const errors = validateParams(tool, params);
      if (errors.length) return `Error: Invalid parameters for tool '${name}': ${errors.join("; ")}${RETRY_HINT}`;
      log.debug("Executing tool", { name, session: ctx.sessionKey });
      const result = await tool.execute(params, ctx);
      if (result.startsWith("Error")) return result + RETRY_HINT;
      return result;
    } catch (err) {
      log.warn("Tool raised", { name, error: errorMessage(err) });
      return `Error executing ${name}: ${errorMessage(err)}${RETRY_HINT}`;
    }
  }
}
