import { exec } from "node:child_process";
import path from "node:path";
import { promisify } from "node:util";
import { isRecord } from "../../utils/helpers.js";
import { stringArg, type Tool } from "./base.js";

const execAsync = promisify(exec);

const OUTPUT_MAX_CHARS = 10000;

const DENY_PATTERNS = [
  /\brm\s+-[rf]{1,2}\b/,
  /\bdel\s+\/[fq]\b/,
  /\brmdir\s+\/s\b/,
  /(?:^|[;&|]\s*)format\b/,
  /\b(mkfs|diskpart)\b/,
  /\bdd\s+if=/,
  />\s*\/dev\/sd/,
  /\b(shutdown|reboot|poweroff)\b/,
  /:\(\)\s*\{.*\};\s*:/,
];

interface ExecFailure {
  killed: boolean;
  code: number | null;
  stdout: string;
  stderr: string;
}

function describeFailure(err: unknown): ExecFailure {
  if (!isRecord(err)) return { killed: false, code: null, stdout: "", stderr: "" };
  return {
    killed: err.killed === true,
    code: typeof err.code === "number" ? err.code : null,
    stdout: typeof err.stdout === "string" ? err.stdout : "",
    stderr: typeof err.stderr === "string" ? err.stderr : "",
  };
}

export interface ExecToolOptions {
  /** Seconds. */
  timeout: number;
  workingDir: string;
  restrictToWorkspace: boolean;
  pathAppend: string;
}

export class ExecTool implements Tool {
  readonly name = "exec";
  readonly description = "Execute a shell command and return its output. Use with caution.";
  readonly parameters = {
    type: "object",
    properties: {
      command: { type: "string", description: "The shell command to execute", minLength: 1 },
      working_dir: { type: "string", description: "Optional working directory for the command" },
    },
    required: ["command"],
  };

  constructor(private readonly options: ExecToolOptions) {}

  guard(command: string, cwd: string): string | null {
    const lower = command.toLowerCase();
    if (DENY_PATTERNS.some((r) => r.test(lower))) return "Error: Command blocked by safety guard (dangerous pattern detected)";
    if (!this.options.restrictToWorkspace) return null;
    if (command.includes("../") || command.includes("..\\")) return "Error: Command blocked by safety guard (path traversal detected)";
    const root = path.resolve(this.options.workingDir);
    const inside = (p: string) => {
      const resolved = path.resolve(p);
      return resolved === root || resolved.startsWith(root + path.sep);
    };
    const absolute = command.match(/[A-Za-z]:\\[^\s"']+|(?<=^|\s)\/[^\s"']+/g) ?? [];
    for (const raw of absolute) {
      if (!inside(raw)) return "Error: Command blocked by safety guard (path outside working dir)";
    }
    if (!inside(cwd)) return "Error: Command blocked by safety guard (working dir outside workspace)";
    return null;
  }

  async execute(args: Record<string, unknown>): Promise<string> {
    const command = stringArg(args, "command") ?? "";
    const cwd = stringArg(args, "working_dir") ?? this.options.workingDir;
    const blocked = this.guard(command, cwd);
    if (blocked) return blocked;

    const env: NodeJS.ProcessEnv = { ...process.env };
    if (this.options.pathAppend) env.PATH = `${env.PATH ?? ""}${path.delimiter}${this.options.pathAppend}`;

    try {
      const { stdout, stderr } = await execAsync(command, { cwd, env, timeout: this.options.timeout * 1000, maxBuffer: 1024 * 1024 });
      let out = stdout;
      if (stderr.trim()) out += `${out ? "\n" : ""}STDERR:\n${stderr}`;
      if (!out) out = "(no output)";
      if (out.length > OUTPUT_MAX_CHARS) out = `${out.slice(0, OUTPUT_MAX_CHARS)}\n... (truncated, ${out.length - OUTPUT_MAX_CHARS} more chars)`;
      return out;
    } catch (err) {
      const failure = describeFailure(err);
      if (failure.killed) return `Error: Command timed out after ${this.options.timeout} seconds`;
      const text = [
        failure.stdout,
        failure.stderr ? `STDERR:\n${failure.stderr}` : "",
        failure.code !== null ? `Exit code: ${failure.code}` : "",
      ].filter(Boolean).join("\n").trim();
      return text || `Error executing command: ${String(err)}`;
    }
  }
}
