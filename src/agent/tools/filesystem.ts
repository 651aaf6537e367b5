import fs from "node:fs";
import path from "node:path";
import { errorMessage, expandHome } from "../../utils/helpers.js";
import { stringArg, type Tool } from "./base.js";

export interface FsToolOptions {
  workspace: string;
  /** When set, paths resolving outside this directory are refused. */
  allowedDir?: string;
}

function resolvePath(input: string, options: FsToolOptions): string {
  const expanded = expandHome(input);
  const resolved = path.resolve(path.isAbsolute(expanded) ? expanded : path.join(options.workspace, expanded));
  if (options.allowedDir) {
    const allow = path.resolve(options.allowedDir);
    if (resolved !== allow && !resolved.startsWith(allow + path.sep)) throw new Error(`Path ${input} is outside allowed directory ${options.allowedDir}`);
  }
  return resolved;
}

export class ReadFileTool implements Tool {
  readonly name = "read_file";
  readonly description = "Read the contents of a file at the given path.";
  readonly parameters = { type: "object", properties: { path: { type: "string", description: "The file path to read" } }, required: ["path"] };
  constructor(private readonly options: FsToolOptions) {}

  async execute(args: Record<string, unknown>): Promise<string> {
    const raw = stringArg(args, "path") ?? "";
    try {
      const p = resolvePath(raw, this.options);
      if (!fs.existsSync(p)) return `Error: File not found: ${raw}`;
      if (!fs.statSync(p).isFile()) return `Error: Not a file: ${raw}`;
      return await fs.promises.readFile(p, "utf8");
    } catch (err) {
      return `Error reading file: ${errorMessage(err)}`;
    }
  }
}

export class WriteFileTool implements Tool {
  readonly name = "write_file";
  readonly description = "Write content to a file at the given path. Creates parent directories if needed.";
  readonly parameters = { type: "object", properties: { path: { type: "string" }, content: { type: "string" } }, required: ["path", "content"] };
  constructor(private readonly options: FsToolOptions) {}

  async execute(args: Record<string, unknown>): Promise<string> {
    try {
      const p = resolvePath(stringArg(args, "path") ?? "", this.options);
      const content = stringArg(args, "content") ?? "";
      await fs.promises.mkdir(path.dirname(p), { recursive: true });
      await fs.promises.writeFile(p, content, "utf8");
      return `Successfully wrote ${Buffer.byteLength(content)} bytes to ${p}`;
    } catch (err) {
      return `Error writing file: ${errorMessage(err)}`;
    }
  }
}

export class EditFileTool implements Tool {
  readonly name = "edit_file";
  readonly description = "Edit a file by replacing old_text with new_text. The old_text must appear exactly once in the file.";
  readonly parameters = { type: "object", properties: { path: { type: "string" }, old_text: { type: "string", minLength: 1 }, new_text: { type: "string" } }, required: ["path", "old_text", "new_text"] };
  constructor(private readonly options: FsToolOptions) {}

  async execute(args: Record<string, unknown>): Promise<string> {
    const raw = stringArg(args, "path") ?? "";
    try {
      const p = resolvePath(raw, this.options);
      if (!fs.existsSync(p)) return `Error: File not found: ${raw}`;
      const content = await fs.promises.readFile(p, "utf8");
      const oldText = stringArg(args, "old_text") ?? "";
      const newText = stringArg(args, "new_text") ?? "";
      const count = content.split(oldText).length - 1;
      if (count === 0) return `Error: old_text not found in ${raw}. Verify the file content.`;
      if (count > 1) return `Error: old_text appears ${count} times in ${raw}. Provide more context to make it unique.`;
      await fs.promises.writeFile(p, content.replace(oldText, () => newText), "utf8");
      return `Successfully edited ${p}`;
    } catch (err) {
      return `Error editing file: ${errorMessage(err)}`;
    }
  }
}

export class ListDirTool implements Tool {
  readonly name = "list_dir";
  readonly description = "List the contents of a directory.";
  readonly parameters = { type: "object", properties: { path: { type: "string" } }, required: ["path"] };
  constructor(private readonly options: FsToolOptions) {}

  async execute(args: Record<string, unknown>): Promise<string> {
    const raw = stringArg(args, "path") ?? "";
    try {
      const p = resolvePath(raw, this.options);
      if (!fs.existsSync(p)) return `Error: Directory not found: ${raw}`;
      if (!fs.statSync(p).isDirectory()) return `Error: Not a directory: ${raw}`;
      const entries = await fs.promises.readdir(p, { withFileTypes: true });
      if (!entries.length) return `Directory ${raw} is empty`;
      return entries
        .sort((a, b) => a.name.localeCompare(b.name))
        .map((e) => `${e.isDirectory() ? "[DIR]" : "[FILE]"} ${e.name}`)
        .join("\n");
    } catch (err) {
      return `Error listing directory: ${errorMessage(err)}`;
    }
  }
}

export function fileTools(options: FsToolOptions): Tool[] {
  return [new ReadFileTool(options), new WriteFileTool(options), new EditFileTool(options), new ListDirTool(options)];
}
