import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { fileURLToPath } from "node:url";

export function ensureDir(dir: string): string {
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function getDataPath(): string {
  return ensureDir(path.join(os.homedir(), ".switchyard"));
}

export function expandHome(p: string): string {
  return p.replace(/^~(?=$|[\\/])/, os.homedir());
}

export function getWorkspacePath(workspace?: string): string {
  const p = workspace ? expandHome(workspace) : path.join(os.homedir(), ".switchyard", "workspace");
  return ensureDir(path.resolve(p));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

export function truncate(text: string, max: number, suffix = "..."): string {
  return text.length > max ? `${text.slice(0, max)}${suffix}` : text;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function nowIso(): string {
  return new Date().toISOString();
}

export const WORKSPACE_TEMPLATES = ["AGENTS.md", "SOUL.md", "USER.md", "TOOLS.md"];

/** Both from src/utils and from dist/utils. */
function templatesDir(): string | null {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [path.resolve(here, "../templates"), path.resolve(here, "../../src/templates")];
  return candidates.find((p) => fs.existsSync(path.join(p, "AGENTS.md"))) ?? null;
}

/** Copies missing bootstrap files into the workspace; existing files are left alone. Returns the names created. */
export function syncWorkspaceTemplates(workspace: string, sourceDir: string | null = templatesDir()): string[] {
  if (!sourceDir) return [];
  ensureDir(workspace);
  const created: string[] = [];
  for (const name of WORKSPACE_TEMPLATES) {
    const src = path.join(sourceDir, name);
    const dest = path.join(workspace, name);
    if (fs.existsSync(dest) || !fs.existsSync(src)) continue;
    fs.copyFileSync(src, dest);
    created.push(name);
  }
  return created;
}
