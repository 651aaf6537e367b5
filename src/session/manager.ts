import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { ChatMessage } from "../providers/base.js";
import { ensureDir, errorMessage, nowIso } from "../utils/helpers.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("session");

const SessionTurnSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
  toolsUsed: z.array(z.string()).optional(),
});

const SessionMetaSchema = z.object({
  _type: z.literal("metadata"),
  key: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  metadata: z.record(z.unknown()).default({}),
});

export type SessionTurn = z.infer<typeof SessionTurnSchema>;

export class Session {
  turns: SessionTurn[] = [];
  createdAt: string = nowIso();
  updatedAt: string = nowIso();
  metadata: Record<string, unknown> = {};

  constructor(readonly key: string) {}

  append(role: SessionTurn["role"], content: string, toolsUsed?: string[]): void {
    const turn: SessionTurn = { role, content, timestamp: nowIso() };
    if (toolsUsed?.length) turn.toolsUsed = toolsUsed;
    this.turns.push(turn);
    this.updatedAt = turn.timestamp;
  }

  /** Last `maxTurns` turns as chat messages, trimmed so the window opens on a user turn. */
  getHistory(maxTurns = 500): ChatMessage[] {
    if (maxTurns <= 0) return [];
    let window = this.turns.slice(-maxTurns);
    const firstUser = window.findIndex((t) => t.role === "user");
    if (firstUser > 0) window = window.slice(firstUser);
    return window.map((t): ChatMessage => (t.role === "user" ? { role: "user", content: t.content } : { role: "assistant", content: t.content }));
  }
}

export interface SessionStore {
  getOrCreate(key: string): Session;
  save(session: Session): void;
}

/** One JSONL file per session key, named by its URI encoding; a save rewrites the whole file through a rename. */
export class SessionManager implements SessionStore {
  readonly sessionsDir: string;
  private cache = new Map<string, Session>();

  constructor(workspace: string) {
    this.sessionsDir = ensureDir(path.join(workspace, "sessions"));
  }

  private getSessionPath(key: string): string {
    return path.join(this.sessionsDir, `${encodeURIComponent(key)}.jsonl`);
  }

  getOrCreate(key: string): Session {
    const cached = this.cache.get(key);
    if (cached) return cached;
    const session = this.load(key) ?? new Session(key);
    this.cache.set(key, session);
    return session;
  }

  save(session: Session): void {
    const p = this.getSessionPath(session.key);
    const meta = { _type: "metadata", key: session.key, createdAt: session.createdAt, updatedAt: session.updatedAt, metadata: session.metadata };
    const lines = [JSON.stringify(meta), ...session.turns.map((t) => JSON.stringify(t))];
    const tmp = `${p}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, `${lines.join("\n")}\n`, "utf8");
    fs.renameSync(tmp, p);
    this.cache.set(session.key, session);
  }

  invalidate(key: string): void {
    this.cache.delete(key);
  }

  listSessions(): Array<{ key: string; createdAt: string; updatedAt: string; path: string }> {
    const out: Array<{ key: string; createdAt: string; updatedAt: string; path: string }> = [];
    for (const file of fs.readdirSync(this.sessionsDir)) {
      if (!file.endsWith(".jsonl")) continue;
      const p = path.join(this.sessionsDir, file);
      try {
        const first = fs.readFileSync(p, "utf8").split(/\r?\n/, 1)[0];
        const meta = SessionMetaSchema.safeParse(JSON.parse(first));
        if (meta.success) out.push({ key: meta.data.key, createdAt: meta.data.createdAt, updatedAt: meta.data.updatedAt, path: p });
      } catch (err) {
        log.warn("Unreadable session file", { file, error: errorMessage(err) });
      }
    }
    return out.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  private load(key: string): Session | null {
    const p = this.getSessionPath(key);
    if (!fs.existsSync(p)) return null;
    try {
      const session = new Session(key);
      for (const line of fs.readFileSync(p, "utf8").split(/\r?\n/).filter(Boolean)) {
        const raw: unknown = JSON.parse(line);
        const meta = SessionMetaSchema.safeParse(raw);
        if (meta.success) {
          if (meta.data.key !== key) {
            log.warn("Session file belongs to another key, ignoring", { key, found: meta.data.key });
            return null;
          }
          session.createdAt = meta.data.createdAt;
          session.updatedAt = meta.data.updatedAt;
          session.metadata = meta.data.metadata;
          continue;
        }
        const turn = SessionTurnSchema.safeParse(raw);
        if (turn.success) session.turns.push(turn.data);
        else log.warn("Skipping malformed session line", { key });
      }
      return session;
    } catch (err) {
      log.error("Failed to load session, starting fresh", { key, error: errorMessage(err) });
      return null;
    }
  }
}
