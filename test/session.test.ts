import fs from "node:fs";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { Session, SessionManager } from "../src/session/manager.js";
import { tempDir } from "./fakes.js";

describe("session", () => {
  test("history window opens on a user turn", () => {
    const session = new Session("cli:direct");
    session.append("user", "one");
    session.append("assistant", "two");
    session.append("user", "three");
    session.append("assistant", "four");

    expect(session.getHistory(3)).toEqual([
      { role: "user", content: "three" },
      { role: "assistant", content: "four" },
    ]);
    expect(session.getHistory(4)).toHaveLength(4);
    expect(session.getHistory(0)).toEqual([]);
  });

  test("tools used are kept only when there were some", () => {
    const session = new Session("cli:direct");
    session.append("assistant", "plain");
    session.append("assistant", "busy", ["exec"]);
    expect(session.turns[0].toolsUsed).toBeUndefined();
    expect(session.turns[1].toolsUsed).toEqual(["exec"]);
  });
});

describe("session manager", () => {
  test("saves and reloads turns in order", () => {
    const workspace = tempDir();
    const manager = new SessionManager(workspace);
    const session = manager.getOrCreate("telegram:42");
    session.append("user", "hi");
    session.append("assistant", "hello", ["read_file"]);
    manager.save(session);

    const file = path.join(workspace, "sessions", "telegram%3A42.jsonl");
    expect(fs.readFileSync(file, "utf8").trim().split("\n")).toHaveLength(3);

    const reloaded = new SessionManager(workspace).getOrCreate("telegram:42");
    expect(reloaded.turns.map((t) => [t.role, t.content, t.toolsUsed])).toEqual([
      ["user", "hi", undefined],
      ["assistant", "hello", ["read_file"]],
    ]);
    expect(reloaded.createdAt).toBe(session.createdAt);
  });

  test("returns the cached session until invalidated", () => {
    const manager = new SessionManager(tempDir());
    const a = manager.getOrCreate("cli:direct");
    expect(manager.getOrCreate("cli:direct")).toBe(a);
    manager.invalidate("cli:direct");
    expect(manager.getOrCreate("cli:direct")).not.toBe(a);
  });

  test("skips malformed lines when loading", () => {
    const workspace = tempDir();
    const manager = new SessionManager(workspace);
    fs.writeFileSync(
      path.join(manager.sessionsDir, "cli%3Adirect.jsonl"),
      [
        JSON.stringify({ _type: "metadata", key: "cli:direct", createdAt: "2026-01-01T00:00:00.000Z", updatedAt: "2026-01-01T00:00:00.000Z", metadata: {} }),
        JSON.stringify({ role: "user", content: "kept", timestamp: "2026-01-01T00:00:00.000Z" }),
        JSON.stringify({ role: "tool", content: "dropped" }),
        "",
      ].join("\n"),
      "utf8",
    );
    const session = manager.getOrCreate("cli:direct");
    expect(session.turns.map((t) => t.content)).toEqual(["kept"]);
    expect(session.createdAt).toBe("2026-01-01T00:00:00.000Z");
  });

  test("lists saved sessions, most recently updated first", () => {
    const manager = new SessionManager(tempDir());
    const older = manager.getOrCreate("cli:a");
    older.updatedAt = "2026-01-01T00:00:00.000Z";
    manager.save(older);
    const newer = manager.getOrCreate("cli:b");
    newer.updatedAt = "2026-02-01T00:00:00.000Z";
    manager.save(newer);
    expect(manager.listSessions().map((s) => s.key)).toEqual(["cli:b", "cli:a"]);
  });

  test("keys that differ only in separators keep separate histories", () => {
    const workspace = tempDir();
    const manager = new SessionManager(workspace);
    const thread = manager.getOrCreate("slack:C1:thread");
    thread.append("user", "secret from thread");
    thread.append("assistant", "ok");
    manager.save(thread);

    const other = new SessionManager(workspace).getOrCreate("slack:C1_thread");
    expect(other.turns).toEqual([]);
    expect(new SessionManager(workspace).getOrCreate("slack:C1:thread").turns.map((t) => t.content)).toEqual(["secret from thread", "ok"]);
  });

  test("a file whose metadata names another key is treated as absent", () => {
    const workspace = tempDir();
    const manager = new SessionManager(workspace);
    fs.writeFileSync(
      path.join(manager.sessionsDir, "cli%3Adirect.jsonl"),
      [
        JSON.stringify({ _type: "metadata", key: "cli:other", createdAt: "2026-01-01T00:00:00.000Z", updatedAt: "2026-01-01T00:00:00.000Z", metadata: {} }),
        JSON.stringify({ role: "user", content: "not yours", timestamp: "2026-01-01T00:00:00.000Z" }),
      ].join("\n"),
      "utf8",
    );
    expect(manager.getOrCreate("cli:direct").turns).toEqual([]);
  });
});
