import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import { PersistenceError, StateCorruptError } from "../errors.js";
import { silentLogger } from "../log.js";
import { writeFileAtomic } from "../state/atomic.js";
import { createTab, openTab, setGeometry, updateTab } from "../state/session.js";
import { StateStore, decodeSession, encodeSession } from "../state/store.js";
import { defaultSession } from "../state/types.js";
import type { SessionState } from "../state/types.js";

function sessionWith(paths: Array<string | null>): SessionState {
  let session = defaultSession();
  paths.forEach((filePath, i) => {
    session = openTab(session, createTab({ tabId: `tab-${i}`, filePath, cursorOffset: i * 10, showLineNumbers: i % 2 === 0 }));
  });
  return session;
}

function writeJson(path: string, doc: unknown) {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, typeof doc === "string" ? doc : JSON.stringify(doc));
}

describe("decodeSession", () => {
  it("rejects truncated JSON", () => {
    const text = encodeSession(sessionWith(["/a.md"])).slice(0, 40);
    expect(() => decodeSession(text)).toThrow(StateCorruptError);
  });

  it("rejects a field of the wrong type", () => {
    const doc = { version: 1, tabs: [{ tabId: "a", cursorOffset: "twelve" }] };
    expect(() => decodeSession(JSON.stringify(doc))).toThrow(StateCorruptError);
  });

  it("rejects a document that is not an object", () => {
    expect(() => decodeSession("[1, 2]")).toThrow("state file corrupt: state.json: not an object");
  });

  it("fills missing fields with defaults and drops unknown ones", () => {
    const doc = { version: 1, tabs: [{ tabId: "a", futureField: 1 }], somethingNew: true };
    const { session } = decodeSession(JSON.stringify(doc));
    expect(session).toEqual({
      ...defaultSession(),
      tabs: [createTab({ tabId: "a" })],
    });
  });

  it("clamps an active index past the last tab", () => {
    const doc = { version: 1, tabs: [{ tabId: "a" }, { tabId: "b" }], activeTabIndex: 7 };
    expect(decodeSession(JSON.stringify(doc)).session.activeTabIndex).toBe(1);
  });

  it("reads a single-file legacy document", () => {
    const { session, legacyBuffers } = decodeSession(JSON.stringify({ path: "/notes/todo.md" }));
    expect(session.tabs).toHaveLength(1);
    expect(session.tabs[0]).toMatchObject({ filePath: "/notes/todo.md", dirty: false, autosaveId: null });
    expect(session.cleanShutdown).toBe(true);
    expect(legacyBuffers.size).toBe(0);
  });

  it("reads legacy snake_case tabs and keeps their unsaved buffers", () => {
    const doc = {
      tabs: [
        { file_path: "/notes/a.md", show_line_numbers: true, cursor_line: 4, cursor_col: 2 },
        { file_path: null, unsaved_content: "draft text" },
      ],
      active_tab_index: 1,
      geometry: { width: 1024, maximized: true },
    };
    const { session, legacyBuffers } = decodeSession(JSON.stringify(doc));
    expect(session.tabs.map((t) => [t.filePath, t.dirty, t.showLineNumbers])).toEqual([
      ["/notes/a.md", false, true],
      [null, true, false],
    ]);
    expect(session.tabs[0].cursorOffset).toBe(0);
    expect(session.activeTabIndex).toBe(1);
    expect(session.windowGeometry).toEqual({ width: 1024, height: 600, maximized: true, x: null, y: null });
    expect(session.cleanShutdown).toBe(false);
    expect([...legacyBuffers.entries()]).toEqual([[session.tabs[1].tabId, "draft text"]]);
  });
});

describe("StateStore on disk", () => {
  let tmpDir: string;
  let stateFile: string;
  let legacyFile: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "omnote-store-test-"));
    stateFile = join(tmpDir, "omnote", "state.json");
    legacyFile = join(tmpDir, "micropad", "state.json");
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function store(): StateStore {
    return new StateStore({ stateFile, legacyStateFile: legacyFile, logger: silentLogger() });
  }

  it.each<[string, Array<string | null>]>([
    ["no tabs", []],
    ["one untitled tab", [null]],
    ["several tabs with unicode paths", ["/home/zoë/notes/日記.md", null, "/tmp/naïve café.txt"]],
  ])("round-trips a session with %s", async (_label, paths) => {
    const session = { ...sessionWith(paths), cleanShutdown: true };
    await store().save(session);
    expect(await store().load()).toEqual(session);
  });

  it("loads back what the reducers produce from out-of-range input", async () => {
    let session = sessionWith(["/notes/a.md"]);
    session = setGeometry(session, { width: 0, height: 599.6, x: 10.4 });
    session = updateTab(session, "tab-0", { cursorOffset: 2.5, scrollOffset: Number.NaN });
    await store().save(session);

    const loaded = await store().load();
    expect(loaded).toEqual(session);
    expect(loaded.windowGeometry).toEqual({ width: 1, height: 600, maximized: false, x: 10, y: null });
    expect(loaded.tabs[0]).toMatchObject({ cursorOffset: 3, scrollOffset: 0 });
  });

  it("writes pretty JSON ending in a newline", async () => {
    await store().save(defaultSession());
    const text = readFileSync(stateFile, "utf-8");
    expect(text.endsWith("}\n")).toBe(true);
    expect(text.split("\n")[1]).toBe('  "version": 1,');
  });

  it("returns the default session when nothing is on disk", async () => {
    expect(await store().load()).toEqual(defaultSession());
  });

  it("returns the default session for a corrupt file", async () => {
    writeJson(stateFile, '{"version": 1, "tabs": [');
    expect(await store().load()).toEqual(defaultSession());
  });

  it("copies a legacy state file forward and leaves the old one alone", async () => {
    writeJson(legacyFile, { path: "/notes/todo.md" });
    const session = await store().load();
    expect(session.tabs[0].filePath).toBe("/notes/todo.md");

    const migrated = decodeSession(readFileSync(stateFile, "utf-8")).session;
    expect(migrated).toEqual(session);
    expect(JSON.parse(readFileSync(legacyFile, "utf-8"))).toEqual({ path: "/notes/todo.md" });
  });

  it("prefers the current file over a legacy one", async () => {
    await store().save(sessionWith(["/current.md"]));
    writeJson(legacyFile, { path: "/legacy.md" });
    const session = await store().load();
    expect(session.tabs.map((t) => t.filePath)).toEqual(["/current.md"]);
  });

  it("falls back to legacy without overwriting a corrupt current file", async () => {
    writeJson(stateFile, "not json");
    writeJson(legacyFile, { path: "/legacy.md" });
    const session = await store().load();
    expect(session.tabs.map((t) => t.filePath)).toEqual(["/legacy.md"]);
    expect(readFileSync(stateFile, "utf-8")).toBe("not json");
  });
});

describe("StateStore writes", () => {
  it("coalesces saves issued while a write is in progress", async () => {
    const written: number[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const store = new StateStore({
      stateFile: "/unused/state.json",
      logger: silentLogger(),
      writeFile: async (_path, data) => {
        written.push(decodeSession(data).session.tabs.length);
        if (written.length === 1) await gate;
      },
    });

    const first = store.save(sessionWith([]));
    const second = store.save(sessionWith([null]));
    const third = store.save(sessionWith([null, null]));
    release();
    await Promise.all([first, second, third]);

    expect(written).toEqual([0, 2]);
  });

  it("reports a failed write and writes the next save", async () => {
    const attempts: number[] = [];
    const store = new StateStore({
      stateFile: "/unused/state.json",
      logger: silentLogger(),
      writeFile: async (_path, data) => {
        attempts.push(decodeSession(data).session.tabs.length);
        if (attempts.length === 1) throw new Error("ENOSPC");
      },
    });

    await expect(store.save(sessionWith([null]))).rejects.toBeInstanceOf(PersistenceError);
    await store.save(sessionWith([null, null]));
    await store.flush();
    expect(attempts).toEqual([1, 2]);
  });

  it("retries the failed state when saved again unchanged", async () => {
    const attempts: number[] = [];
    const store = new StateStore({
      stateFile: "/unused/state.json",
      logger: silentLogger(),
      writeFile: async (_path, data) => {
        attempts.push(decodeSession(data).session.tabs.length);
        if (attempts.length === 1) throw new Error("EACCES");
      },
    });
    const session = sessionWith([null]);

    await expect(store.save(session)).rejects.toThrow("write failed: /unused/state.json: EACCES");
    await store.save(session);
    expect(attempts).toEqual([1, 1]);
  });
});

describe("writeFileAtomic", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "omnote-atomic-test-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("creates missing directories and leaves no temp files", async () => {
    const target = join(tmpDir, "a", "b", "state.json");
    await writeFileAtomic(target, "one");
    await writeFileAtomic(target, "two");
    expect(readFileSync(target, "utf-8")).toBe("two");
    expect(readdirSync(dirname(target))).toEqual(["state.json"]);
  });
});
