import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AutosaveManager } from "../autosave/manager.js";
import { PersistenceError } from "../errors.js";
import { silentLogger } from "../log.js";
import { SessionController } from "../state/controller.js";
import { StateStore, decodeSession } from "../state/store.js";
import { defaultSession } from "../state/types.js";
import type { SessionState } from "../state/types.js";
import { MemoryCache } from "./memory-cache.js";

async function settle(): Promise<void> {
  for (let i = 0; i < 50; i++) await Promise.resolve();
}

describe("SessionController", () => {
  let saved: SessionState[];
  let failSaves: number;
  let cache: MemoryCache;
  let autosave: AutosaveManager;
  let warnings: PersistenceError[];
  let controller: SessionController;

  function build(session: SessionState = defaultSession()) {
    const store = new StateStore({
      stateFile: "/unused/state.json",
      logger: silentLogger(),
      writeFile: async (_path, data) => {
        if (failSaves > 0) {
          failSaves -= 1;
          throw new Error("EROFS");
        }
        saved.push(decodeSession(data).session);
      },
    });
    autosave = new AutosaveManager({ cache, idleMs: 1000, maxLatencyMs: 5000, logger: silentLogger() });
    controller = new SessionController({
      store,
      autosave,
      session,
      logger: silentLogger(),
      saveIntervalMs: 30_000,
      onWarning: (err) => warnings.push(err),
    });
  }

  const lastSaved = () => saved[saved.length - 1];

  beforeEach(() => {
    saved = [];
    failSaves = 0;
    cache = new MemoryCache();
    warnings = [];
    build();
  });

  afterEach(async () => {
    await controller.shutdown();
    vi.useRealTimers();
  });

  it("marks the running session as not cleanly shut down", async () => {
    build({ ...defaultSession(), cleanShutdown: true });
    expect(controller.session.cleanShutdown).toBe(false);
    await controller.start();
    expect(lastSaved().cleanShutdown).toBe(false);
  });

  it("saves structural changes right away and notifies listeners", async () => {
    const seen: number[] = [];
    controller.subscribe((s) => seen.push(s.tabs.length));
    const tab = controller.openTab({ filePath: "/notes/a.md" });
    await settle();

    expect(seen).toEqual([1]);
    expect(lastSaved().tabs.map((t) => t.tabId)).toEqual([tab.tabId]);
  });

  it("saves cursor moves only with the periodic save", async () => {
    vi.useFakeTimers();
    build();
    const tab = controller.openTab();
    await controller.start();
    const before = saved.length;

    controller.updateTab(tab.tabId, { cursorOffset: 42 });
    await settle();
    expect(saved).toHaveLength(before);

    vi.advanceTimersByTime(30_000);
    await settle();
    expect(lastSaved().tabs[0].cursorOffset).toBe(42);
  });

  it("persists a tab becoming dirty and autosaves its text", async () => {
    const tab = controller.openTab({ filePath: "/notes/a.md" });
    controller.edit(tab.tabId, "changed");
    await settle();
    expect(lastSaved().tabs[0].dirty).toBe(true);

    await autosave.flush(tab.tabId);
    expect(cache.records.get(tab.tabId)?.filePath).toBe("/notes/a.md");

    controller.noteAutosaved(tab.tabId);
    expect(controller.session.tabs[0].autosaveId).toBe(tab.tabId);
  });

  it("ignores edits to unknown tabs", () => {
    controller.edit("nope", "text");
    expect(autosave.pendingTabs).toEqual([]);
  });

  it("clears dirty state and the autosave record on save", async () => {
    const tab = controller.openTab();
    controller.edit(tab.tabId, "draft");
    await autosave.flush(tab.tabId);
    await controller.markSaved(tab.tabId, "/notes/new.md");
    await settle();

    expect(controller.session.tabs[0]).toMatchObject({ dirty: false, filePath: "/notes/new.md", autosaveId: null });
    expect(cache.records.size).toBe(0);
  });

  it("does not record an autosave for a clean tab", () => {
    const tab = controller.openTab();
    controller.noteAutosaved(tab.tabId);
    expect(controller.session.tabs[0].autosaveId).toBeNull();
  });

  it("keeps the autosave of a dirty tab it closes", async () => {
    const tab = controller.openTab();
    controller.edit(tab.tabId, "unsaved");
    await controller.closeTab(tab.tabId);
    expect(controller.session.tabs).toEqual([]);
    expect(cache.records.has(tab.tabId)).toBe(true);
  });

  it("drops the autosave of a clean tab it closes", async () => {
    const tab = controller.openTab();
    cache.seed(tab.tabId, "stale", 1);
    await controller.closeTab(tab.tabId);
    expect(cache.records.size).toBe(0);
  });

  it("writes a clean shutdown when nothing is dirty", async () => {
    controller.openTab({ filePath: "/notes/a.md" });
    await controller.shutdown();
    expect(lastSaved().cleanShutdown).toBe(true);
  });

  it("flushes autosave and leaves the shutdown unclean when tabs are dirty", async () => {
    const tab = controller.openTab();
    controller.edit(tab.tabId, "unsaved");
    await controller.shutdown();
    expect(lastSaved().cleanShutdown).toBe(false);
    expect(cache.writes.map((w) => w.content)).toEqual(["unsaved"]);
  });

  it("ignores changes after shutdown", async () => {
    await controller.shutdown();
    controller.openTab();
    expect(controller.session.tabs).toEqual([]);
  });

  it("reports a failed save as a warning and keeps going", async () => {
    failSaves = 1;
    controller.openTab();
    await settle();
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toBeInstanceOf(PersistenceError);

    controller.setGeometry({ width: 1024 });
    await settle();
    expect(lastSaved().windowGeometry.width).toBe(1024);
  });
});
