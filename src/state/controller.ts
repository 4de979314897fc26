import type { ThemeModeSetting } from "../config.js";
import { PersistenceError } from "../errors.js";
import type { Logger } from "../log.js";
import type { AutosaveManager } from "../autosave/manager.js";
import * as ops from "./session.js";
import type { OpenTabOpts, TabPatch } from "./session.js";
import type { StateStore } from "./store.js";
import type { SessionState, TabState, WindowGeometry } from "./types.js";

export interface SessionControllerOptions {
  store: StateStore;
  autosave: AutosaveManager;
  session: SessionState;
  logger: Logger;
  saveIntervalMs: number;
  onWarning?: (err: PersistenceError) => void;
}

export type SessionListener = (session: SessionState) => void;

/**
 * Applies tab events to the session. Structural changes are saved right
 * away; cursor and scroll moves ride along with the periodic save.
 */
export class SessionController {
  private readonly store: StateStore;
  private readonly autosave: AutosaveManager;
  private readonly logger: Logger;
  private readonly saveIntervalMs: number;
  private readonly onWarning: ((err: PersistenceError) => void) | undefined;
  private readonly listeners = new Set<SessionListener>();
  private state: SessionState;
  private timer: ReturnType<typeof setInterval> | null = null;
  private unsaved = false;
  private closed = false;

  constructor(options: SessionControllerOptions) {
    this.store = options.store;
    this.autosave = options.autosave;
    this.logger = options.logger;
    this.saveIntervalMs = options.saveIntervalMs;
    this.onWarning = options.onWarning;
    // Until shutdown says otherwise, a crash is assumed.
    this.state = { ...options.session, cleanShutdown: false };
  }

  get session(): SessionState {
    return this.state;
  }

  subscribe(fn: SessionListener): () => void {
    this.listeners.add(fn);
    return () => {
      this.listeners.delete(fn);
    };
  }

  /** Persist the session as running and start the periodic save. */
  async start(): Promise<void> {
    if (this.timer) return;
    this.timer = setInterval(() => {
      if (this.unsaved) void this.persist();
    }, this.saveIntervalMs);
    this.timer.unref?.();
    await this.persist();
  }

  // -- tab events -----------------------------------------------------------

  openTab(opts: OpenTabOpts = {}): TabState {
    const tab = ops.createTab(opts);
    this.commit(ops.openTab(this.state, tab), true);
    return tab;
  }

  /** Close a tab. A dirty tab keeps its autosave record for recovery. */
  async closeTab(tabId: string): Promise<void> {
    const tab = ops.findTab(this.state, tabId);
    if (!tab) return;
    await this.autosave.closeTab(tabId, { dirty: tab.dirty });
    this.commit(ops.closeTab(this.state, tabId), true);
  }

  /** The buffer changed. Marks the tab dirty and hands the text to autosave. */
  edit(tabId: string, content: string): void {
    const tab = ops.findTab(this.state, tabId);
    if (!tab) return;
    this.autosave.recordEdit(tabId, content, tab.filePath);
    // Becoming dirty is structural: recovery depends on it being on disk.
    if (!tab.dirty) this.commit(ops.markDirty(this.state, tabId), true);
  }

  /** The buffer was written to `filePath` by the editor. */
  async markSaved(tabId: string, filePath?: string): Promise<void> {
    if (!ops.findTab(this.state, tabId)) return;
    this.commit(ops.markSaved(this.state, tabId, filePath), true);
    await this.autosave.markSaved(tabId);
  }

  /** Record that an autosave now exists for the tab. */
  noteAutosaved(tabId: string): void {
    if (!ops.findTab(this.state, tabId)?.dirty) return;
    this.commit(ops.setAutosaveId(this.state, tabId, tabId), false);
  }

  updateTab(tabId: string, patch: TabPatch): void {
    this.commit(ops.updateTab(this.state, tabId, patch), false);
  }

  setActiveTab(index: number): void {
    this.commit(ops.setActiveTab(this.state, index), false);
  }

  moveTab(from: number, to: number): void {
    this.commit(ops.moveTab(this.state, from, to), true);
  }

  setGeometry(geometry: Partial<WindowGeometry>): void {
    this.commit(ops.setGeometry(this.state, geometry), true);
  }

  setThemeMode(mode: ThemeModeSetting): void {
    this.commit(ops.setThemeMode(this.state, mode), true);
  }

  // -- persistence ----------------------------------------------------------

  private commit(next: SessionState, structural: boolean): void {
    if (next === this.state || this.closed) return;
    this.state = next;
    this.unsaved = true;
    for (const fn of this.listeners) fn(next);
    if (structural) void this.persist();
  }

  /** Save now. Failures are logged and reported, never thrown. */
  async persist(): Promise<void> {
    this.unsaved = false;
    try {
      await this.store.save(this.state);
    } catch (err) {
      this.unsaved = true;
      // StateStore already logged it.
      if (err instanceof PersistenceError) this.onWarning?.(err);
      else this.logger.error({ err }, "session save failed");
    }
  }

  /**
   * Orderly exit: flush autosave, then write the session marked clean when
   * nothing is left unsaved.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.timer) clearInterval(this.timer);
    this.timer = null;

    await this.autosave.stop();
    this.state = { ...this.state, cleanShutdown: !ops.hasDirtyTabs(this.state) };
    await this.persist();
    await this.store.flush();
    this.logger.info({ tabs: this.state.tabs.length, clean: this.state.cleanShutdown }, "session closed");
  }
}
