import { randomUUID } from "node:crypto";
import type { ThemeModeSetting } from "../config.js";
import type { SessionState, TabState, WindowGeometry } from "./types.js";

export interface OpenTabOpts {
  tabId?: string;
  filePath?: string | null;
  cursorOffset?: number;
  scrollOffset?: number;
  dirty?: boolean;
  showLineNumbers?: boolean;
}

export type TabPatch = Partial<Pick<TabState, "cursorOffset" | "scrollOffset" | "showLineNumbers">>;

/** Keep an active index inside [0, tabCount); 0 for an empty session. */
export function clampActiveIndex(index: number, tabCount: number): number {
  if (tabCount === 0 || !Number.isInteger(index) || index < 0) return 0;
  return Math.min(index, tabCount - 1);
}

// Keep values within what the state file accepts on load.
function toOffset(value: number, fallback = 0): number {
  return Number.isFinite(value) ? Math.max(0, Math.round(value)) : fallback;
}

function toScroll(value: number, fallback = 0): number {
  return Number.isFinite(value) ? Math.max(0, value) : fallback;
}

function toSize(value: number, fallback: number): number {
  return Number.isFinite(value) ? Math.max(1, Math.round(value)) : fallback;
}

function toCoordinate(value: number | null, fallback: number | null): number | null {
  if (value === null) return null;
  return Number.isFinite(value) ? Math.round(value) : fallback;
}

/** Create a new TabState record (does not add it to the session). */
export function createTab(opts: OpenTabOpts = {}): TabState {
  return {
    tabId: opts.tabId ?? randomUUID(),
    filePath: opts.filePath ?? null,
    cursorOffset: toOffset(opts.cursorOffset ?? 0),
    scrollOffset: toScroll(opts.scrollOffset ?? 0),
    dirty: opts.dirty ?? false,
    autosaveId: null,
    showLineNumbers: opts.showLineNumbers ?? false,
  };
}

export function findTab(session: SessionState, tabId: string): TabState | undefined {
  return session.tabs.find((t) => t.tabId === tabId);
}

function mapTab(session: SessionState, tabId: string, fn: (tab: TabState) => TabState): SessionState {
  let changed = false;
  const tabs = session.tabs.map((t) => {
    if (t.tabId !== tabId) return t;
    changed = true;
    return fn(t);
  });
  return changed ? { ...session, tabs } : session;
}

/** Append a tab and make it active. */
export function openTab(session: SessionState, tab: TabState): SessionState {
  const tabs = [...session.tabs, tab];
  return { ...session, tabs, activeTabIndex: tabs.length - 1, cleanShutdown: false };
}

/** Remove a tab, keeping the same tab active where possible. */
export function closeTab(session: SessionState, tabId: string): SessionState {
  const index = session.tabs.findIndex((t) => t.tabId === tabId);
  if (index < 0) return session;
  const tabs = session.tabs.filter((t) => t.tabId !== tabId);
  let active = session.activeTabIndex;
  if (index < active || (index === active && active === tabs.length)) active -= 1;
  return { ...session, tabs, activeTabIndex: clampActiveIndex(active, tabs.length) };
}

export function updateTab(session: SessionState, tabId: string, patch: TabPatch): SessionState {
  return mapTab(session, tabId, (t) => ({
    ...t,
    ...patch,
    cursorOffset: toOffset(patch.cursorOffset ?? t.cursorOffset, t.cursorOffset),
    scrollOffset: toScroll(patch.scrollOffset ?? t.scrollOffset, t.scrollOffset),
  }));
}

export function markDirty(session: SessionState, tabId: string): SessionState {
  const tab = findTab(session, tabId);
  if (!tab || tab.dirty) return session;
  return { ...mapTab(session, tabId, (t) => ({ ...t, dirty: true })), cleanShutdown: false };
}

export function setAutosaveId(session: SessionState, tabId: string, autosaveId: string | null): SessionState {
  const tab = findTab(session, tabId);
  if (!tab || tab.autosaveId === autosaveId) return session;
  return mapTab(session, tabId, (t) => ({ ...t, autosaveId }));
}

/** An explicit save to `filePath` (or the tab's existing path). The only way `dirty` clears. */
export function markSaved(session: SessionState, tabId: string, filePath?: string): SessionState {
  return mapTab(session, tabId, (t) => ({
    ...t,
    filePath: filePath ?? t.filePath,
    dirty: false,
    autosaveId: null,
  }));
}

export function setActiveTab(session: SessionState, index: number): SessionState {
  const activeTabIndex = clampActiveIndex(index, session.tabs.length);
  if (activeTabIndex === session.activeTabIndex) return session;
  return { ...session, activeTabIndex };
}

/** Reorder a tab; the active tab follows the move. */
export function moveTab(session: SessionState, from: number, to: number): SessionState {
  const count = session.tabs.length;
  if (from < 0 || from >= count || from === to) return session;
  const target = Math.max(0, Math.min(to, count - 1));
  const tabs = [...session.tabs];
  const [tab] = tabs.splice(from, 1);
  tabs.splice(target, 0, tab);
  const activeId = session.tabs[session.activeTabIndex]?.tabId;
  const activeTabIndex = Math.max(0, tabs.findIndex((t) => t.tabId === activeId));
  return { ...session, tabs, activeTabIndex };
}

export function setGeometry(session: SessionState, geometry: Partial<WindowGeometry>): SessionState {
  const current = session.windowGeometry;
  const windowGeometry: WindowGeometry = {
    width: toSize(geometry.width ?? current.width, current.width),
    height: toSize(geometry.height ?? current.height, current.height),
    maximized: geometry.maximized ?? current.maximized,
    x: geometry.x === undefined ? current.x : toCoordinate(geometry.x, current.x),
    y: geometry.y === undefined ? current.y : toCoordinate(geometry.y, current.y),
  };
  return { ...session, windowGeometry };
}

export function setThemeMode(session: SessionState, themeMode: ThemeModeSetting): SessionState {
  if (session.themeMode === themeMode) return session;
  return { ...session, themeMode };
}

export function hasDirtyTabs(session: SessionState): boolean {
  return session.tabs.some((t) => t.dirty);
}
