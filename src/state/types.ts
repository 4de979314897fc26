import type { ThemeModeSetting } from "../config.js";

export const SESSION_VERSION = 1;

export interface WindowGeometry {
  width: number;
  height: number;
  maximized: boolean;
  x: number | null;
  y: number | null;
}

export interface TabState {
  tabId: string;                 // stable for the tab's lifetime, also names its autosave
  filePath: string | null;       // null for an untitled buffer
  cursorOffset: number;
  scrollOffset: number;
  dirty: boolean;                // cleared only by an explicit save
  autosaveId: string | null;     // set while an autosave record exists
  showLineNumbers: boolean;
}

export interface SessionState {
  version: number;
  tabs: TabState[];              // display order
  activeTabIndex: number;
  windowGeometry: WindowGeometry;
  themeMode: ThemeModeSetting;
  /** True only when written by an orderly shutdown with no dirty tabs. */
  cleanShutdown: boolean;
}

export function defaultGeometry(): WindowGeometry {
  return { width: 800, height: 600, maximized: false, x: null, y: null };
}

export function defaultSession(): SessionState {
  return {
    version: SESSION_VERSION,
    tabs: [],
    activeTabIndex: 0,
    windowGeometry: defaultGeometry(),
    themeMode: "live",
    cleanShutdown: true,
  };
}
