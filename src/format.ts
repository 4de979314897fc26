import { basename } from "node:path";
import type { RecoveryPlan } from "./autosave/recovery.js";
import type { SessionState, TabState } from "./state/types.js";
import { NAMED_KEYS } from "./theme/types.js";
import type { SourceSnapshot, ThemeSpec } from "./theme/types.js";

// Plain-text renderings shared by the CLI subcommands and the TUI.

export function tabLabel(tab: TabState): string {
  const name = tab.filePath ? basename(tab.filePath) : "untitled";
  return tab.dirty ? `${name} *` : name;
}

export function formatTheme(spec: ThemeSpec): string[] {
  const lines = [`source ${spec.sourceId} (${spec.mode})`];
  for (const key of NAMED_KEYS) {
    lines.push(`${key.padEnd(20)} ${spec[key]}`);
  }
  spec.palette.forEach((color, i) => {
    lines.push(`${`color${i}`.padEnd(20)} ${color}`);
  });
  return lines;
}

export function formatSources(snapshots: readonly SourceSnapshot[]): string[] {
  return [...snapshots]
    .sort((a, b) => a.descriptor.priorityRank - b.descriptor.priorityRank)
    .map(({ descriptor, colors, origin }) => {
      const status = colors ? `${Object.keys(colors).length} colors` : "absent";
      const where = origin ?? descriptor.filesystemPath ?? "-";
      return `${String(descriptor.priorityRank).padStart(2)}  ${descriptor.id.padEnd(16)} ${descriptor.parserKind.padEnd(9)} ${status.padEnd(10)} ${where}`;
    });
}

export function formatSession(session: SessionState): string[] {
  const g = session.windowGeometry;
  const position = g.x === null || g.y === null ? "" : ` at ${g.x},${g.y}`;
  const lines = [
    `window ${g.width}x${g.height}${g.maximized ? " maximized" : ""}${position}`,
    `theme ${session.themeMode}`,
    `last shutdown ${session.cleanShutdown ? "clean" : "unclean"}`,
    `${session.tabs.length} tab(s)`,
  ];
  session.tabs.forEach((tab, i) => {
    const marker = i === session.activeTabIndex ? ">" : " ";
    lines.push(`${marker} ${tabLabel(tab).padEnd(24)} cursor ${tab.cursorOffset}  ${tab.filePath ?? ""}`.trimEnd());
  });
  return lines;
}

/** First lines of a buffer, for the recovery prompt. */
export function previewLines(content: string, max = 5): string[] {
  const lines = content.split("\n");
  const shown = lines.slice(0, max);
  if (lines.length > max) shown.push(`… ${lines.length - max} more line(s)`);
  return shown;
}

export function formatPlan(plan: RecoveryPlan, now: number): string[] {
  const age = (timestamp: number) => `${Math.max(0, Math.round((now - timestamp) / 60_000))}m ago`;
  return [
    ...plan.recover.map((r) => `recover ${r.tabId}  ${r.filePath ?? "untitled"}  ${age(r.timestamp)}`),
    ...plan.purge.map((r) => `purge   ${r.tabId}  ${r.filePath ?? "untitled"}  ${age(r.timestamp)}`),
  ];
}
