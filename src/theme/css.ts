import { isDark } from "./color.js";
import type { ThemeSpec } from "./types.js";

/**
 * GTK CSS for a resolved theme, installed by the GUI at application priority.
 * Returns null in forced-system mode: the GUI removes its provider and
 * inherits the system theme.
 */
export function renderCss(spec: ThemeSpec, options: { dark?: boolean } = {}): string | null {
  if (spec.mode === "forced-system") return null;

  const dark = options.dark ?? isDark(spec.background);
  // Entries need a stronger mix on light backgrounds to stay visible.
  const entryMix = dark ? 0.06 : 0.12;

  return [
    "/* generated from palette */",
    `@define-color term_bg ${spec.background};`,
    `@define-color term_fg ${spec.foreground};`,
    `@define-color term_sel_bg ${spec.selectionBackground};`,
    `@define-color term_sel_fg ${spec.selectionForeground};`,
    `@define-color term_caret ${spec.cursor};`,
    `@define-color term_accent ${spec.accent};`,
    "",
    "window, .background, .view {",
    "  background-color: @term_bg;",
    "  color: @term_fg;",
    "}",
    "textview, textview > text {",
    "  background-color: @term_bg;",
    "  color: @term_fg;",
    "  caret-color: @term_caret;",
    "}",
    "textview text selection {",
    "  background-color: @term_sel_bg;",
    "  color: @term_sel_fg;",
    "}",
    "headerbar, .titlebar {",
    "  background-color: @term_bg;",
    "  color: @term_fg;",
    "  border-bottom: 1px solid alpha(@term_fg, 0.08);",
    "}",
    "entry, searchentry {",
    `  background-color: mix(@term_bg, @term_fg, ${entryMix});`,
    "  color: @term_fg;",
    "  border: 1px solid alpha(@term_fg, 0.15);",
    "}",
    "entry:focus, searchentry:focus {",
    "  border-color: @term_accent;",
    "}",
    "entry selection, searchentry selection {",
    "  background-color: @term_sel_bg;",
    "  color: @term_sel_fg;",
    "}",
  ].join("\n");
}
