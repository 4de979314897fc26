import { mixColor } from "./color.js";
import type { NamedColorKey, PartialPalette } from "./types.js";
import { PALETTE_KEYS } from "./types.js";

const BACKGROUND = "#1e1e1e";
const FOREGROUND = "#e0e0e0";

// Tango, as shipped by the GTK terminals.
const SYSTEM_PALETTE = [
  "#2e3436", "#cc0000", "#4e9a06", "#c4a000", "#3465a4", "#75507b", "#06989a", "#d3d7cf",
  "#555753", "#ef2929", "#8ae234", "#fce94f", "#729fcf", "#ad7fa8", "#34e2e2", "#eeeeec",
];

export const SYSTEM_NAMED: Readonly<Record<NamedColorKey, string>> = Object.freeze({
  background: BACKGROUND,
  foreground: FOREGROUND,
  accent: "#3584e4",
  cursor: FOREGROUND,
  selectionBackground: mixColor(BACKGROUND, FOREGROUND, 0.15),
  selectionForeground: FOREGROUND,
});

export const SYSTEM_PALETTE_COLORS: readonly string[] = Object.freeze([...SYSTEM_PALETTE]);

/** The system GTK fallback as a complete partial palette. */
export function systemDefaultColors(): PartialPalette {
  const out: PartialPalette = { ...SYSTEM_NAMED };
  PALETTE_KEYS.forEach((key, i) => {
    out[key] = SYSTEM_PALETTE[i];
  });
  return out;
}
