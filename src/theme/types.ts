export type ParserKind = "omarchy" | "alacritty" | "kitty" | "foot" | "env" | "gtk";

export interface SourceDescriptor {
  readonly id: string;
  readonly filesystemPath: string | null; // null for env / gtk
  readonly parserKind: ParserKind;
  readonly priorityRank: number; // lower wins
}

export const NAMED_KEYS = [
  "background",
  "foreground",
  "accent",
  "cursor",
  "selectionBackground",
  "selectionForeground",
] as const;

export type NamedColorKey = (typeof NAMED_KEYS)[number];

export const PALETTE_SIZE = 16;
export const PALETTE_KEYS = Array.from({ length: PALETTE_SIZE }, (_, i) => `color${i}` as const);

export type PaletteKey = `color${number}`;
export type ColorKey = NamedColorKey | PaletteKey;

/** Whatever subset of colors a source supplied. Missing keys stay unset. */
export type PartialPalette = Partial<Record<ColorKey, string>>;

export type ParseResult =
  | { ok: true; colors: PartialPalette; imports: string[] }
  | { ok: false; error: string };

/**
 * live: a file or environment source won.
 * system: nothing usable was found, so the system default palette applies.
 * forced-system: the user asked for the system theme; no sources, no overrides.
 */
export type ThemeMode = "live" | "system" | "forced-system";

export interface ThemeSpec {
  readonly background: string;
  readonly foreground: string;
  readonly accent: string;
  readonly cursor: string;
  readonly selectionBackground: string;
  readonly selectionForeground: string;
  readonly palette: readonly string[]; // always PALETTE_SIZE entries
  readonly sourceId: string;
  readonly mode: ThemeMode;
}

/** Colors read from one descriptor, ready for the pure resolution step. */
export interface SourceSnapshot {
  readonly descriptor: SourceDescriptor;
  readonly colors: PartialPalette | null; // null = absent or unusable
  readonly origin?: string; // file the colors came from, for logs
}
