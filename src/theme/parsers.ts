import { parse as parseToml } from "smol-toml";
import { parse as parseYaml } from "yaml";
import { readEnv } from "../config.js";
import type { Env } from "../config.js";
import { normalizeHex } from "./color.js";
import { PALETTE_SIZE } from "./types.js";
import type { ColorKey, ParseResult, PartialPalette } from "./types.js";

export type TextParserKind = "alacritty" | "kitty" | "foot";
export type AlacrittyFormat = "toml" | "yaml" | "auto";

const ANSI_NAMES = ["black", "red", "green", "yellow", "blue", "magenta", "cyan", "white"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(value: unknown, key: string): Record<string, unknown> {
  if (!isRecord(value)) return {};
  const next = value[key];
  return isRecord(next) ? next : {};
}

function setColor(out: PartialPalette, key: ColorKey, raw: unknown, allowBare = false): void {
  // YAML reads an unquoted 0xrrggbb as a number.
  if (typeof raw === "number" && Number.isInteger(raw) && raw >= 0 && raw <= 0xffffff) {
    out[key] = `#${raw.toString(16).padStart(6, "0")}`;
    return;
  }
  if (typeof raw !== "string") return;
  const hex = normalizeHex(raw, { allowBare });
  if (hex) out[key] = hex;
}

function finish(colors: PartialPalette, imports: string[] = []): ParseResult {
  if (Object.keys(colors).length === 0) return { ok: false, error: "no usable colors" };
  return { ok: true, colors, imports };
}

// ---------------------------------------------------------------------------
// Alacritty (TOML, legacy YAML, line-oriented fallback)
// ---------------------------------------------------------------------------

function alacrittyColors(doc: Record<string, unknown>): PartialPalette {
  const colors = child(doc, "colors");
  const primary = child(colors, "primary");
  const cursor = child(colors, "cursor");
  const selection = child(colors, "selection");
  const normal = child(colors, "normal");
  const bright = child(colors, "bright");

  const out: PartialPalette = {};
  setColor(out, "background", primary.background);
  setColor(out, "foreground", primary.foreground);
  setColor(out, "cursor", cursor.cursor);
  setColor(out, "selectionBackground", selection.background);
  setColor(out, "selectionForeground", selection.text ?? selection.foreground);
  ANSI_NAMES.forEach((name, i) => {
    setColor(out, `color${i}`, normal[name]);
    setColor(out, `color${i + 8}`, bright[name]);
  });
  return out;
}

function alacrittyImports(doc: Record<string, unknown>): string[] {
  const raw = doc.import ?? child(doc, "general").import;
  if (typeof raw === "string") return [raw];
  if (!Array.isArray(raw)) return [];
  return raw.filter((p): p is string => typeof p === "string");
}

function tryStructured(text: string, format: "toml" | "yaml"): Record<string, unknown> | null {
  try {
    const doc: unknown = format === "toml" ? parseToml(text) : parseYaml(text);
    return isRecord(doc) ? doc : null;
  } catch {
    return null;
  }
}

const SECTION_TOML = /^\s*\[\s*colors\.([A-Za-z_]+)\s*\]\s*$/;
const SECTION_YAML = /^\s*([A-Za-z_]+)\s*:\s*$/;
const KEY_VALUE =
  /^\s*([A-Za-z_]+)\s*[:=]\s*["']?(#[0-9a-fA-F]{3,8}|0x[0-9a-fA-F]{6}|rgb:[0-9a-fA-F]{2}\/[0-9a-fA-F]{2}\/[0-9a-fA-F]{2})/;

/** Rebuild a `colors` tree from text neither TOML nor YAML would accept. */
function scanAlacrittyLines(text: string): Record<string, unknown> {
  const sections: Record<string, Record<string, string>> = {};
  let section: string | null = null;
  for (const line of text.split("\n")) {
    const header = SECTION_TOML.exec(line) ?? SECTION_YAML.exec(line);
    if (header) {
      section = header[1];
      continue;
    }
    const kv = KEY_VALUE.exec(line);
    if (kv && section) {
      sections[section] = { ...sections[section], [kv[1]]: kv[2] };
    }
  }
  return { colors: sections };
}

export function parseAlacritty(text: string, format: AlacrittyFormat = "auto"): ParseResult {
  const order: Array<"toml" | "yaml"> = format === "yaml" ? ["yaml", "toml"] : ["toml", "yaml"];
  for (const f of order) {
    const doc = tryStructured(text, f);
    if (doc && isRecord(doc.colors)) {
      // An unquoted `#rrggbb` is a YAML comment; the line scan still sees it.
      const colors = { ...alacrittyColors(scanAlacrittyLines(text)), ...alacrittyColors(doc) };
      return finish(colors, alacrittyImports(doc));
    }
    if (doc && alacrittyImports(doc).length > 0) {
      // Import-only file: the colors live in the imported theme.
      return { ok: true, colors: {}, imports: alacrittyImports(doc) };
    }
  }
  return finish(alacrittyColors(scanAlacrittyLines(text)));
}

// ---------------------------------------------------------------------------
// Kitty (`key value` lines)
// ---------------------------------------------------------------------------

const KITTY_KEYS: Record<string, ColorKey> = {
  background: "background",
  foreground: "foreground",
  cursor: "cursor",
  selection_background: "selectionBackground",
  selection_foreground: "selectionForeground",
  active_border_color: "accent",
};

export function parseKitty(text: string): ParseResult {
  const out: PartialPalette = {};
  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const [key, value] = trimmed.split(/\s+/, 2);
    if (value === undefined) continue;
    const palette = /^color(\d{1,2})$/.exec(key);
    if (palette) {
      const index = Number(palette[1]);
      if (index < PALETTE_SIZE) setColor(out, `color${index}`, value);
      continue;
    }
    const mapped = KITTY_KEYS[key];
    if (mapped) setColor(out, mapped, value);
  }
  return finish(out);
}

// ---------------------------------------------------------------------------
// Foot (INI, hex without '#')
// ---------------------------------------------------------------------------

const FOOT_COLOR_SECTIONS = new Set(["colors", "colors-dark"]);

const FOOT_KEYS: Record<string, ColorKey> = {
  background: "background",
  foreground: "foreground",
  "selection-background": "selectionBackground",
  "selection-foreground": "selectionForeground",
};

export function parseFoot(text: string): ParseResult {
  const out: PartialPalette = {};
  let section = "main";
  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith(";")) continue;

    const header = /^\[([^\]]+)\]$/.exec(trimmed);
    if (header) {
      section = header[1].trim();
      continue;
    }

    const eq = trimmed.indexOf("=");
    if (eq < 0) continue;
    const key = trimmed.slice(0, eq).trim();
    const value = trimmed.slice(eq + 1).trim();

    if (section === "cursor" && key === "color") {
      // "color=<text> <cursor>"
      const parts = value.split(/\s+/);
      setColor(out, "cursor", parts[1] ?? parts[0], true);
      continue;
    }
    if (!FOOT_COLOR_SECTIONS.has(section)) continue;

    const regular = /^(regular|bright)([0-7])$/.exec(key);
    if (regular) {
      const index = Number(regular[2]) + (regular[1] === "bright" ? 8 : 0);
      setColor(out, `color${index}`, value, true);
      continue;
    }
    const mapped = FOOT_KEYS[key];
    if (mapped) setColor(out, mapped, value, true);
  }
  return finish(out);
}

// ---------------------------------------------------------------------------
// Environment (OMNOTE_* with MICROPAD_* as legacy alias)
// ---------------------------------------------------------------------------

const ENV_KEYS: Array<[string, ColorKey]> = [
  ["BG", "background"],
  ["FG", "foreground"],
  ["ACCENT", "accent"],
  ["CARET", "cursor"],
  ["SEL_BG", "selectionBackground"],
  ["SEL_FG", "selectionForeground"],
  ...Array.from({ length: PALETTE_SIZE }, (_, i): [string, ColorKey] => [`COLOR${i}`, `color${i}`]),
];

/** Per-key color overrides from the environment. Malformed values are skipped. */
export function parseEnvironment(env: Env): PartialPalette {
  const out: PartialPalette = {};
  for (const [suffix, key] of ENV_KEYS) {
    setColor(out, key, readEnv(env, suffix));
  }
  return out;
}

export function parseSourceText(kind: TextParserKind, text: string, fileName = ""): ParseResult {
  switch (kind) {
    case "alacritty":
      return parseAlacritty(text, /\.ya?ml$/i.test(fileName) ? "yaml" : /\.toml$/i.test(fileName) ? "toml" : "auto");
    case "kitty":
      return parseKitty(text);
    case "foot":
      return parseFoot(text);
  }
}
