import { readFile, stat } from "node:fs/promises";
import { basename, dirname, isAbsolute, join, resolve } from "node:path";
import type { Env } from "../config.js";
import { SourceMalformedError, SourceUnavailableError, errorCode } from "../errors.js";
import type { Logger } from "../log.js";
import { systemDefaultColors } from "./defaults.js";
import { parseEnvironment, parseSourceText } from "./parsers.js";
import type { TextParserKind } from "./parsers.js";
import type { OmarchyLayout } from "./registry.js";
import type { PartialPalette, SourceDescriptor, SourceSnapshot } from "./types.js";

const MAX_IMPORT_DEPTH = 8;

/** Files looked for inside an Omarchy theme directory, in order. */
const OMARCHY_THEME_FILES: Array<[string, TextParserKind]> = [
  ["alacritty.toml", "alacritty"],
  ["alacritty.yaml", "alacritty"],
  ["alacritty.yml", "alacritty"],
  ["kitty.conf", "kitty"],
  ["foot.ini", "foot"],
];

const HYPR_THEME_SOURCE =
  /^\s*(?:source|include)\s*=\s*(?<path>\S*omarchy\/(?:\S+\/)?themes\/(?<name>[^/\s]+)\/hyprland\.conf)\s*$/im;

export interface SourceReader {
  /** File contents, or null when the file is missing or unreadable. */
  readText(path: string): Promise<string | null>;
  isDirectory(path: string): Promise<boolean>;
}

export interface LoadOptions {
  reader: SourceReader;
  env: Env;
  home: string;
  omarchy: OmarchyLayout;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Filesystem reader
// ---------------------------------------------------------------------------

export function createFsReader(logger: Logger): SourceReader {
  return {
    async readText(path) {
      try {
        return await readFile(path, "utf-8");
      } catch (err) {
        const code = errorCode(err);
        if (code !== "ENOENT" && code !== "ENOTDIR") {
          logger.warn({ err: new SourceUnavailableError(path, { cause: err }) }, "source unreadable");
        }
        return null;
      }
    },
    async isDirectory(path) {
      try {
        return (await stat(path)).isDirectory();
      } catch {
        return false;
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Omarchy theme directory
// ---------------------------------------------------------------------------

/**
 * Find the active Omarchy theme directory.
 * Chain: current/theme → themes/current → marker files → hyprland.conf source line.
 */
export async function locateOmarchyTheme(layout: OmarchyLayout, reader: SourceReader): Promise<string | null> {
  if (await reader.isDirectory(layout.currentTheme)) return layout.currentTheme;

  const themesCurrent = join(layout.themesDir, "current");
  if (await reader.isDirectory(themesCurrent)) return themesCurrent;

  for (const marker of layout.markers) {
    const name = (await reader.readText(marker))?.trim();
    if (!name) continue;
    const dir = join(layout.themesDir, name);
    if (await reader.isDirectory(dir)) return dir;
  }

  const hypr = await reader.readText(layout.hyprlandConf);
  const name = hypr ? HYPR_THEME_SOURCE.exec(hypr)?.groups?.name : undefined;
  if (name) {
    const dir = join(layout.themesDir, name);
    if (await reader.isDirectory(dir)) return dir;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Parsing a file (and its Alacritty imports)
// ---------------------------------------------------------------------------

function expandPath(raw: string, from: string, home: string): string {
  if (raw === "~") return home;
  if (raw.startsWith("~/")) return join(home, raw.slice(2));
  return isAbsolute(raw) ? raw : resolve(dirname(from), raw);
}

async function loadFile(
  path: string,
  kind: TextParserKind,
  opts: LoadOptions,
  depth = 0,
  visited: Set<string> = new Set(),
): Promise<PartialPalette | null> {
  if (depth > MAX_IMPORT_DEPTH || visited.has(path)) return null;
  visited.add(path);

  const text = await opts.reader.readText(path);
  if (text === null) return null;

  const result = parseSourceText(kind, text, basename(path));
  if (!result.ok) {
    opts.logger.warn({ err: new SourceMalformedError(path, result.error) }, "source skipped");
    return null;
  }

  // Imported files first; the importing file's own keys win.
  let merged: PartialPalette = {};
  for (const imp of result.imports) {
    const imported = await loadFile(expandPath(imp, path, opts.home), kind, opts, depth + 1, visited);
    if (imported) merged = { ...merged, ...imported };
  }
  merged = { ...merged, ...result.colors };
  return Object.keys(merged).length > 0 ? merged : null;
}

async function loadOmarchy(opts: LoadOptions): Promise<{ colors: PartialPalette; origin: string } | null> {
  const dir = await locateOmarchyTheme(opts.omarchy, opts.reader);
  if (!dir) return null;
  for (const [file, kind] of OMARCHY_THEME_FILES) {
    const path = join(dir, file);
    if ((await opts.reader.readText(path)) === null) continue;
    // The first file present decides, as in the theme directory itself.
    const colors = await loadFile(path, kind, opts);
    return colors ? { colors, origin: path } : null;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

async function loadOne(descriptor: SourceDescriptor, opts: LoadOptions): Promise<SourceSnapshot> {
  switch (descriptor.parserKind) {
    case "omarchy": {
      const found = await loadOmarchy(opts);
      return { descriptor, colors: found?.colors ?? null, origin: found?.origin };
    }
    case "env": {
      const colors = parseEnvironment(opts.env);
      return { descriptor, colors: Object.keys(colors).length > 0 ? colors : null };
    }
    case "gtk":
      return { descriptor, colors: systemDefaultColors() };
    case "alacritty":
    case "kitty":
    case "foot": {
      const path = descriptor.filesystemPath;
      const colors = path ? await loadFile(path, descriptor.parserKind, opts) : null;
      return { descriptor, colors, origin: path ?? undefined };
    }
  }
}

/**
 * Read every descriptor's source. This is the only step of resolution
 * that touches the filesystem, and it only reads.
 */
export async function loadSnapshots(
  registry: readonly SourceDescriptor[],
  opts: LoadOptions,
): Promise<SourceSnapshot[]> {
  return Promise.all(registry.map((descriptor) => loadOne(descriptor, opts)));
}
