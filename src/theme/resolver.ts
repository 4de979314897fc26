import type { Env, ThemeModeSetting } from "../config.js";
import { mixColor } from "./color.js";
import { SYSTEM_NAMED, SYSTEM_PALETTE_COLORS } from "./defaults.js";
import { parseEnvironment } from "./parsers.js";
import { GTK_SOURCE_ID } from "./registry.js";
import { loadSnapshots } from "./sources.js";
import type { LoadOptions } from "./sources.js";
import { PALETTE_KEYS } from "./types.js";
import type { PartialPalette, SourceDescriptor, SourceSnapshot, ThemeMode, ThemeSpec } from "./types.js";

const SELECTION_MIX = 0.15;

function isUsable(snapshot: SourceSnapshot): boolean {
  return Boolean(snapshot.colors?.background && snapshot.colors.foreground);
}

function buildSpec(colors: PartialPalette, sourceId: string, mode: ThemeMode): ThemeSpec {
  const background = colors.background ?? SYSTEM_NAMED.background;
  const foreground = colors.foreground ?? SYSTEM_NAMED.foreground;
  const palette = PALETTE_KEYS.map((key, i) => colors[key] ?? SYSTEM_PALETTE_COLORS[i]);
  return Object.freeze({
    background,
    foreground,
    accent: colors.accent ?? colors.color4 ?? SYSTEM_NAMED.accent,
    cursor: colors.cursor ?? foreground,
    selectionBackground: colors.selectionBackground ?? mixColor(background, foreground, SELECTION_MIX),
    selectionForeground: colors.selectionForeground ?? foreground,
    palette: Object.freeze(palette),
    sourceId,
    mode,
  });
}

/**
 * Pick one palette from already-loaded sources.
 *
 * The first source (by priority) with both background and foreground wins;
 * keys it lacks come from the system default. Environment overrides then
 * replace individual keys. forced-system ignores sources and overrides.
 */
export function resolveTheme(
  snapshots: readonly SourceSnapshot[],
  env: Env,
  mode: ThemeModeSetting,
): ThemeSpec {
  if (mode === "forced-system") return buildSpec({}, GTK_SOURCE_ID, "forced-system");

  const ordered = [...snapshots].sort((a, b) => a.descriptor.priorityRank - b.descriptor.priorityRank);
  const winner = ordered.find(isUsable);
  const overrides = parseEnvironment(env);

  if (!winner || winner.descriptor.parserKind === "gtk") {
    return buildSpec(overrides, GTK_SOURCE_ID, "system");
  }
  return buildSpec({ ...(winner.colors ?? {}), ...overrides }, winner.descriptor.id, "live");
}

/** Equality by value. Which source produced the colors does not matter. */
export function themeEquals(a: ThemeSpec | null, b: ThemeSpec | null): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return (
    a.mode === b.mode &&
    a.background === b.background &&
    a.foreground === b.foreground &&
    a.accent === b.accent &&
    a.cursor === b.cursor &&
    a.selectionBackground === b.selectionBackground &&
    a.selectionForeground === b.selectionForeground &&
    a.palette.length === b.palette.length &&
    a.palette.every((c, i) => c === b.palette[i])
  );
}

export class ThemeResolver {
  constructor(
    private readonly registry: readonly SourceDescriptor[],
    private readonly options: LoadOptions,
  ) {}

  get descriptors(): readonly SourceDescriptor[] {
    return this.registry;
  }

  snapshots(): Promise<SourceSnapshot[]> {
    return loadSnapshots(this.registry, this.options);
  }

  async resolve(mode: ThemeModeSetting): Promise<ThemeSpec> {
    // No source scanning at all when the system theme is forced.
    if (mode === "forced-system") return resolveTheme([], this.options.env, mode);
    const snapshots = await this.snapshots();
    const spec = resolveTheme(snapshots, this.options.env, mode);
    this.options.logger.debug({ sourceId: spec.sourceId, mode: spec.mode }, "theme resolved");
    return spec;
  }
}
