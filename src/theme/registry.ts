import { dirname, join } from "node:path";
import type { Env } from "../config.js";
import type { ParserKind, SourceDescriptor } from "./types.js";

export const ENV_SOURCE_ID = "env";
export const GTK_SOURCE_ID = "gtk-default";

export interface OmarchyLayout {
  root: string; // ~/.config/omarchy
  currentTheme: string; // ~/.config/omarchy/current/theme
  themesDir: string;
  markers: string[];
  hyprlandConf: string;
}

export function omarchyLayout(configHome: string): OmarchyLayout {
  const root = join(configHome, "omarchy");
  return {
    root,
    currentTheme: join(root, "current", "theme"),
    themesDir: join(root, "themes"),
    markers: ["current-theme", "theme", "selected-theme"].map((m) => join(root, m)),
    hyprlandConf: join(configHome, "hypr", "hyprland.conf"),
  };
}

export function configHomeFor(env: Env, home: string): string {
  return env.XDG_CONFIG_HOME?.trim() || join(home, ".config");
}

/**
 * Known theme sources, highest priority first:
 * Omarchy theme > Alacritty > Kitty > Foot > environment > GTK default.
 * The returned list and its entries are frozen.
 */
export function buildRegistry(options: { env: Env; home: string }): readonly SourceDescriptor[] {
  const { env, home } = options;
  const configHome = configHomeFor(env, home);

  const candidates: Array<[string, string | null, ParserKind]> = [
    ["omarchy", omarchyLayout(configHome).currentTheme, "omarchy"],
  ];

  const alacrittyEnv = env.ALACRITTY_CONFIG?.trim();
  if (alacrittyEnv) candidates.push(["alacritty-env", alacrittyEnv, "alacritty"]);
  candidates.push(
    ["alacritty-toml", join(configHome, "alacritty", "alacritty.toml"), "alacritty"],
    ["alacritty-yml", join(configHome, "alacritty", "alacritty.yml"), "alacritty"],
    ["alacritty-yaml", join(configHome, "alacritty", "alacritty.yaml"), "alacritty"],
    ["alacritty-home", join(home, ".alacritty.yml"), "alacritty"],
  );

  const kittyDir = env.KITTY_CONFIG_DIRECTORY?.trim() || join(configHome, "kitty");
  candidates.push(
    ["kitty", join(kittyDir, "kitty.conf"), "kitty"],
    ["foot", join(configHome, "foot", "foot.ini"), "foot"],
    [ENV_SOURCE_ID, null, "env"],
    [GTK_SOURCE_ID, null, "gtk"],
  );

  return Object.freeze(
    candidates.map(([id, filesystemPath, parserKind], priorityRank) =>
      Object.freeze({ id, filesystemPath, parserKind, priorityRank }),
    ),
  );
}

/**
 * Every path whose change can alter resolution: each descriptor's file plus,
 * when given, the Omarchy pointers that pick the current theme.
 */
export function watchablePaths(registry: readonly SourceDescriptor[], omarchy?: OmarchyLayout): string[] {
  const paths: string[] = [];
  for (const d of registry) {
    if (d.filesystemPath) paths.push(d.filesystemPath);
  }
  if (omarchy) {
    paths.push(dirname(omarchy.currentTheme), ...omarchy.markers, omarchy.hyprlandConf);
  }
  return [...new Set(paths)];
}
