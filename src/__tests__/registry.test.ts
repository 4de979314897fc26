import { describe, it, expect } from "vitest";
import { buildRegistry, omarchyLayout, watchablePaths } from "../theme/registry.js";

describe("buildRegistry", () => {
  it("orders sources by strictly increasing priority", () => {
    const registry = buildRegistry({ env: {}, home: "/home/test" });
    expect(registry.map((d) => d.id)).toEqual([
      "omarchy",
      "alacritty-toml",
      "alacritty-yml",
      "alacritty-yaml",
      "alacritty-home",
      "kitty",
      "foot",
      "env",
      "gtk-default",
    ]);
    expect(registry.map((d) => d.priorityRank)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it("places the paths under XDG_CONFIG_HOME and honours ALACRITTY_CONFIG", () => {
    const registry = buildRegistry({
      env: { XDG_CONFIG_HOME: "/cfg", ALACRITTY_CONFIG: "/etc/alacritty.toml", KITTY_CONFIG_DIRECTORY: "/k" },
      home: "/home/test",
    });
    const byId = new Map(registry.map((d) => [d.id, d.filesystemPath]));
    expect(byId.get("omarchy")).toBe("/cfg/omarchy/current/theme");
    expect(byId.get("alacritty-env")).toBe("/etc/alacritty.toml");
    expect(registry[1].id).toBe("alacritty-env");
    expect(byId.get("alacritty-home")).toBe("/home/test/.alacritty.yml");
    expect(byId.get("kitty")).toBe("/k/kitty.conf");
    expect(byId.get("foot")).toBe("/cfg/foot/foot.ini");
    expect(byId.get("env")).toBeNull();
  });

  it("is frozen", () => {
    const registry = buildRegistry({ env: {}, home: "/home/test" });
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry[0])).toBe(true);
  });
});

describe("watchablePaths", () => {
  it("lists file sources plus the Omarchy pointers", () => {
    const registry = buildRegistry({ env: {}, home: "/h" });
    const paths = watchablePaths(registry, omarchyLayout("/h/.config"));
    expect(paths).toEqual([
      "/h/.config/omarchy/current/theme",
      "/h/.config/alacritty/alacritty.toml",
      "/h/.config/alacritty/alacritty.yml",
      "/h/.config/alacritty/alacritty.yaml",
      "/h/.alacritty.yml",
      "/h/.config/kitty/kitty.conf",
      "/h/.config/foot/foot.ini",
      "/h/.config/omarchy/current",
      "/h/.config/omarchy/current-theme",
      "/h/.config/omarchy/theme",
      "/h/.config/omarchy/selected-theme",
      "/h/.config/hypr/hyprland.conf",
    ]);
  });
});
