import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from "node:fs";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import pino from "pino";
import { silentLogger } from "../log.js";
import { buildRegistry, omarchyLayout } from "../theme/registry.js";
import { createFsReader, loadSnapshots, locateOmarchyTheme } from "../theme/sources.js";
import type { LoadOptions } from "../theme/sources.js";
import { ThemeResolver } from "../theme/resolver.js";

describe("theme source loading", () => {
  let home: string;
  let options: LoadOptions;

  const write = (relative: string, text: string) => {
    const path = join(home, relative);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, text);
    return path;
  };

  const snapshot = async (id: string) => {
    const registry = buildRegistry({ env: {}, home });
    const snapshots = await loadSnapshots(registry, options);
    const found = snapshots.find((s) => s.descriptor.id === id);
    if (!found) throw new Error(`no snapshot ${id}`);
    return found;
  };

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "omnote-sources-test-"));
    const logger = silentLogger();
    options = {
      reader: createFsReader(logger),
      env: {},
      home,
      omarchy: omarchyLayout(join(home, ".config")),
      logger,
    };
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  it("reports absent files as null colors", async () => {
    expect((await snapshot("kitty")).colors).toBeNull();
    expect((await snapshot("omarchy")).colors).toBeNull();
  });

  it("follows Alacritty imports, letting the importing file win", async () => {
    write("themes/base.toml", '[colors.primary]\nbackground = "#101010"\nforeground = "#202020"\n');
    write(
      ".config/alacritty/alacritty.toml",
      'import = ["~/themes/base.toml"]\n\n[colors.primary]\nforeground = "#f0f0f0"\n',
    );

    const snap = await snapshot("alacritty-toml");
    expect(snap.colors).toEqual({ background: "#101010", foreground: "#f0f0f0" });
  });

  it("resolves relative imports and survives cycles", async () => {
    write(".config/alacritty/a.toml", 'import = ["b.toml"]\n[colors.primary]\nbackground = "#0a0a0a"\n');
    write(".config/alacritty/b.toml", 'import = ["a.toml"]\n[colors.primary]\nforeground = "#0b0b0b"\n');
    write(".config/alacritty/alacritty.toml", 'import = ["a.toml"]\n');

    const snap = await snapshot("alacritty-toml");
    expect(snap.colors).toEqual({ background: "#0a0a0a", foreground: "#0b0b0b" });
  });

  it("treats a malformed file as absent", async () => {
    write(".config/kitty/kitty.conf", "font_size 12\n");
    expect((await snapshot("kitty")).colors).toBeNull();
  });

  it("logs a malformed file at the default level and stays quiet about missing ones", async () => {
    const lines: Array<{ level: number; msg: string; err: { message: string } }> = [];
    const logger = pino({ level: "info" }, { write: (line: string) => lines.push(JSON.parse(line)) });
    options = { ...options, reader: createFsReader(logger), logger };
    const path = write(".config/kitty/kitty.conf", "font_size 12\n");

    await snapshot("kitty");
    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe(40);
    expect(lines[0].msg).toBe("source skipped");
    expect(lines[0].err.message.startsWith(`source malformed: ${path}: `)).toBe(true);
  });

  it("finds the Omarchy theme through a marker file", async () => {
    write(".config/omarchy/current-theme", "nord\n");
    const path = write(".config/omarchy/themes/nord/kitty.conf", "background #2e3440\nforeground #d8dee9\n");

    const snap = await snapshot("omarchy");
    expect(snap.colors).toEqual({ background: "#2e3440", foreground: "#d8dee9" });
    expect(snap.origin).toBe(path);
  });

  it("finds the Omarchy theme through hyprland.conf", async () => {
    write(".config/hypr/hyprland.conf", "source = ~/.config/omarchy/themes/tokyo/hyprland.conf\n");
    mkdirSync(join(home, ".config/omarchy/themes/tokyo"), { recursive: true });

    expect(await locateOmarchyTheme(options.omarchy, options.reader)).toBe(
      join(home, ".config/omarchy/themes/tokyo"),
    );
  });

  it("prefers current/theme over every other pointer", async () => {
    write(".config/omarchy/current-theme", "nord\n");
    mkdirSync(join(home, ".config/omarchy/themes/nord"), { recursive: true });
    mkdirSync(join(home, ".config/omarchy/current/theme"), { recursive: true });

    expect(await locateOmarchyTheme(options.omarchy, options.reader)).toBe(
      join(home, ".config/omarchy/current/theme"),
    );
  });

  it("uses the first theme file present in the Omarchy directory", async () => {
    write(".config/omarchy/current/theme/foot.ini", "[colors]\nbackground=000000\nforeground=ffffff\n");
    write(".config/omarchy/current/theme/alacritty.toml", '[colors.primary]\nbackground = "#111111"\nforeground = "#eeeeee"\n');

    const snap = await snapshot("omarchy");
    expect(snap.colors).toEqual({ background: "#111111", foreground: "#eeeeee" });
  });

  it("resolves end to end from the files on disk", async () => {
    write(".config/kitty/kitty.conf", "background #202020\nforeground #c0c0c0\n");
    write(".config/foot/foot.ini", "[colors]\nbackground=000000\nforeground=ffffff\n");

    const resolver = new ThemeResolver(buildRegistry({ env: {}, home }), options);
    const spec = await resolver.resolve("live");
    expect(spec.sourceId).toBe("kitty");
    expect(spec.background).toBe("#202020");
    expect(spec.mode).toBe("live");

    const forced = await resolver.resolve("forced-system");
    expect(forced.sourceId).toBe("gtk-default");
    expect(forced.background).toBe("#1e1e1e");
  });
});
