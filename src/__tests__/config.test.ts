import { describe, it, expect } from "vitest";
import { DEFAULT_TIMINGS, loadConfig, readEnv } from "../config.js";

describe("loadConfig", () => {
  it("uses the home directory layout by default", () => {
    const config = loadConfig({ env: {}, home: "/home/test" });
    expect(config.paths).toEqual({
      configDir: "/home/test/.config/omnote",
      stateFile: "/home/test/.config/omnote/state.json",
      legacyStateFile: "/home/test/.config/micropad/state.json",
      cacheDir: "/home/test/.cache/omnote",
      autosaveDir: "/home/test/.cache/omnote/autosave",
      debugLog: "/home/test/.cache/omnote/debug.log",
    });
    expect(config.timings).toEqual(DEFAULT_TIMINGS);
    expect(config.themeMode).toBe("live");
    expect(config.watch).toBe(true);
    expect(config.debug).toBe(false);
  });

  it("honours XDG base directories", () => {
    const config = loadConfig({ env: { XDG_CONFIG_HOME: "/x/cfg", XDG_CACHE_HOME: "/x/cache" }, home: "/home/test" });
    expect(config.paths.stateFile).toBe("/x/cfg/omnote/state.json");
    expect(config.paths.autosaveDir).toBe("/x/cache/omnote/autosave");
  });

  it("forces the system theme from the flag or the environment", () => {
    expect(loadConfig({ env: {}, home: "/h", flags: { systemTheme: true } }).themeMode).toBe("forced-system");
    expect(loadConfig({ env: { OMNOTE_THEME_MODE: "system" }, home: "/h" }).themeMode).toBe("forced-system");
    expect(loadConfig({ env: { MICROPAD_THEME_MODE: "SYSTEM" }, home: "/h" }).themeMode).toBe("forced-system");
    expect(loadConfig({ env: { OMNOTE_THEME_MODE: "dark" }, home: "/h" }).themeMode).toBe("live");
  });

  it("disables watching from the flag or the environment", () => {
    expect(loadConfig({ env: {}, home: "/h", flags: { watch: false } }).watch).toBe(false);
    expect(loadConfig({ env: { OMNOTE_NO_WATCH: "1" }, home: "/h" }).watch).toBe(false);
    expect(loadConfig({ env: { MICROPAD_NO_WATCH: "true" }, home: "/h" }).watch).toBe(false);
    expect(loadConfig({ env: { OMNOTE_NO_WATCH: "0" }, home: "/h" }).watch).toBe(true);
  });

  it("reads timing overrides and ignores invalid ones", () => {
    const config = loadConfig({
      env: { OMNOTE_WATCH_DEBOUNCE_MS: "50", OMNOTE_AUTOSAVE_IDLE_MS: "soon", MICROPAD_AUTOSAVE_MAX_LATENCY_MS: "-5" },
      home: "/h",
    });
    expect(config.timings.watchDebounceMs).toBe(50);
    expect(config.timings.autosaveIdleMs).toBe(2000);
    expect(config.timings.autosaveMaxLatencyMs).toBe(30_000);
  });

  it("returns a frozen value", () => {
    const config = loadConfig({ env: {}, home: "/h" });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timings)).toBe(true);
  });
});

describe("readEnv", () => {
  it("prefers OMNOTE_ over MICROPAD_ and skips blanks", () => {
    expect(readEnv({ OMNOTE_X: "a", MICROPAD_X: "b" }, "X")).toBe("a");
    expect(readEnv({ OMNOTE_X: "  ", MICROPAD_X: "b" }, "X")).toBe("b");
    expect(readEnv({}, "X")).toBeUndefined();
  });
});
