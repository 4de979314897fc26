import { homedir } from "node:os";
import { join } from "node:path";

export type ThemeModeSetting = "live" | "forced-system";

export interface OmnotePaths {
  configDir: string;
  stateFile: string;
  /** State written by the app before it was renamed from micropad. */
  legacyStateFile: string;
  cacheDir: string;
  autosaveDir: string;
  debugLog: string;
}

export interface OmnoteTimings {
  watchDebounceMs: number;
  autosaveIdleMs: number;
  autosaveMaxLatencyMs: number;
  sessionSaveIntervalMs: number;
  autosaveRetentionMs: number;
}

export interface OmnoteConfig {
  home: string;
  paths: OmnotePaths;
  timings: OmnoteTimings;
  themeMode: ThemeModeSetting;
  watch: boolean;
  debug: boolean;
}

export interface CliFlags {
  systemTheme?: boolean;
  /** commander's negated `--no-watch` option: false when the flag is given. */
  watch?: boolean;
}

export type Env = Readonly<Record<string, string | undefined>>;

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const APP_DIR = "omnote";
export const LEGACY_APP_DIR = "micropad";
export const ENV_PREFIX = "OMNOTE_";
export const LEGACY_ENV_PREFIX = "MICROPAD_";

export const DEFAULT_TIMINGS: OmnoteTimings = {
  watchDebounceMs: 300,
  autosaveIdleMs: 2000,
  autosaveMaxLatencyMs: 30_000,
  sessionSaveIntervalMs: 30_000,
  autosaveRetentionMs: 7 * 24 * 60 * 60 * 1000,
};

const TIMING_KEYS: ReadonlyArray<keyof OmnoteTimings> = [
  "watchDebounceMs",
  "autosaveIdleMs",
  "autosaveMaxLatencyMs",
  "sessionSaveIntervalMs",
  "autosaveRetentionMs",
];

const TIMING_ENV: Record<keyof OmnoteTimings, string> = {
  watchDebounceMs: "WATCH_DEBOUNCE_MS",
  autosaveIdleMs: "AUTOSAVE_IDLE_MS",
  autosaveMaxLatencyMs: "AUTOSAVE_MAX_LATENCY_MS",
  sessionSaveIntervalMs: "SESSION_SAVE_INTERVAL_MS",
  autosaveRetentionMs: "AUTOSAVE_RETENTION_MS",
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Read `OMNOTE_<name>`, falling back to the legacy `MICROPAD_<name>`. */
export function readEnv(env: Env, name: string): string | undefined {
  const current = env[ENV_PREFIX + name];
  if (current !== undefined && current.trim() !== "") return current.trim();
  const legacy = env[LEGACY_ENV_PREFIX + name];
  if (legacy !== undefined && legacy.trim() !== "") return legacy.trim();
  return undefined;
}

function isTruthy(value: string | undefined): boolean {
  if (value === undefined) return false;
  const v = value.toLowerCase();
  return v !== "0" && v !== "false" && v !== "off" && v !== "no";
}

function toMs(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return parsed;
}

function resolvePaths(env: Env, home: string): OmnotePaths {
  const configBase = env.XDG_CONFIG_HOME?.trim() || join(home, ".config");
  const cacheBase = env.XDG_CACHE_HOME?.trim() || join(home, ".cache");
  const configDir = join(configBase, APP_DIR);
  const cacheDir = join(cacheBase, APP_DIR);
  return {
    configDir,
    stateFile: join(configDir, "state.json"),
    legacyStateFile: join(configBase, LEGACY_APP_DIR, "state.json"),
    cacheDir,
    autosaveDir: join(cacheDir, "autosave"),
    debugLog: join(cacheDir, "debug.log"),
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function loadConfig(options: { env?: Env; home?: string; flags?: CliFlags } = {}): OmnoteConfig {
  const env = options.env ?? process.env;
  const home = options.home ?? homedir();
  const flags = options.flags ?? {};

  const timings = { ...DEFAULT_TIMINGS };
  for (const key of TIMING_KEYS) {
    timings[key] = toMs(readEnv(env, TIMING_ENV[key]), timings[key]);
  }

  const forced = flags.systemTheme === true || readEnv(env, "THEME_MODE")?.toLowerCase() === "system";
  const watch = flags.watch !== false && !isTruthy(readEnv(env, "NO_WATCH"));

  const config: OmnoteConfig = {
    home,
    paths: Object.freeze(resolvePaths(env, home)),
    timings: Object.freeze(timings),
    themeMode: forced ? "forced-system" : "live",
    watch,
    debug: isTruthy(readEnv(env, "DEBUG")),
  };
  return Object.freeze(config);
}
