export { loadConfig, readEnv, DEFAULT_TIMINGS } from "./config.js";
export type { CliFlags, Env, OmnoteConfig, OmnotePaths, OmnoteTimings, ThemeModeSetting } from "./config.js";
export {
  OmnoteError,
  SourceUnavailableError,
  SourceMalformedError,
  StateCorruptError,
  PersistenceError,
  WatchError,
} from "./errors.js";
export type { OmnoteErrorKind } from "./errors.js";
export { createLogger, silentLogger } from "./log.js";
export type { Logger } from "./log.js";

export { startRuntime, createResolver } from "./app.js";
export type { Runtime, RuntimeOptions } from "./app.js";

export { buildRegistry, watchablePaths, omarchyLayout } from "./theme/registry.js";
export { parseAlacritty, parseKitty, parseFoot, parseEnvironment, parseSourceText } from "./theme/parsers.js";
export { normalizeHex } from "./theme/color.js";
export { loadSnapshots, createFsReader } from "./theme/sources.js";
export type { SourceReader } from "./theme/sources.js";
export { resolveTheme, themeEquals, ThemeResolver } from "./theme/resolver.js";
export { renderCss } from "./theme/css.js";
export { SourceWatcher, chokidarBackend } from "./theme/watcher.js";
export type { WatchBackend, WatchHandle, WatchRegistration } from "./theme/watcher.js";
export { ThemeSynchronizer } from "./theme/synchronizer.js";
export type { ThemeSource, ThemeSubscriber } from "./theme/synchronizer.js";
export type { ParseResult, PartialPalette, SourceDescriptor, SourceSnapshot, ThemeMode, ThemeSpec } from "./theme/types.js";

export { StateStore, decodeSession, encodeSession } from "./state/store.js";
export * as sessionOps from "./state/session.js";
export { SessionController } from "./state/controller.js";
export { defaultSession } from "./state/types.js";
export type { SessionState, TabState, WindowGeometry } from "./state/types.js";

export { FsAutosaveCache, hashContent } from "./autosave/cache.js";
export type { AutosaveCache, AutosaveRecord } from "./autosave/cache.js";
export { AutosaveManager } from "./autosave/manager.js";
export { planRecovery, recover } from "./autosave/recovery.js";
export type { ConfirmRecovery, RecoveryCandidate, RecoveryOutcome, RecoveryPlan } from "./autosave/recovery.js";
