import type { Env, OmnoteConfig } from "./config.js";
import type { OmnoteError } from "./errors.js";
import type { Logger } from "./log.js";
import { FsAutosaveCache, hashContent } from "./autosave/cache.js";
import type { AutosaveCache } from "./autosave/cache.js";
import { AutosaveManager } from "./autosave/manager.js";
import { recover } from "./autosave/recovery.js";
import type { ConfirmRecovery, RecoveryOutcome } from "./autosave/recovery.js";
import { SessionController } from "./state/controller.js";
import { StateStore } from "./state/store.js";
import type { SessionState } from "./state/types.js";
import { buildRegistry, configHomeFor, omarchyLayout, watchablePaths } from "./theme/registry.js";
import { ThemeResolver } from "./theme/resolver.js";
import { createFsReader } from "./theme/sources.js";
import { ThemeSynchronizer } from "./theme/synchronizer.js";
import { SourceWatcher } from "./theme/watcher.js";
import type { WatchBackend } from "./theme/watcher.js";

export interface RuntimeOptions {
  config: OmnoteConfig;
  env: Env;
  logger: Logger;
  /** Asked once per recoverable tab at startup. */
  confirm: ConfirmRecovery;
  /** Non-blocking notices for the UI (write failures, degraded watching). */
  onWarning?: (err: OmnoteError) => void;
  watchBackend?: WatchBackend;
  /** Defaults to setImmediate. */
  dispatch?: (fn: () => void) => void;
}

export interface Runtime {
  store: StateStore;
  cache: AutosaveCache;
  autosave: AutosaveManager;
  session: SessionController;
  resolver: ThemeResolver;
  theme: ThemeSynchronizer;
  recovery: RecoveryOutcome;
  shutdown(): Promise<void>;
}

export function createResolver(config: OmnoteConfig, env: Env, logger: Logger): ThemeResolver {
  const registry = buildRegistry({ env, home: config.home });
  return new ThemeResolver(registry, {
    reader: createFsReader(logger),
    env,
    home: config.home,
    omarchy: omarchyLayout(configHomeFor(env, config.home)),
    logger,
  });
}

/**
 * Unsaved text the legacy state file kept inline moves into the autosave
 * cache, so recovery offers it like any other.
 */
async function importLegacyBuffers(
  session: SessionState,
  buffers: Map<string, string>,
  cache: AutosaveCache,
  logger: Logger,
): Promise<void> {
  for (const [tabId, content] of buffers) {
    const tab = session.tabs.find((t) => t.tabId === tabId);
    try {
      await cache.write(
        { tabId, timestamp: Date.now(), contentHash: hashContent(content), filePath: tab?.filePath ?? null },
        content,
      );
    } catch (err) {
      logger.warn({ err, tabId }, "could not import legacy unsaved buffer");
    }
  }
}

/**
 * Startup, in order: load the session, reconcile it with the autosave
 * cache, start session tracking, then resolve the theme and start watching.
 */
export async function startRuntime(options: RuntimeOptions): Promise<Runtime> {
  const { config, env, logger } = options;
  const onWarning = options.onWarning;

  const store = new StateStore({
    stateFile: config.paths.stateFile,
    legacyStateFile: config.paths.legacyStateFile,
    logger: logger.child({ module: "state" }),
  });
  const loaded = await store.loadWithLegacy();

  const autosaveLogger = logger.child({ module: "autosave" });
  const cache = new FsAutosaveCache(config.paths.autosaveDir, autosaveLogger);
  await importLegacyBuffers(loaded.session, loaded.legacyBuffers, cache, autosaveLogger);

  const recovery = await recover({
    session: loaded.session,
    cache,
    confirm: options.confirm,
    logger: logger.child({ module: "recovery" }),
    retentionMs: config.timings.autosaveRetentionMs,
  });

  let controller: SessionController | null = null;
  const autosave = new AutosaveManager({
    cache,
    idleMs: config.timings.autosaveIdleMs,
    maxLatencyMs: config.timings.autosaveMaxLatencyMs,
    logger: autosaveLogger,
    onWarning,
    onWritten: (record) => controller?.noteAutosaved(record.tabId),
  });

  for (const record of recovery.records.values()) autosave.resume(record);

  // The command-line flag beats the persisted preference.
  const themeMode = config.themeMode === "forced-system" ? "forced-system" : recovery.session.themeMode;
  controller = new SessionController({
    store,
    autosave,
    session: { ...recovery.session, themeMode },
    logger: logger.child({ module: "session" }),
    saveIntervalMs: config.timings.sessionSaveIntervalMs,
    onWarning,
  });
  const session = controller;
  await session.start();

  const themeLogger = logger.child({ module: "theme" });
  const resolver = createResolver(config, env, themeLogger);
  const watcher = config.watch
    ? new SourceWatcher({
        paths: watchablePaths(resolver.descriptors, omarchyLayout(configHomeFor(env, config.home))),
        debounceMs: config.timings.watchDebounceMs,
        logger: themeLogger,
        backend: options.watchBackend,
      })
    : null;
  const theme = new ThemeSynchronizer({
    resolver,
    watcher,
    mode: themeMode,
    logger: themeLogger,
    dispatch: options.dispatch,
    onWarning,
  });
  await theme.start();

  logger.info(
    { tabs: session.session.tabs.length, recovered: recovery.recovered.length, mode: themeMode, watch: config.watch },
    "runtime started",
  );

  return {
    store,
    cache,
    autosave,
    session,
    resolver,
    theme,
    recovery,
    async shutdown() {
      await theme.stop();
      await session.shutdown();
    },
  };
}
