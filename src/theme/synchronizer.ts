import type { ThemeModeSetting } from "../config.js";
import type { WatchError } from "../errors.js";
import type { Logger } from "../log.js";
import { themeEquals } from "./resolver.js";
import type { ThemeSpec } from "./types.js";
import type { SourceWatcher } from "./watcher.js";

export type ThemeSubscriber = (spec: ThemeSpec) => void;

/** Something that can produce a ThemeSpec for a mode (ThemeResolver in production). */
export interface ThemeSource {
  resolve(mode: ThemeModeSetting): Promise<ThemeSpec>;
}

export interface ThemeSynchronizerOptions {
  resolver: ThemeSource;
  /** Omit (or pass null) to disable live sync, as `--no-watch` does. */
  watcher: SourceWatcher | null;
  mode: ThemeModeSetting;
  logger: Logger;
  /**
   * Runs subscriber notifications on the UI's execution context.
   * Defaults to setImmediate.
   */
  dispatch?: (fn: () => void) => void;
  onWarning?: (err: WatchError) => void;
}

/**
 * Owns the current ThemeSpec and the watch lifecycle.
 *
 * At most one resolution runs at a time; a watcher signal that arrives
 * during one schedules exactly one follow-up. Subscribers only hear about
 * specs that differ by value from the last one published.
 */
export class ThemeSynchronizer {
  private readonly resolver: ThemeSource;
  private readonly watcher: SourceWatcher | null;
  private readonly logger: Logger;
  private readonly dispatch: (fn: () => void) => void;
  private readonly subscribers = new Set<ThemeSubscriber>();
  private spec: ThemeSpec | null = null;
  private themeMode: ThemeModeSetting;
  private inFlight: Promise<void> | null = null;
  private followUp = false;
  private started = false;
  private resolutions = 0;

  private readonly onChange = (paths: string[]) => {
    this.logger.debug({ paths }, "theme source changed");
    void this.refresh();
  };

  constructor(options: ThemeSynchronizerOptions) {
    this.resolver = options.resolver;
    this.watcher = options.watcher;
    this.themeMode = options.mode;
    this.logger = options.logger;
    this.dispatch = options.dispatch ?? ((fn) => void setImmediate(fn));
    if (this.watcher && options.onWarning) {
      this.watcher.on("degraded", options.onWarning);
    }
  }

  get current(): ThemeSpec | null {
    return this.spec;
  }

  get mode(): ThemeModeSetting {
    return this.themeMode;
  }

  /** How many resolutions have run; exposed for diagnostics. */
  get resolutionCount(): number {
    return this.resolutions;
  }

  subscribe(fn: ThemeSubscriber): () => void {
    this.subscribers.add(fn);
    return () => {
      this.subscribers.delete(fn);
    };
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    this.watcher?.on("change", this.onChange);
    await this.refresh();
    await this.syncWatching();
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.followUp = false;
    this.watcher?.off("change", this.onChange);
    await this.watcher?.stop();
    await this.inFlight;
  }

  /** Switch between live sources and the forced system theme. */
  async setMode(mode: ThemeModeSetting): Promise<void> {
    if (mode === this.themeMode) return;
    this.themeMode = mode;
    this.logger.info({ mode }, "theme mode changed");
    await this.syncWatching();
    await this.refresh();
  }

  /**
   * Re-resolve now. Resolves once the spec reflecting every request made so
   * far has been computed.
   */
  async refresh(): Promise<void> {
    if (this.inFlight) {
      this.followUp = true;
      return this.inFlight;
    }
    this.inFlight = this.runResolutions().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async runResolutions(): Promise<void> {
    do {
      this.followUp = false;
      this.resolutions += 1;
      try {
        const next = await this.resolver.resolve(this.themeMode);
        this.apply(next);
      } catch (err) {
        // Keep the last good spec; the next change will try again.
        this.logger.error({ err }, "theme resolution failed");
      }
    } while (this.followUp && this.started);
  }

  private apply(next: ThemeSpec): void {
    if (themeEquals(this.spec, next)) return;
    this.spec = next;
    this.dispatch(() => {
      // A newer spec may have replaced this one before we ran.
      if (this.spec !== next) return;
      for (const fn of this.subscribers) {
        try {
          fn(next);
        } catch (err) {
          this.logger.error({ err }, "theme subscriber threw");
        }
      }
    });
  }

  private async syncWatching(): Promise<void> {
    if (!this.watcher) return;
    if (this.started && this.themeMode === "live") {
      await this.watcher.start();
    } else {
      await this.watcher.stop();
    }
  }
}
