/**
 * Debounced filesystem watch over theme source paths.
 *
 * Every candidate path is watched whether or not its source currently wins,
 * so an edit to any of them (or the creation of a higher-priority one)
 * triggers re-resolution. Bursts of events, on one path or several, collapse
 * into a single "change" signal.
 *
 * Events:
 *   - "change" (paths: string[]): debounced, the paths that saw events
 *   - "degraded" (err: WatchError): native watch failed (now polling) or polling failed (now disabled)
 */
import { stat } from "node:fs/promises";
import { dirname, sep } from "node:path";
import { EventEmitter } from "node:events";
import { watch as chokidarWatch } from "chokidar";
import { WatchError, describeCause } from "../errors.js";
import type { Logger } from "../log.js";

export interface WatchRegistration {
  close(): Promise<void>;
}

export interface WatchBackend {
  watch(
    paths: string[],
    options: { polling: boolean },
    onEvent: (path: string) => void,
    onError: (err: unknown) => void,
  ): WatchRegistration;
}

/** Per-path bookkeeping. Only the watcher reads or writes these. */
export interface WatchHandle {
  path: string;
  /** What is actually registered: the path, or its nearest existing ancestor. */
  registeredPath: string;
  lastEventTimestamp: number | null;
  pending: boolean;
}

export interface SourceWatcherOptions {
  paths: string[];
  debounceMs: number;
  logger: Logger;
  backend?: WatchBackend;
  exists?: (path: string) => Promise<boolean>;
  now?: () => number;
}

const POLL_INTERVAL_MS = 1000;

// ---------------------------------------------------------------------------
// chokidar backend
// ---------------------------------------------------------------------------

export function chokidarBackend(): WatchBackend {
  return {
    watch(paths, options, onEvent, onError) {
      const watcher = chokidarWatch(paths, {
        persistent: true,
        ignoreInitial: true,
        followSymlinks: true,
        depth: 1,
        usePolling: options.polling,
        interval: POLL_INTERVAL_MS,
        ignorePermissionErrors: true,
      });
      watcher.on("all", (_event, path) => onEvent(path));
      watcher.on("error", onError);
      return { close: () => watcher.close() };
    },
  };
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

function isWithin(child: string, parent: string): boolean {
  return child === parent || child.startsWith(parent.endsWith(sep) ? parent : parent + sep);
}

// ---------------------------------------------------------------------------
// SourceWatcher
// ---------------------------------------------------------------------------

export class SourceWatcher extends EventEmitter {
  private readonly handles = new Map<string, WatchHandle>();
  private readonly debounceMs: number;
  private readonly logger: Logger;
  private readonly backend: WatchBackend;
  private readonly exists: (path: string) => Promise<boolean>;
  private readonly now: () => number;
  private registration: WatchRegistration | null = null;
  private registeredKey = "";
  /** Bumped by every register and stop; a register that sees it move gives up. */
  private generation = 0;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private polling = false;
  private running = false;
  private disabled = false;

  constructor(options: SourceWatcherOptions) {
    super();
    this.debounceMs = options.debounceMs;
    this.logger = options.logger;
    this.backend = options.backend ?? chokidarBackend();
    this.exists = options.exists ?? pathExists;
    this.now = options.now ?? Date.now;
    for (const path of new Set(options.paths)) {
      this.handles.set(path, { path, registeredPath: path, lastEventTimestamp: null, pending: false });
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isPolling(): boolean {
    return this.polling;
  }

  get isDisabled(): boolean {
    return this.disabled;
  }

  /** Snapshot of the per-path state, for diagnostics and tests. */
  watchHandles(): WatchHandle[] {
    return [...this.handles.values()].map((h) => ({ ...h }));
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.disabled = false;
    await this.register();
  }

  async stop(): Promise<void> {
    this.running = false;
    this.generation += 1;
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    for (const handle of this.handles.values()) handle.pending = false;
    await this.closeRegistration();
  }

  // -- registration ---------------------------------------------------------

  private async nearestExisting(path: string): Promise<string | null> {
    let current = path;
    while (true) {
      if (await this.exists(current)) return current;
      const parent = dirname(current);
      if (parent === current) return null;
      current = parent;
    }
  }

  /** (Re)register so every path, or its closest existing ancestor, is watched. */
  private async register(): Promise<void> {
    const generation = ++this.generation;
    const superseded = () => !this.running || this.disabled || generation !== this.generation;
    for (const handle of this.handles.values()) {
      handle.registeredPath = (await this.nearestExisting(handle.path)) ?? handle.path;
    }
    if (superseded()) return;

    const targets = [...new Set([...this.handles.values()].map((h) => h.registeredPath))].sort();
    const key = `${this.polling}|${targets.join("\n")}`;
    if (this.registration && key === this.registeredKey) return;

    await this.closeRegistration();
    if (superseded()) return;
    try {
      this.registration = this.backend.watch(
        targets,
        { polling: this.polling },
        (path) => this.onEvent(path),
        (err) => this.onError(err),
      );
      this.registeredKey = key;
      this.logger.debug({ paths: targets, polling: this.polling }, "watching theme sources");
    } catch (err) {
      this.onError(err);
    }
  }

  private async closeRegistration(): Promise<void> {
    const registration = this.registration;
    this.registration = null;
    this.registeredKey = "";
    if (!registration) return;
    try {
      await registration.close();
    } catch (err) {
      this.logger.warn({ err }, "closing theme watch failed");
    }
  }

  private onError(err: unknown): void {
    if (!this.running || this.disabled) return;
    if (!this.polling) {
      const warning = new WatchError(`native watch failed, falling back to polling: ${describeCause(err)}`, { cause: err });
      this.logger.warn({ err: warning }, "theme watch degraded");
      this.emit("degraded", warning);
      this.polling = true;
      void this.closeRegistration().then(() => this.register());
      return;
    }
    const warning = new WatchError(`polling failed, live theme sync disabled: ${describeCause(err)}`, { cause: err });
    this.logger.warn({ err: warning }, "theme watch disabled");
    this.disabled = true;
    this.emit("degraded", warning);
    void this.closeRegistration();
  }

  // -- events ---------------------------------------------------------------

  private onEvent(eventPath: string): void {
    if (!this.running) return;
    let relevant = false;
    for (const handle of this.handles.values()) {
      // The path itself, something inside it (a theme directory), or an
      // ancestor on the way to a path that does not exist yet.
      if (isWithin(eventPath, handle.path) || isWithin(handle.path, eventPath)) {
        handle.lastEventTimestamp = this.now();
        handle.pending = true;
        relevant = true;
      }
    }
    if (!relevant) return;

    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = setTimeout(() => this.flush(), this.debounceMs);
  }

  private flush(): void {
    this.debounceTimer = null;
    const changed: string[] = [];
    for (const handle of this.handles.values()) {
      if (handle.pending) {
        changed.push(handle.path);
        handle.pending = false;
      }
    }
    if (changed.length === 0 || !this.running) return;
    this.emit("change", changed);
    // Paths may have appeared or vanished; move registrations accordingly.
    this.register().catch((err: unknown) => this.onError(err));
  }
}
