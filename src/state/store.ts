import { readFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import { PersistenceError, StateCorruptError, errorCode } from "../errors.js";
import type { Logger } from "../log.js";
import { writeFileAtomic } from "./atomic.js";
import { clampActiveIndex } from "./session.js";
import { SESSION_VERSION, defaultGeometry, defaultSession } from "./types.js";
import type { SessionState, TabState } from "./types.js";

// ---------------------------------------------------------------------------
// Schemas (unknown fields are stripped, so newer files still load)
// ---------------------------------------------------------------------------

const GeometrySchema = z.object({
  width: z.number().int().positive().default(800),
  height: z.number().int().positive().default(600),
  maximized: z.boolean().default(false),
  x: z.number().int().nullable().default(null),
  y: z.number().int().nullable().default(null),
});

const TabSchema = z.object({
  tabId: z.string().min(1),
  filePath: z.string().nullable().default(null),
  cursorOffset: z.number().int().nonnegative().default(0),
  scrollOffset: z.number().nonnegative().default(0),
  dirty: z.boolean().default(false),
  autosaveId: z.string().nullable().default(null),
  showLineNumbers: z.boolean().default(false),
});

const SessionSchema = z.object({
  version: z.number().int().positive(),
  tabs: z.array(TabSchema),
  activeTabIndex: z.number().int().default(0),
  windowGeometry: GeometrySchema.default(defaultGeometry()),
  themeMode: z.enum(["live", "forced-system"]).default("live"),
  cleanShutdown: z.boolean().default(true),
});

/** Files written before the rename, single-file `{ path }` or snake_case tabs. */
const LegacyTabSchema = z.object({
  file_path: z.string().nullable().optional(),
  show_line_numbers: z.boolean().optional(),
  unsaved_content: z.string().nullable().optional(),
});

const LegacyGeometrySchema = z.object({
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  maximized: z.boolean().optional(),
  x: z.number().int().nullable().optional(),
  y: z.number().int().nullable().optional(),
});

const LegacySchema = z.object({
  path: z.string().nullable().optional(),
  tabs: z.array(LegacyTabSchema).optional(),
  active_tab_index: z.number().int().optional(),
  geometry: LegacyGeometrySchema.optional(),
});

type LegacyTab = z.infer<typeof LegacyTabSchema>;
type LegacyState = z.infer<typeof LegacySchema>;

export interface StateStoreOptions {
  stateFile: string;
  legacyStateFile?: string;
  logger: Logger;
  writeFile?: (path: string, data: string) => Promise<void>;
}

export interface LoadedSession {
  session: SessionState;
  /** Unsaved buffers the legacy format kept inline, keyed by the new tabId. */
  legacyBuffers: Map<string, string>;
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function fromLegacy(legacy: LegacyState): LoadedSession {
  const legacyBuffers = new Map<string, string>();
  const tabs: TabState[] = [];
  const sourceTabs: LegacyTab[] = legacy.tabs ?? (legacy.path ? [{ file_path: legacy.path }] : []);

  for (const t of sourceTabs) {
    const tabId = randomUUID();
    const unsaved = t.unsaved_content ?? null;
    if (unsaved !== null) legacyBuffers.set(tabId, unsaved);
    tabs.push({
      tabId,
      filePath: t.file_path ?? null,
      cursorOffset: 0,
      scrollOffset: 0,
      dirty: unsaved !== null,
      autosaveId: null,
      showLineNumbers: t.show_line_numbers ?? false,
    });
  }

  const g = legacy.geometry ?? {};
  const base = defaultGeometry();
  return {
    session: {
      ...defaultSession(),
      tabs,
      activeTabIndex: clampActiveIndex(legacy.active_tab_index ?? 0, tabs.length),
      windowGeometry: {
        width: g.width ?? base.width,
        height: g.height ?? base.height,
        maximized: g.maximized ?? base.maximized,
        x: g.x ?? null,
        y: g.y ?? null,
      },
      cleanShutdown: legacyBuffers.size === 0,
    },
    legacyBuffers,
  };
}

/** Decode a state document; throws a StateCorruptError describing why it failed. */
export function decodeSession(text: string, path = "state.json"): LoadedSession {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StateCorruptError(path, "invalid JSON", { cause: err });
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new StateCorruptError(path, "not an object");
  }

  if (!("version" in raw)) {
    const legacy = LegacySchema.safeParse(raw);
    if (!legacy.success) throw new StateCorruptError(path, legacy.error.message);
    return fromLegacy(legacy.data);
  }

  const parsed = SessionSchema.safeParse(raw);
  if (!parsed.success) throw new StateCorruptError(path, parsed.error.message);
  const session: SessionState = {
    ...parsed.data,
    version: SESSION_VERSION,
    activeTabIndex: clampActiveIndex(parsed.data.activeTabIndex, parsed.data.tabs.length),
  };
  return { session, legacyBuffers: new Map() };
}

export function encodeSession(session: SessionState): string {
  return JSON.stringify({ ...session, version: SESSION_VERSION }, null, 2) + "\n";
}

// ---------------------------------------------------------------------------
// StateStore
// ---------------------------------------------------------------------------

/**
 * Sole owner of the session file. Loads never throw; saves are atomic and
 * go through a single writer: overlapping `save` calls coalesce so only the
 * latest state still waiting is written next.
 */
export class StateStore {
  private readonly stateFile: string;
  private readonly legacyStateFile: string | undefined;
  private readonly logger: Logger;
  private readonly writeFile: (path: string, data: string) => Promise<void>;
  private pending: SessionState | null = null;
  private writing: Promise<void> | null = null;

  constructor(options: StateStoreOptions) {
    this.stateFile = options.stateFile;
    this.legacyStateFile = options.legacyStateFile;
    this.logger = options.logger;
    this.writeFile = options.writeFile ?? writeFileAtomic;
  }

  get path(): string {
    return this.stateFile;
  }

  async load(): Promise<SessionState> {
    return (await this.loadWithLegacy()).session;
  }

  /**
   * Like `load`, plus any inline unsaved buffers found in a legacy file.
   * Chain: state.json → legacy micropad state.json (copied forward once) → default.
   */
  async loadWithLegacy(): Promise<LoadedSession> {
    const current = await this.readDocument(this.stateFile);
    if (current.status === "ok") return current.loaded;

    if (this.legacyStateFile) {
      const legacy = await this.readDocument(this.legacyStateFile);
      if (legacy.status === "ok") {
        this.logger.info({ from: this.legacyStateFile }, "loaded legacy state");
        if (current.status === "missing") {
          // Copy forward; the old file is left in place.
          await this.save(legacy.loaded.session).catch((err: unknown) => {
            this.logger.warn({ err }, "could not migrate legacy state");
          });
        }
        return legacy.loaded;
      }
    }
    return { session: defaultSession(), legacyBuffers: new Map() };
  }

  private async readDocument(
    path: string,
  ): Promise<{ status: "ok"; loaded: LoadedSession } | { status: "missing" } | { status: "corrupt" }> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (errorCode(err) === "ENOENT") return { status: "missing" };
      this.logger.warn({ err, path }, "state file unreadable");
      return { status: "corrupt" };
    }
    try {
      return { status: "ok", loaded: decodeSession(text, path) };
    } catch (err) {
      this.logger.warn({ err }, "state file corrupt, using default session");
      return { status: "corrupt" };
    }
  }

  /** Persist `session`. Resolves once it (or a newer state) is on disk. */
  save(session: SessionState): Promise<void> {
    this.pending = session;
    if (!this.writing) {
      this.writing = this.drain().finally(() => {
        this.writing = null;
      });
    }
    return this.writing;
  }

  /** Wait for any write in progress. */
  async flush(): Promise<void> {
    while (this.writing) {
      await this.writing.catch(() => undefined);
    }
  }

  private async drain(): Promise<void> {
    while (this.pending) {
      const next = this.pending;
      this.pending = null;
      try {
        await this.writeFile(this.stateFile, encodeSession(next));
      } catch (err) {
        // Keep the newest state queued so the next save retries it.
        this.pending = this.pending ?? next;
        const failure = new PersistenceError(this.stateFile, { cause: err });
        this.logger.error({ err: failure }, "state save failed");
        throw failure;
      }
    }
  }
}
