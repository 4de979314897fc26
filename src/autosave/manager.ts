import { PersistenceError } from "../errors.js";
import type { Logger } from "../log.js";
import { hashContent } from "./cache.js";
import type { AutosaveCache, AutosaveRecord } from "./cache.js";

export interface AutosaveManagerOptions {
  cache: AutosaveCache;
  /** Write this long after the last edit... */
  idleMs: number;
  /** ...but never later than this after the first unwritten edit. */
  maxLatencyMs: number;
  logger: Logger;
  now?: () => number;
  onWarning?: (err: PersistenceError) => void;
  /** Called after a record lands on disk (the controller stores its id on the tab). */
  onWritten?: (record: AutosaveRecord) => void;
}

interface TabEntry {
  tabId: string;
  /** Latest in-memory content; null once nothing is left to write. */
  content: string | null;
  filePath: string | null;
  firstUnwrittenAt: number | null;
  idleTimer: ReturnType<typeof setTimeout> | null;
  maxTimer: ReturnType<typeof setTimeout> | null;
  lastHash: string | null;
  lastTimestamp: number;
  /** Writes and removals for one tab run in order on this chain. */
  chain: Promise<void>;
  failing: boolean;
}

/**
 * Periodically snapshots dirty buffers to the autosave cache.
 *
 * A write always takes the content as it is when the write starts, not when
 * it was scheduled. Unchanged content (same hash as the last write) is not
 * rewritten.
 */
export class AutosaveManager {
  private readonly cache: AutosaveCache;
  private readonly idleMs: number;
  private readonly maxLatencyMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly onWarning: ((err: PersistenceError) => void) | undefined;
  private readonly onWritten: ((record: AutosaveRecord) => void) | undefined;
  private readonly tabs = new Map<string, TabEntry>();
  private stopped = false;

  constructor(options: AutosaveManagerOptions) {
    this.cache = options.cache;
    this.idleMs = options.idleMs;
    this.maxLatencyMs = options.maxLatencyMs;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.onWarning = options.onWarning;
    this.onWritten = options.onWritten;
  }

  /** Tabs with an edit not yet written. */
  get pendingTabs(): string[] {
    return [...this.tabs.values()].filter((e) => e.firstUnwrittenAt !== null).map((e) => e.tabId);
  }

  private entry(tabId: string): TabEntry {
    let entry = this.tabs.get(tabId);
    if (!entry) {
      entry = {
        tabId,
        content: null,
        filePath: null,
        firstUnwrittenAt: null,
        idleTimer: null,
        maxTimer: null,
        lastHash: null,
        lastTimestamp: 0,
        chain: Promise.resolve(),
        failing: false,
      };
      this.tabs.set(tabId, entry);
    }
    return entry;
  }

  /**
   * Take over a record written by an earlier run (a recovered tab). Later
   * writes never carry an older timestamp, and its content is not rewritten.
   */
  resume(record: AutosaveRecord): void {
    const entry = this.entry(record.tabId);
    entry.filePath = record.filePath;
    entry.lastHash = record.contentHash;
    entry.lastTimestamp = Math.max(entry.lastTimestamp, record.timestamp);
  }

  /** Note the current content of a dirty tab and schedule a write. */
  recordEdit(tabId: string, content: string, filePath: string | null = null): void {
    if (this.stopped) return;
    const entry = this.entry(tabId);
    entry.content = content;
    entry.filePath = filePath;
    this.schedule(entry);
  }

  /** Write now, without waiting for the idle timer. */
  flush(tabId: string): Promise<void> {
    const entry = this.tabs.get(tabId);
    if (!entry) return Promise.resolve();
    return this.enqueueWrite(entry);
  }

  async flushAll(): Promise<void> {
    await Promise.all([...this.tabs.keys()].map((id) => this.flush(id)));
  }

  /** The buffer was saved to its file: the autosave copy is obsolete. */
  markSaved(tabId: string): Promise<void> {
    const entry = this.entry(tabId);
    this.cancelTimers(entry);
    entry.content = null;
    entry.lastHash = null;
    return this.enqueueRemove(entry);
  }

  /**
   * Timers stop immediately. A dirty tab is flushed and its record kept for
   * recovery; a clean one has its record removed.
   */
  async closeTab(tabId: string, { dirty }: { dirty: boolean }): Promise<void> {
    const entry = this.tabs.get(tabId);
    if (!entry) {
      if (!dirty) await this.removeQuietly(tabId);
      return;
    }
    // Detach first: a failed final write must not reschedule.
    this.tabs.delete(tabId);
    this.cancelTimers(entry);
    if (dirty) {
      await this.enqueueWrite(entry);
    } else {
      entry.content = null;
      await this.enqueueRemove(entry);
    }
  }

  /** Cancel every timer and write what is pending. No writes are scheduled afterwards. */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.flushAll();
  }

  // -- scheduling -----------------------------------------------------------

  private cancelTimers(entry: TabEntry): void {
    if (entry.idleTimer) clearTimeout(entry.idleTimer);
    if (entry.maxTimer) clearTimeout(entry.maxTimer);
    entry.idleTimer = null;
    entry.maxTimer = null;
    entry.firstUnwrittenAt = null;
  }

  private schedule(entry: TabEntry): void {
    if (entry.firstUnwrittenAt === null) {
      entry.firstUnwrittenAt = this.now();
      entry.maxTimer = setTimeout(() => void this.enqueueWrite(entry), this.maxLatencyMs);
    }
    if (entry.idleTimer) clearTimeout(entry.idleTimer);
    entry.idleTimer = setTimeout(() => void this.enqueueWrite(entry), this.idleMs);
  }

  private enqueueWrite(entry: TabEntry): Promise<void> {
    this.cancelTimers(entry);
    entry.chain = entry.chain.then(() => this.write(entry));
    return entry.chain;
  }

  private enqueueRemove(entry: TabEntry): Promise<void> {
    entry.chain = entry.chain.then(() => this.removeQuietly(entry.tabId));
    return entry.chain;
  }

  // -- I/O ------------------------------------------------------------------

  private async write(entry: TabEntry): Promise<void> {
    const content = entry.content;
    if (content === null) return;
    const contentHash = hashContent(content);
    if (contentHash === entry.lastHash) return;

    const timestamp = Math.max(this.now(), entry.lastTimestamp);
    try {
      const record = await this.cache.write(
        { tabId: entry.tabId, timestamp, contentHash, filePath: entry.filePath },
        content,
      );
      entry.lastHash = contentHash;
      entry.lastTimestamp = timestamp;
      entry.failing = false;
      this.logger.debug({ tabId: entry.tabId, bytes: content.length }, "autosaved");
      this.onWritten?.(record);
    } catch (err) {
      const failure = new PersistenceError(entry.tabId, { cause: err });
      this.logger.error({ err: failure }, "autosave write failed");
      if (!entry.failing) this.onWarning?.(failure);
      entry.failing = true;
      // Retry on the next scheduled write; content is still in memory.
      if (!this.stopped && entry.content !== null && this.tabs.get(entry.tabId) === entry) {
        this.schedule(entry);
      }
    }
  }

  private async removeQuietly(tabId: string): Promise<void> {
    try {
      await this.cache.remove(tabId);
    } catch (err) {
      this.logger.warn({ err, tabId }, "could not remove autosave record");
    }
  }
}
