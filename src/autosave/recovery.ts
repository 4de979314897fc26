import type { Logger } from "../log.js";
import { clampActiveIndex, createTab, findTab } from "../state/session.js";
import type { SessionState, TabState } from "../state/types.js";
import type { AutosaveCache, AutosaveRecord } from "./cache.js";

export interface RecoveryPlan {
  /** Records to offer back to the user, oldest first. */
  recover: AutosaveRecord[];
  /** Records whose content is obsolete or expired. */
  purge: AutosaveRecord[];
}

/** What the UI is asked about: the tab as it would be restored, plus its text. */
export interface RecoveryCandidate {
  tab: TabState;
  content: string;
  record: AutosaveRecord;
  /** True when the tab is still in the session (its content is replaced). */
  replacesExisting: boolean;
}

export type ConfirmRecovery = (candidate: RecoveryCandidate) => Promise<boolean>;

export interface RecoverOptions {
  session: SessionState;
  cache: AutosaveCache;
  confirm: ConfirmRecovery;
  logger: Logger;
  retentionMs: number;
  now?: () => number;
}

export interface RecoveryOutcome {
  session: SessionState;
  /** Recovered buffer text by tabId. The editor loads these instead of the files. */
  buffers: Map<string, string>;
  recovered: string[];
  /** The records behind `recovered`, by tabId. */
  records: Map<string, AutosaveRecord>;
  declined: string[];
  purged: string[];
  /** Records left alone because their content could not be read. */
  skipped: string[];
}

/**
 * Decide, per autosave record, whether it is offered back or purged.
 *
 * A record for a tab that is in a cleanly closed session and not dirty is
 * stale: the file on disk already has that content.
 */
export function planRecovery(
  session: SessionState,
  records: AutosaveRecord[],
  now: number,
  retentionMs: number,
): RecoveryPlan {
  const recover: AutosaveRecord[] = [];
  const purge: AutosaveRecord[] = [];

  for (const record of records) {
    const tab = findTab(session, record.tabId);
    if (tab) {
      if (!tab.dirty && session.cleanShutdown) purge.push(record);
      else recover.push(record);
    } else if (now - record.timestamp > retentionMs) {
      purge.push(record);
    } else {
      recover.push(record);
    }
  }

  recover.sort((a, b) => a.timestamp - b.timestamp || a.tabId.localeCompare(b.tabId));
  return { recover, purge };
}

function restoredTab(session: SessionState, record: AutosaveRecord): { tab: TabState; replacesExisting: boolean } {
  const existing = findTab(session, record.tabId);
  if (existing) {
    return {
      tab: { ...existing, filePath: existing.filePath ?? record.filePath, dirty: true, autosaveId: record.tabId },
      replacesExisting: true,
    };
  }
  const tab = createTab({ tabId: record.tabId, filePath: record.filePath, dirty: true });
  return { tab: { ...tab, autosaveId: record.tabId }, replacesExisting: false };
}

/**
 * Run startup reconciliation. Only the in-memory session and the autosave
 * cache are touched; the user's own files are never written.
 */
export async function recover(options: RecoverOptions): Promise<RecoveryOutcome> {
  const { cache, confirm, logger } = options;
  const now = options.now ?? Date.now;
  const records = await cache.list();
  const plan = planRecovery(options.session, records, now(), options.retentionMs);

  const outcome: RecoveryOutcome = {
    session: options.session,
    buffers: new Map(),
    recovered: [],
    records: new Map(),
    declined: [],
    purged: [],
    skipped: [],
  };

  for (const record of plan.purge) {
    await removeRecord(cache, record.tabId, logger);
    outcome.purged.push(record.tabId);
  }

  for (const record of plan.recover) {
    let content: string;
    try {
      content = await cache.readContent(record);
    } catch (err) {
      logger.warn({ err, tabId: record.tabId }, "autosave blob unreadable, skipping");
      outcome.skipped.push(record.tabId);
      continue;
    }

    const { tab, replacesExisting } = restoredTab(outcome.session, record);
    const accepted = await confirm({ tab, content, record, replacesExisting });

    if (accepted) {
      const tabs = replacesExisting
        ? outcome.session.tabs.map((t) => (t.tabId === tab.tabId ? tab : t))
        : [...outcome.session.tabs, tab];
      outcome.session = { ...outcome.session, tabs };
      outcome.buffers.set(tab.tabId, content);
      outcome.recovered.push(tab.tabId);
      outcome.records.set(tab.tabId, record);
      logger.info({ tabId: tab.tabId, filePath: tab.filePath }, "recovered unsaved tab");
      continue;
    }

    await removeRecord(cache, record.tabId, logger);
    outcome.declined.push(record.tabId);
    if (replacesExisting) {
      // The tab reopens from its file, or goes away if it never had one.
      const tabs = tab.filePath === null
        ? outcome.session.tabs.filter((t) => t.tabId !== tab.tabId)
        : outcome.session.tabs.map((t) => (t.tabId === tab.tabId ? { ...t, dirty: false, autosaveId: null } : t));
      outcome.session = { ...outcome.session, tabs };
    }
    logger.info({ tabId: record.tabId }, "discarded autosave");
  }

  outcome.session = {
    ...outcome.session,
    activeTabIndex: clampActiveIndex(outcome.session.activeTabIndex, outcome.session.tabs.length),
  };
  return outcome;
}

async function removeRecord(cache: AutosaveCache, tabId: string, logger: Logger): Promise<void> {
  try {
    await cache.remove(tabId);
  } catch (err) {
    logger.warn({ err, tabId }, "could not remove autosave record");
  }
}
