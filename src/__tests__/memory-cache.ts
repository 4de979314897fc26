import type { AutosaveCache, AutosaveRecord } from "../autosave/cache.js";

/** In-process AutosaveCache for tests. */
export class MemoryCache implements AutosaveCache {
  readonly records = new Map<string, AutosaveRecord>();
  readonly blobs = new Map<string, string>();
  readonly writes: Array<{ tabId: string; content: string; timestamp: number }> = [];
  readonly removals: string[] = [];
  /** Number of upcoming writes that fail. */
  failWrites = 0;
  unreadable = new Set<string>();

  async write(meta: Omit<AutosaveRecord, "blobPath">, content: string): Promise<AutosaveRecord> {
    if (this.failWrites > 0) {
      this.failWrites -= 1;
      throw new Error("ENOSPC");
    }
    const record: AutosaveRecord = { ...meta, blobPath: `mem://${meta.tabId}` };
    this.blobs.set(record.blobPath, content);
    this.records.set(meta.tabId, record);
    this.writes.push({ tabId: meta.tabId, content, timestamp: meta.timestamp });
    return record;
  }

  async remove(tabId: string): Promise<void> {
    const record = this.records.get(tabId);
    if (record) this.blobs.delete(record.blobPath);
    this.records.delete(tabId);
    this.removals.push(tabId);
  }

  async list(): Promise<AutosaveRecord[]> {
    return [...this.records.values()];
  }

  async readContent(record: AutosaveRecord): Promise<string> {
    const content = this.blobs.get(record.blobPath);
    if (content === undefined || this.unreadable.has(record.tabId)) throw new Error(`ENOENT: ${record.blobPath}`);
    return content;
  }

  /** Put a record in place as if an earlier run had written it. */
  seed(tabId: string, content: string, timestamp: number, filePath: string | null = null): AutosaveRecord {
    const record: AutosaveRecord = { tabId, timestamp, contentHash: "seeded", blobPath: `mem://${tabId}`, filePath };
    this.records.set(tabId, record);
    this.blobs.set(record.blobPath, content);
    return record;
  }
}
