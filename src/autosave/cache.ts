import { readFile, readdir, rm } from "node:fs/promises";
import { createHash } from "node:crypto";
import { join } from "node:path";
import { z } from "zod";
import { errorCode } from "../errors.js";
import type { Logger } from "../log.js";
import { writeFileAtomic } from "../state/atomic.js";

export interface AutosaveRecord {
  tabId: string;
  timestamp: number;      // epoch ms, non-decreasing per tab
  contentHash: string;    // sha1 of the blob
  blobPath: string;
  filePath: string | null; // where the tab saves to, if it has a file
}

/** Where autosave records and their content live. */
export interface AutosaveCache {
  write(record: Omit<AutosaveRecord, "blobPath">, content: string): Promise<AutosaveRecord>;
  remove(tabId: string): Promise<void>;
  list(): Promise<AutosaveRecord[]>;
  readContent(record: AutosaveRecord): Promise<string>;
}

const RecordSchema = z.object({
  tabId: z.string().min(1),
  timestamp: z.number().nonnegative(),
  contentHash: z.string().min(1),
  blobPath: z.string().min(1),
  filePath: z.string().nullable().default(null),
});

export function hashContent(content: string): string {
  return createHash("sha1").update(content).digest("hex");
}

/** File-name-safe stem for a tab id. Ids we generate are UUIDs and pass through. */
function fileStem(tabId: string): string {
  return /^[A-Za-z0-9_-]{1,128}$/.test(tabId) ? tabId : hashContent(tabId);
}

/**
 * One `<tabId>.txt` blob plus one `<tabId>.json` record per tab under the
 * cache directory. The blob is written before the record so a record never
 * points at a half-written blob.
 */
export class FsAutosaveCache implements AutosaveCache {
  constructor(
    private readonly dir: string,
    private readonly logger: Logger,
  ) {}

  private recordPath(tabId: string): string {
    return join(this.dir, `${fileStem(tabId)}.json`);
  }

  private blobPath(tabId: string): string {
    return join(this.dir, `${fileStem(tabId)}.txt`);
  }

  async write(meta: Omit<AutosaveRecord, "blobPath">, content: string): Promise<AutosaveRecord> {
    const record: AutosaveRecord = { ...meta, blobPath: this.blobPath(meta.tabId) };
    await writeFileAtomic(record.blobPath, content);
    await writeFileAtomic(this.recordPath(meta.tabId), JSON.stringify(record, null, 2) + "\n");
    return record;
  }

  async remove(tabId: string): Promise<void> {
    await rm(this.recordPath(tabId), { force: true });
    await rm(this.blobPath(tabId), { force: true });
  }

  async list(): Promise<AutosaveRecord[]> {
    let entries: string[];
    try {
      entries = await readdir(this.dir);
    } catch (err) {
      if (errorCode(err) !== "ENOENT") this.logger.warn({ err }, "autosave cache unreadable");
      return [];
    }

    const records: AutosaveRecord[] = [];
    for (const name of entries.filter((f) => f.endsWith(".json")).sort()) {
      const path = join(this.dir, name);
      try {
        const parsed = RecordSchema.safeParse(JSON.parse(await readFile(path, "utf-8")));
        if (parsed.success) {
          records.push(parsed.data);
        } else {
          this.logger.warn({ path, issues: parsed.error.issues.length }, "ignoring malformed autosave record");
        }
      } catch (err) {
        this.logger.warn({ err, path }, "ignoring unreadable autosave record");
      }
    }
    return records;
  }

  readContent(record: AutosaveRecord): Promise<string> {
    return readFile(record.blobPath, "utf-8");
  }
}
