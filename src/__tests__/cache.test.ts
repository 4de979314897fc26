import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FsAutosaveCache, hashContent } from "../autosave/cache.js";
import { silentLogger } from "../log.js";

describe("FsAutosaveCache", () => {
  let dir: string;
  let cache: FsAutosaveCache;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "omnote-cache-test-"));
    cache = new FsAutosaveCache(join(dir, "autosave"), silentLogger());
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes a blob and a record per tab", async () => {
    const record = await cache.write(
      { tabId: "tab-1", timestamp: 1000, contentHash: hashContent("hello"), filePath: "/notes/a.md" },
      "hello",
    );
    expect(record.blobPath).toBe(join(dir, "autosave", "tab-1.txt"));
    expect(readdirSync(join(dir, "autosave")).sort()).toEqual(["tab-1.json", "tab-1.txt"]);
    expect(await cache.readContent(record)).toBe("hello");
    expect(await cache.list()).toEqual([record]);
  });

  it("overwrites a tab's previous record", async () => {
    await cache.write({ tabId: "t", timestamp: 1, contentHash: hashContent("a"), filePath: null }, "a");
    const second = await cache.write({ tabId: "t", timestamp: 2, contentHash: hashContent("b"), filePath: null }, "b");
    expect(await cache.list()).toEqual([second]);
    expect(readFileSync(second.blobPath, "utf-8")).toBe("b");
  });

  it("keeps file names safe for odd tab ids", async () => {
    const record = await cache.write({ tabId: "../../etc/x", timestamp: 1, contentHash: "h", filePath: null }, "x");
    expect(record.blobPath).toBe(join(dir, "autosave", `${hashContent("../../etc/x")}.txt`));
    expect((await cache.list()).map((r) => r.tabId)).toEqual(["../../etc/x"]);
  });

  it("removes both files", async () => {
    await cache.write({ tabId: "t", timestamp: 1, contentHash: "h", filePath: null }, "x");
    await cache.remove("t");
    expect(readdirSync(join(dir, "autosave"))).toEqual([]);
    await expect(cache.remove("t")).resolves.toBeUndefined();
  });

  it("lists nothing when the directory does not exist", async () => {
    expect(await cache.list()).toEqual([]);
  });

  it("skips malformed records", async () => {
    const good = await cache.write({ tabId: "good", timestamp: 5, contentHash: "h", filePath: null }, "x");
    writeFileSync(join(dir, "autosave", "broken.json"), "{ not json");
    writeFileSync(join(dir, "autosave", "partial.json"), JSON.stringify({ tabId: "partial" }));
    expect(await cache.list()).toEqual([good]);
  });

  it("hashes content with sha1", () => {
    expect(hashContent("")).toBe("da39a3ee5e6b4b0d3255bfef95601890afd80709");
  });
});
