import path from "node:path";
import { randomUUID } from "node:crypto";
import { mkdir, readdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { readNumber, readString, toRecord } from "../utils/records.js";
import type { CacheRecord, CacheStore } from "./store.js";

const ENTRY_SUFFIX = ".json";

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * One `<key>.json` file per entry. Writes go to a temp file that is renamed
 * into place, so a reader sees the old entry or the new one.
 */
export class FileCacheStore implements CacheStore {
  constructor(private readonly dir: string) {}

  private entryPath(key: string): string {
    return path.join(this.dir, `${key}${ENTRY_SUFFIX}`);
  }

  async read(key: string): Promise<CacheRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.entryPath(key), "utf-8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    // An unreadable envelope comes back with cachedAt NaN so the cache treats it as corrupt.
    let parsed: unknown = null;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = null;
    }
    const envelope = toRecord(parsed);
    return {
      key,
      cachedAt: readNumber(envelope, "cached_at") ?? Number.NaN,
      payload: readString(envelope, "payload") ?? ""
    };
  }

  async write(record: CacheRecord): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const finalPath = this.entryPath(record.key);
    const tempPath = `${finalPath}.${randomUUID()}.tmp`;
    const body = JSON.stringify({ key: record.key, cached_at: record.cachedAt, payload: record.payload });
    await writeFile(tempPath, body, "utf-8");
    try {
      await rename(tempPath, finalPath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }
  }

  async delete(key: string): Promise<void> {
    await rm(this.entryPath(key), { force: true });
  }

  async clear(): Promise<void> {
    for (const key of await this.keys()) {
      await this.delete(key);
    }
  }

  async list(): Promise<CacheRecord[]> {
    const records: CacheRecord[] = [];
    for (const key of await this.keys()) {
      const record = await this.read(key);
      if (record) records.push(record);
    }
    return records;
  }

  private async keys(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return names.filter((name) => name.endsWith(ENTRY_SUFFIX)).map((name) => name.slice(0, -ENTRY_SUFFIX.length));
  }
}
