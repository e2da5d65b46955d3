import path from "node:path";
import { mkdirSync } from "node:fs";
import Database from "better-sqlite3";
import type { CacheRecord, CacheStore } from "./store.js";

interface CacheRow {
  key: string;
  cached_at: number;
  payload: string;
}

function toRecord(row: CacheRow): CacheRecord {
  return { key: row.key, cachedAt: row.cached_at, payload: row.payload };
}

/** Opens the database on first use so an unusable state dir fails per call, not at construction. */
export class SqliteCacheStore implements CacheStore {
  private handle: Database.Database | null = null;

  constructor(
    private readonly stateDir: string,
    private readonly fileName = "cache.db"
  ) {}

  private db(): Database.Database {
    if (this.handle) return this.handle;
    mkdirSync(this.stateDir, { recursive: true });
    const db = new Database(path.join(this.stateDir, this.fileName));
    try {
      this.init(db);
    } catch (err) {
      db.close();
      throw err;
    }
    this.handle = db;
    return db;
  }

  private init(db: Database.Database) {
    db.pragma("journal_mode = WAL");
    db.exec(`
      CREATE TABLE IF NOT EXISTS scan_cache (
        key TEXT PRIMARY KEY,
        cached_at REAL NOT NULL,
        payload TEXT NOT NULL
      );
    `);
  }

  async read(key: string): Promise<CacheRecord | null> {
    const row = this.db()
      .prepare<[string], CacheRow>("SELECT key, cached_at, payload FROM scan_cache WHERE key = ?")
      .get(key);
    return row ? toRecord(row) : null;
  }

  async write(record: CacheRecord): Promise<void> {
    this.db()
      .prepare(
        `INSERT INTO scan_cache (key, cached_at, payload) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET cached_at = excluded.cached_at, payload = excluded.payload`
      )
      .run(record.key, record.cachedAt, record.payload);
  }

  async delete(key: string): Promise<void> {
    this.db().prepare("DELETE FROM scan_cache WHERE key = ?").run(key);
  }

  async clear(): Promise<void> {
    this.db().exec("DELETE FROM scan_cache");
  }

  async list(): Promise<CacheRecord[]> {
    return this.db()
      .prepare<[], CacheRow>("SELECT key, cached_at, payload FROM scan_cache ORDER BY cached_at")
      .all()
      .map(toRecord);
  }

  close(): void {
    this.handle?.close();
    this.handle = null;
  }
}
