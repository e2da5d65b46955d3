import path from "node:path";
import { DEFAULT_CACHE_TTL_SECONDS } from "../config/defaults.js";
import type { ScanmeshConfig } from "../config/loadConfig.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import { ScanResult } from "../types/domain/scan-result.js";
import type { ScanCategory } from "../types/domain/scan-result.js";
import { cacheKey } from "./cacheKey.js";
import { FileCacheStore } from "./fileStore.js";
import { SqliteCacheStore } from "./sqliteStore.js";
import type { CacheStore } from "./store.js";

export interface ScanCacheOptions {
  ttlSeconds?: number;
  logger?: Logger;
  /** Milliseconds since epoch. */
  now?: () => number;
}

export interface CacheStats {
  total: number;
  valid: number;
  expired: number;
}

export interface CacheLookup {
  category: ScanCategory;
  target: string;
  backend: string;
}

export class ScanCache {
  readonly ttlSeconds: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly store: CacheStore,
    options: ScanCacheOptions = {}
  ) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  private isFresh(cachedAt: number): boolean {
    if (!Number.isFinite(cachedAt)) return false;
    // Entries stamped in the future cannot be aged.
    const age = this.now() - cachedAt;
    return age >= 0 && age / 1000 < this.ttlSeconds;
  }

  /** Expired or unreadable entries are deleted and reported as a miss. */
  async get(lookup: CacheLookup): Promise<ScanResult | null> {
    const key = cacheKey(lookup.category, lookup.target, lookup.backend);
    try {
      const record = await this.store.read(key);
      if (!record) return null;
      if (!this.isFresh(record.cachedAt)) {
        this.logger.debug("Cache entry expired", { key, backend: lookup.backend });
        await this.store.delete(key);
        return null;
      }
      try {
        return ScanResult.fromStructured(JSON.parse(record.payload));
      } catch (err) {
        this.logger.warn("Discarding corrupt cache entry", {
          key,
          error: err instanceof Error ? err.message : String(err)
        });
        await this.store.delete(key);
        return null;
      }
    } catch (err) {
      this.logger.warn("Cache read failed", { key, error: err instanceof Error ? err.message : String(err) });
      return null;
    }
  }

  async put(lookup: CacheLookup, result: ScanResult): Promise<void> {
    const key = cacheKey(lookup.category, lookup.target, lookup.backend);
    try {
      await this.store.write({ key, cachedAt: this.now(), payload: JSON.stringify(result.toStructured()) });
    } catch (err) {
      this.logger.warn("Cache write failed", { key, error: err instanceof Error ? err.message : String(err) });
    }
  }

  async invalidateAll(): Promise<void> {
    await this.store.clear();
  }

  async stats(): Promise<CacheStats> {
    const records = await this.store.list();
    const valid = records.filter((record) => this.isFresh(record.cachedAt)).length;
    return { total: records.length, valid, expired: records.length - valid };
  }

  close(): void {
    this.store.close?.();
  }
}

export function createCacheStore(config: Pick<ScanmeshConfig, "stateDir" | "cache">): CacheStore {
  if (config.cache.backend === "sqlite") {
    return new SqliteCacheStore(config.stateDir);
  }
  return new FileCacheStore(path.join(config.stateDir, "cache"));
}

export function createScanCache(
  config: Pick<ScanmeshConfig, "stateDir" | "cache">,
  options: Omit<ScanCacheOptions, "ttlSeconds"> = {}
): ScanCache {
  return new ScanCache(createCacheStore(config), { ...options, ttlSeconds: config.cache.ttlSeconds });
}
