/** One stored scan result. `payload` is the JSON of `ScanResult.toStructured()`. */
export interface CacheRecord {
  key: string;
  cachedAt: number;
  payload: string;
}

export interface CacheStore {
  read(key: string): Promise<CacheRecord | null>;
  write(record: CacheRecord): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  list(): Promise<CacheRecord[]>;
  close?(): void;
}
