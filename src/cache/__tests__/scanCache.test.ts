import assert from "node:assert/strict";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import type { TestContext } from "node:test";
import { cacheKey } from "../cacheKey.js";
import { FileCacheStore } from "../fileStore.js";
import { ScanCache } from "../scanCache.js";
import { SqliteCacheStore } from "../sqliteStore.js";
import type { CacheRecord, CacheStore } from "../store.js";
import { ScanResult } from "../../types/domain/scan-result.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";

const lookup = { category: "sast" as const, target: "/repo", backend: "semgrep" };

function sampleResult(): ScanResult {
  return new ScanResult({
    tool: "semgrep",
    target: "/repo",
    scanType: "sast",
    scanDuration: 4.2,
    timestamp: "2026-03-01T10:00:00.000Z",
    metadata: { exit_code: 1 },
    vulnerabilities: [
      createVulnerability({
        id: "rule:app.py:3",
        title: "Use of eval",
        description: "eval on request data",
        severity: "HIGH",
        filePath: "app.py",
        lineNumber: 3,
        tool: "semgrep",
        ruleId: "rule"
      })
    ]
  });
}

async function tempDir(t: TestContext): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "scanmesh-cache-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

function manualClock(start: number) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    }
  };
}

test("cache keys are deterministic sha256 hex digests of the triple", () => {
  const key = cacheKey("sast", "/repo", "semgrep");
  assert.match(key, /^[0-9a-f]{64}$/);
  assert.equal(key, cacheKey("sast", "/repo", "semgrep"));
  assert.notEqual(key, cacheKey("sast", "/repo", "bandit"));
  assert.notEqual(key, cacheKey("sca", "/repo", "semgrep"));
});

test("file store round trip returns an equal result until the TTL elapses", async (t) => {
  const dir = await tempDir(t);
  const clock = manualClock(1_000_000);
  const cache = new ScanCache(new FileCacheStore(dir), { ttlSeconds: 60, now: clock.now });

  await cache.put(lookup, sampleResult());
  const hit = await cache.get(lookup);
  assert.deepEqual(hit?.toStructured(), sampleResult().toStructured());

  clock.advance(59_000);
  assert.ok(await cache.get(lookup));
  clock.advance(1_000);
  assert.equal(await cache.get(lookup), null);
  assert.deepEqual(await readdir(dir), []);
});

test("corrupt entries are misses and are deleted", async (t) => {
  const dir = await tempDir(t);
  const cache = new ScanCache(new FileCacheStore(dir));
  const key = cacheKey(lookup.category, lookup.target, lookup.backend);

  await writeFile(path.join(dir, `${key}.json`), "{truncated", "utf-8");
  assert.equal(await cache.get(lookup), null);
  assert.deepEqual(await readdir(dir), []);

  await writeFile(
    path.join(dir, `${key}.json`),
    JSON.stringify({ key, cached_at: Date.now(), payload: JSON.stringify({ tool: "semgrep" }) }),
    "utf-8"
  );
  assert.equal(await cache.get(lookup), null);
  assert.deepEqual(await readdir(dir), []);
});

test("put overwrites, invalidateAll clears, stats counts expired entries", async (t) => {
  const dir = await tempDir(t);
  const clock = manualClock(0);
  const cache = new ScanCache(new FileCacheStore(dir), { ttlSeconds: 10, now: clock.now });

  await cache.put(lookup, sampleResult());
  clock.advance(20_000);
  await cache.put({ ...lookup, backend: "bandit" }, sampleResult());
  assert.deepEqual(await cache.stats(), { total: 2, valid: 1, expired: 1 });

  await cache.put(lookup, sampleResult());
  assert.deepEqual(await cache.stats(), { total: 2, valid: 2, expired: 0 });

  await cache.invalidateAll();
  assert.deepEqual(await cache.stats(), { total: 0, valid: 0, expired: 0 });
});

test("write failures are logged and never thrown", async () => {
  const warnings: string[] = [];
  const failingStore: CacheStore = {
    read: async () => null,
    write: async () => {
      throw new Error("disk full");
    },
    delete: async () => {},
    clear: async () => {},
    list: async (): Promise<CacheRecord[]> => []
  };
  const cache = new ScanCache(failingStore, {
    logger: {
      debug: () => {},
      info: () => {},
      warn: (message, meta) => warnings.push(`${message}: ${String(meta?.error)}`),
      error: () => {}
    }
  });
  await cache.put(lookup, sampleResult());
  assert.deepEqual(warnings, ["Cache write failed: disk full"]);
});

test("sqlite store keeps one row per key", async (t) => {
  const dir = await tempDir(t);
  const store = new SqliteCacheStore(dir);
  t.after(() => store.close());
  const clock = manualClock(5_000);
  const cache = new ScanCache(store, { now: clock.now });

  await cache.put(lookup, sampleResult());
  await cache.put(lookup, sampleResult());
  const records = await store.list();
  assert.equal(records.length, 1);
  assert.equal(records[0]?.cachedAt, 5_000);
  assert.equal((await cache.get(lookup))?.vulnerabilities[0]?.lineNumber, 3);

  await store.delete(records[0]?.key ?? "");
  assert.equal(await cache.get(lookup), null);
});

test("entries stamped in the future are misses and are deleted", async (t) => {
  const dir = await tempDir(t);
  const clock = manualClock(1_000_000);
  const store = new FileCacheStore(dir);
  const cache = new ScanCache(store, { ttlSeconds: 60, now: clock.now });

  await store.write({
    key: cacheKey(lookup.category, lookup.target, lookup.backend),
    cachedAt: 1_000_000 + 86_400_000,
    payload: JSON.stringify(sampleResult().toStructured())
  });
  assert.equal(await cache.get(lookup), null);
  assert.deepEqual(await readdir(dir), []);
  assert.deepEqual(await cache.stats(), { total: 0, valid: 0, expired: 0 });
});

test("an unusable sqlite state dir degrades to cache misses", async (t) => {
  const dir = await tempDir(t);
  const blocked = path.join(dir, "state");
  await writeFile(blocked, "not a directory\n", "utf-8");
  const warnings: string[] = [];
  const store = new SqliteCacheStore(blocked);
  t.after(() => store.close());
  const cache = new ScanCache(store, {
    logger: {
      debug: () => {},
      info: () => {},
      warn: (message) => warnings.push(message),
      error: () => {}
    }
  });

  assert.equal(await cache.get(lookup), null);
  await cache.put(lookup, sampleResult());
  assert.deepEqual(warnings, ["Cache read failed", "Cache write failed"]);
});
