import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import type { TestContext } from "node:test";
import { loadConfig } from "../loadConfig.js";
import { ConfigFileParseError, ConfigInvalidValueError } from "../../errors/config.errors.js";

const ENV_KEYS = [
  "SCANMESH_SAST_TOOL",
  "SCANMESH_SCA_TOOL",
  "SCANMESH_SECRETS_TOOL",
  "SCANMESH_IAC_TOOL",
  "SCANMESH_CONTAINER_TOOL",
  "SCANMESH_SEMGREP_PATH",
  "SCANMESH_CATEGORIES",
  "SCANMESH_SEMGREP_CONFIG",
  "SCANMESH_TIMEOUT_SECONDS",
  "SCANMESH_MAX_CONCURRENCY",
  "SCANMESH_CONTAINER_IMAGE",
  "SCANMESH_SEVERITY_THRESHOLD",
  "SCANMESH_FAIL_ON_HIGH",
  "SCANMESH_FAIL_ON_CRITICAL",
  "SCANMESH_CACHE_DISABLED",
  "SCANMESH_CACHE_BACKEND",
  "SCANMESH_CACHE_TTL",
  "SCANMESH_PLUGINS_DIR",
  "SCANMESH_OUTPUT_FORMAT",
  "SCANMESH_LOG_LEVEL"
];

const applyEnv = (t: TestContext, env: Record<string, string> = {}) => {
  const snapshot = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));
  for (const key of ENV_KEYS) {
    const value = env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  t.after(() => {
    for (const [key, value] of snapshot) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });
};

async function projectWithConfig(t: TestContext, config?: string): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "scanmesh-config-"));
  t.after(() => rm(dir, { recursive: true, force: true }));
  if (config !== undefined) {
    await writeFile(path.join(dir, "scanmesh.config.json"), config, "utf-8");
  }
  return dir;
}

test("defaults apply without a config file", async (t) => {
  applyEnv(t);
  const dir = await projectWithConfig(t);
  const config = await loadConfig({ projectRoot: dir });

  assert.equal(config.stateDir, path.join(dir, ".scanmesh"));
  assert.deepEqual(config.scanning.tools, {
    sast: "semgrep",
    sca: "osv-scanner",
    secrets: "gitleaks",
    iac: "checkov",
    container: "trivy"
  });
  assert.deepEqual(config.scanning.enabled, { sast: true, sca: true, secrets: true, iac: true, container: true });
  assert.deepEqual(config.scanning.semgrepConfigs, ["auto"]);
  assert.equal(config.scanning.timeoutSeconds, 300);
  assert.equal(config.scanning.maxConcurrentScans, 4);
  assert.equal(config.scanning.severityThreshold, "MEDIUM");
  assert.equal(config.scanning.containerImage, null);
  assert.equal(config.scanning.failOnHigh, true);
  assert.deepEqual(config.cache, { enabled: true, backend: "file", ttlSeconds: 3600 });
  assert.deepEqual(config.plugins, { directory: null, settings: {} });
  assert.deepEqual(config.output, { format: "text", reportDir: null });
  assert.equal(config.logging.level, "info");
});

test("the config file overrides defaults", async (t) => {
  applyEnv(t);
  const dir = await projectWithConfig(
    t,
    JSON.stringify({
      scanning: {
        enabled: { container: false },
        tools: { sast: "bandit", sca: "npm-audit" },
        toolPaths: { bandit: "/opt/bandit/bin/bandit" },
        excludePaths: ["vendor/**"],
        excludeRules: ["python.lang.security.audit.eval"],
        timeoutSeconds: 90,
        maxConcurrentScans: 2.7,
        severityThreshold: "high",
        failOnHigh: false
      },
      cache: { backend: "sqlite", ttlSeconds: 60 },
      plugins: { directory: "plugins", settings: { webhook: { url: "http://localhost:9000/hook" } } },
      output: { format: "json", reportDir: "reports" },
      logging: { level: "debug" }
    })
  );
  const config = await loadConfig({ projectRoot: dir });

  assert.equal(config.scanning.enabled.container, false);
  assert.equal(config.scanning.enabled.sast, true);
  assert.equal(config.scanning.tools.sast, "bandit");
  assert.equal(config.scanning.tools.sca, "npm-audit");
  assert.equal(config.scanning.tools.secrets, "gitleaks");
  assert.deepEqual(config.scanning.toolPaths, { bandit: "/opt/bandit/bin/bandit" });
  assert.deepEqual(config.scanning.excludePaths, ["vendor/**"]);
  assert.deepEqual(config.scanning.excludeRules, ["python.lang.security.audit.eval"]);
  assert.equal(config.scanning.timeoutSeconds, 90);
  assert.equal(config.scanning.maxConcurrentScans, 2);
  assert.equal(config.scanning.severityThreshold, "HIGH");
  assert.equal(config.scanning.failOnHigh, false);
  assert.deepEqual(config.cache, { enabled: true, backend: "sqlite", ttlSeconds: 60 });
  assert.deepEqual(config.plugins, { directory: "plugins", settings: { webhook: { url: "http://localhost:9000/hook" } } });
  assert.deepEqual(config.output, { format: "json", reportDir: "reports" });
  assert.equal(config.logging.level, "debug");
});

test("environment variables win over the config file", async (t) => {
  applyEnv(t, {
    SCANMESH_SAST_TOOL: "semgrep",
    SCANMESH_SEMGREP_PATH: "/usr/local/bin/semgrep",
    SCANMESH_CATEGORIES: "sast, secrets",
    SCANMESH_SEMGREP_CONFIG: "p/owasp-top-ten,p/secrets",
    SCANMESH_TIMEOUT_SECONDS: "45",
    SCANMESH_CONTAINER_IMAGE: "alpine:3.19",
    SCANMESH_FAIL_ON_CRITICAL: "off",
    SCANMESH_CACHE_DISABLED: "yes",
    SCANMESH_LOG_LEVEL: "WARN"
  });
  const dir = await projectWithConfig(t, JSON.stringify({ scanning: { tools: { sast: "bandit" }, timeoutSeconds: 90 } }));
  const config = await loadConfig({ projectRoot: dir });

  assert.equal(config.scanning.tools.sast, "semgrep");
  assert.equal(config.scanning.toolPaths.semgrep, "/usr/local/bin/semgrep");
  assert.deepEqual(config.scanning.enabled, { sast: true, sca: false, secrets: true, iac: false, container: false });
  assert.deepEqual(config.scanning.semgrepConfigs, ["p/owasp-top-ten", "p/secrets"]);
  assert.equal(config.scanning.timeoutSeconds, 45);
  assert.equal(config.scanning.containerImage, "alpine:3.19");
  assert.equal(config.scanning.failOnCritical, false);
  assert.equal(config.cache.enabled, false);
  assert.equal(config.logging.level, "warn");
});

test("an explicit config path is read relative to the project root", async (t) => {
  applyEnv(t);
  const dir = await projectWithConfig(t);
  await writeFile(path.join(dir, "ci.json"), JSON.stringify({ output: { format: "json" } }), "utf-8");
  const config = await loadConfig({ projectRoot: dir, configPath: "ci.json" });
  assert.equal(config.output.format, "json");
});

test("invalid values are rejected with the field name", async (t) => {
  applyEnv(t);
  const cases: [string, string][] = [
    [JSON.stringify({ scanning: { timeoutSeconds: -5 } }), "Invalid value for scanning.timeoutSeconds: -5. Expected a positive number up to 2147483."],
    [JSON.stringify({ scanning: { timeoutSeconds: 3e6 } }), "Invalid value for scanning.timeoutSeconds: 3000000. Expected a positive number up to 2147483."],
    [JSON.stringify({ cache: { ttlSeconds: 0 } }), "Invalid value for cache.ttlSeconds: 0. Expected a positive number."],
    [JSON.stringify({ scanning: { failOnHigh: "sometimes" } }), 'Invalid value for scanning.failOnHigh: "sometimes". Expected true or false.'],
    [JSON.stringify({ cache: { backend: "redis" } }), 'Invalid value for cache.backend: "redis". Expected file | sqlite.'],
    [JSON.stringify({ plugins: { settings: { webhook: "http://x" } } }), 'Invalid value for plugins.settings.webhook: "http://x". Expected an object.']
  ];
  for (const [body, message] of cases) {
    const dir = await projectWithConfig(t, body);
    await assert.rejects(
      loadConfig({ projectRoot: dir }),
      (err: unknown) => err instanceof ConfigInvalidValueError && err.message === message
    );
  }
});

test("non-numeric environment numbers are rejected", async (t) => {
  applyEnv(t);
  const dir = await projectWithConfig(t);
  const cases: [string, string][] = [
    ["SCANMESH_TIMEOUT_SECONDS", "soon"],
    ["SCANMESH_MAX_CONCURRENCY", "many"],
    ["SCANMESH_CACHE_TTL", "1h"]
  ];
  for (const [key, value] of cases) {
    process.env[key] = value;
    await assert.rejects(
      loadConfig({ projectRoot: dir }),
      (err: unknown) =>
        err instanceof ConfigInvalidValueError &&
        err.message === `Invalid value for ${key}: ${JSON.stringify(value)}. Expected a number.`
    );
    delete process.env[key];
  }
});

test("malformed config files are reported", async (t) => {
  applyEnv(t);
  const broken = await projectWithConfig(t, "{ scanning: ");
  await assert.rejects(loadConfig({ projectRoot: broken }), ConfigFileParseError);

  const notObject = await projectWithConfig(t, "[1, 2]");
  await assert.rejects(
    loadConfig({ projectRoot: notObject }),
    (err: unknown) =>
      err instanceof ConfigFileParseError &&
      err.message === `Could not parse ${path.join(notObject, "scanmesh.config.json")}: top level must be a JSON object`
  );
});
