import path from "node:path";
import type { CommandRunner } from "../backends/commandRunner.js";
import type { ToolResolver } from "../backends/toolPaths.js";
import { createScanCache } from "../cache/scanCache.js";
import type { ScanmeshConfig } from "../config/loadConfig.js";
import { loadConfig } from "../config/loadConfig.js";
import { ConfigInvalidValueError } from "../errors/config.errors.js";
import type { ScanOutcome } from "../engine/orchestrator.js";
import { ScanOrchestrator } from "../engine/orchestrator.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import type { MetricsSnapshot } from "../metrics/metricsCollector.js";
import { JsonReportPlugin } from "../plugins/builtin/jsonReport.js";
import { WebhookIntegrationPlugin } from "../plugins/builtin/webhook.js";
import { PluginRegistry } from "../plugins/pluginRegistry.js";
import type { ScanAggregate } from "../types/domain/aggregate.js";
import { exceedsThreshold } from "../types/domain/aggregate.js";
import type { BackendCategory } from "../types/domain/scan-result.js";
import type { Severity } from "../types/domain/severity.js";

export interface RunScanOptions {
  projectRoot: string;
  /** Path or image reference; defaults to the project root. */
  target?: string;
  configPath?: string | null;
  overrides?: Partial<ScanmeshConfig>;
  categories?: BackendCategory[];
  plugins?: string[];
  /** Relative directories resolve against the project root. */
  pluginsDir?: string | null;
  reportDir?: string | null;
  publish?: boolean;
  noCache?: boolean;
  failOn?: Severity | null;
  deadlineMs?: number;
  /** Where to write the metrics snapshot; relative paths resolve against the project root. */
  metricsFile?: string | null;
  logger?: Logger;
  runner?: CommandRunner;
  resolveTool?: ToolResolver;
}

export interface RunScanResult extends ScanOutcome {
  config: ScanmeshConfig;
  metrics: MetricsSnapshot;
  metricsFile: string | null;
  failBuild: boolean;
}

/** Seconds from the command line to milliseconds; anything but a positive number is rejected. */
export function parseDeadline(raw: string | undefined, field = "--deadline"): number | undefined {
  if (raw === undefined) return undefined;
  const seconds = Number(raw.trim());
  if (!raw.trim() || !Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigInvalidValueError(field, raw, "a positive number of seconds");
  }
  return seconds * 1000;
}

/** `failOn` wins over the configured failOnCritical / failOnHigh switches. */
export function shouldFailBuild(
  aggregate: ScanAggregate,
  scanning: Pick<ScanmeshConfig["scanning"], "failOnCritical" | "failOnHigh">,
  failOn?: Severity | null
): boolean {
  if (failOn) return exceedsThreshold(aggregate, failOn);
  if (scanning.failOnHigh && exceedsThreshold(aggregate, "HIGH")) return true;
  return scanning.failOnCritical && exceedsThreshold(aggregate, "CRITICAL");
}

/** Registry with the built-in sinks plus whatever the plugin directory provides, initialized. */
export async function createPluginRegistry(
  config: ScanmeshConfig,
  options: { pluginsDir?: string | null; logger?: Logger } = {}
): Promise<PluginRegistry> {
  const logger = options.logger ?? noopLogger;
  const registry = new PluginRegistry({ logger, concurrency: config.scanning.maxConcurrentScans });
  registry.register(new JsonReportPlugin());
  if (config.plugins.settings.webhook) {
    registry.register(new WebhookIntegrationPlugin());
  }

  const pluginsDir = options.pluginsDir ?? config.plugins.directory;
  if (pluginsDir) {
    await registry.loadFromDirectory(path.resolve(config.projectRoot, pluginsDir));
  }
  await registry.initializeAll(config.plugins.settings);
  return registry;
}

export async function runScan(options: RunScanOptions): Promise<RunScanResult> {
  const logger = options.logger ?? noopLogger;
  const config = await loadConfig({
    projectRoot: options.projectRoot,
    configPath: options.configPath,
    overrides: options.overrides
  });

  const cache = config.cache.enabled && !options.noCache ? createScanCache(config, { logger }) : null;
  const registry = await createPluginRegistry(config, { pluginsDir: options.pluginsDir, logger });
  const orchestrator = new ScanOrchestrator({
    config,
    registry,
    cache,
    logger,
    runner: options.runner,
    resolveTool: options.resolveTool
  });

  const reportDir = options.reportDir ?? config.output.reportDir;
  try {
    const outcome = await orchestrator.scan(options.target ?? config.projectRoot, {
      categories: options.categories,
      plugins: options.plugins,
      reportDir: reportDir ? path.resolve(config.projectRoot, reportDir) : null,
      publish: options.publish,
      deadlineMs: options.deadlineMs
    });
    const metricsFile = options.metricsFile
      ? await orchestrator.metrics.exportTo(path.resolve(config.projectRoot, options.metricsFile))
      : null;
    return {
      ...outcome,
      config,
      metrics: orchestrator.metrics.snapshot(),
      metricsFile,
      failBuild: shouldFailBuild(outcome.aggregate, config.scanning, options.failOn)
    };
  } finally {
    await registry.cleanupAll();
    cache?.close();
  }
}
