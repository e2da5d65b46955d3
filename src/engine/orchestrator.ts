import path from "node:path";
import { existsSync } from "node:fs";
import type { ScanBackend } from "../backends/backend.js";
import type { BackendFactory } from "../backends/catalog.js";
import { createBackend } from "../backends/catalog.js";
import type { CommandRunner } from "../backends/commandRunner.js";
import type { ToolResolver } from "../backends/toolPaths.js";
import type { ScanCache } from "../cache/scanCache.js";
import type { ScanmeshConfig } from "../config/loadConfig.js";
import {
  ConfigCategoryDisabledError,
  ConfigInvalidTargetError,
  ConfigUnsupportedCategoryError
} from "../errors/config.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger, scopedLogger } from "../logging/logger.js";
import { MetricsCollector } from "../metrics/metricsCollector.js";
import type { PluginOutcome } from "../plugins/pluginRegistry.js";
import { PluginRegistry, toScanResult } from "../plugins/pluginRegistry.js";
import type { CategoryResults, ScanAggregate } from "../types/domain/aggregate.js";
import type { BackendCategory } from "../types/domain/scan-result.js";
import { BACKEND_CATEGORIES, ScanResult, isBackendCategory } from "../types/domain/scan-result.js";
import { runTaskGroup, withDeadline } from "../utils/taskGroup.js";

export interface OrchestratorDeps {
  config: ScanmeshConfig;
  registry?: PluginRegistry;
  /** Null disables caching. */
  cache?: ScanCache | null;
  metrics?: MetricsCollector;
  logger?: Logger;
  backendFactory?: BackendFactory;
  runner?: CommandRunner;
  resolveTool?: ToolResolver;
  now?: () => number;
}

export interface ScanOptions {
  /** Defaults to every enabled category. */
  categories?: readonly BackendCategory[];
  /** Scanner plugin names; all ready scanners when omitted, none when false. */
  plugins?: readonly string[] | false;
  reportDir?: string | null;
  publish?: boolean;
  deadlineMs?: number;
}

export interface ScanOutcome {
  aggregate: ScanAggregate;
  reports: PluginOutcome<string>[];
  published: PluginOutcome<boolean>[];
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Paths on disk are made absolute so cache keys are stable; image references stay as given. */
export function resolveTarget(target: unknown): string {
  if (typeof target !== "string" || !target.trim()) {
    throw new ConfigInvalidTargetError(target);
  }
  const trimmed = target.trim();
  return existsSync(trimmed) ? path.resolve(trimmed) : trimmed;
}

export class ScanOrchestrator {
  readonly registry: PluginRegistry;
  readonly metrics: MetricsCollector;
  private readonly config: ScanmeshConfig;
  private readonly cache: ScanCache | null;
  private readonly logger: Logger;
  private readonly backendFactory: BackendFactory;
  private readonly runner?: CommandRunner;
  private readonly resolveTool?: ToolResolver;
  private readonly now: () => number;
  private readonly backends = new Map<BackendCategory, ScanBackend>();

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config;
    this.logger = deps.logger ?? noopLogger;
    this.registry = deps.registry ?? new PluginRegistry({ logger: this.logger });
    this.cache = deps.cache ?? null;
    this.metrics = deps.metrics ?? new MetricsCollector();
    this.backendFactory = deps.backendFactory ?? createBackend;
    this.runner = deps.runner;
    this.resolveTool = deps.resolveTool;
    this.now = deps.now ?? Date.now;
  }

  /** The designated backend for a category; configuration errors reject. */
  backendFor(category: string): ScanBackend {
    if (!isBackendCategory(category)) {
      throw new ConfigUnsupportedCategoryError(category);
    }
    const existing = this.backends.get(category);
    if (existing) return existing;

    const scanning = this.config.scanning;
    const tool = scanning.tools[category];
    const backend = this.backendFactory(category, tool, {
      timeoutMs: scanning.timeoutSeconds * 1000,
      runner: this.runner,
      resolveTool: this.resolveTool,
      toolPath: scanning.toolPaths[tool] ?? null,
      excludePaths: scanning.excludePaths,
      excludeRules: scanning.excludeRules,
      configs: scanning.semgrepConfigs,
      logger: scopedLogger(this.logger, `backend:${tool}`),
      now: this.now
    });
    this.backends.set(category, backend);
    return backend;
  }

  async runCategory(category: string, target: string): Promise<ScanResult> {
    const result = await this.executeCategory(category, resolveTarget(target));
    this.metrics.record([result]);
    return result;
  }

  async runAll(target: string, categories?: readonly BackendCategory[]): Promise<CategoryResults> {
    const results = await this.collectCategories(resolveTarget(target), categories);
    this.metrics.record({ categories: results, plugins: [] });
    return results;
  }

  async runPlugins(target: string, names?: readonly string[]): Promise<ScanResult[]> {
    const results = await this.executePlugins(resolveTarget(target), names);
    this.metrics.record(results);
    return results;
  }

  /** Categories and scanner plugins in one aggregate, then report and integration sinks. */
  async scan(target: string, options: ScanOptions = {}): Promise<ScanOutcome> {
    const resolved = resolveTarget(target);
    const startedAt = new Date(this.now()).toISOString();
    this.logger.info(`Scanning ${resolved}`);

    const work = Promise.all([
      this.collectCategories(resolved, options.categories),
      options.plugins === false ? Promise.resolve<ScanResult[]>([]) : this.executePlugins(resolved, options.plugins)
    ]);
    const [categories, plugins] = options.deadlineMs ? await withDeadline(work, options.deadlineMs, "scan") : await work;

    const aggregate: ScanAggregate = {
      target: resolved,
      startedAt,
      completedAt: new Date(this.now()).toISOString(),
      categories,
      plugins
    };
    this.metrics.record(aggregate);

    const reports = options.reportDir ? await this.registry.generateReports(aggregate, options.reportDir) : [];
    const published = options.publish ? await this.registry.publish(aggregate) : [];
    return { aggregate, reports, published };
  }

  private async executeCategory(category: string, target: string): Promise<ScanResult> {
    const backend = this.backendFor(category);
    if (!this.config.scanning.enabled[backend.category]) {
      throw new ConfigCategoryDisabledError(backend.category);
    }
    const scanTarget =
      backend.category === "container" && this.config.scanning.containerImage
        ? this.config.scanning.containerImage
        : target;
    const lookup = { category: backend.category, target: scanTarget, backend: backend.name };

    const cached = this.cache ? await this.cache.get(lookup) : null;
    if (cached) {
      this.logger.info(`${backend.name}: cache hit for ${scanTarget}`);
      return cached;
    }

    const result = await backend.execute(scanTarget);
    if (this.cache && !result.failed) {
      await this.cache.put(lookup, result);
    }
    return result;
  }

  /** The registry picks the scanners; a plugin that raises is logged and left out. */
  private async executePlugins(target: string, names?: readonly string[]): Promise<ScanResult[]> {
    const scanners = await this.registry.selectScanners(target, names);
    const outcomes = await runTaskGroup(
      scanners.map((plugin) => ({
        label: plugin.name,
        run: async () => toScanResult(await plugin.scan(target))
      })),
      { concurrency: this.config.scanning.maxConcurrentScans }
    );

    const results: ScanResult[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === "fulfilled") {
        results.push(outcome.value);
      } else {
        this.logger.error(`Scanner plugin ${outcome.label} failed: ${errorMessage(outcome.reason)}`);
      }
    }
    return results;
  }

  private async collectCategories(target: string, categories?: readonly BackendCategory[]): Promise<CategoryResults> {
    const selected = categories ?? BACKEND_CATEGORIES.filter((category) => this.config.scanning.enabled[category]);
    const outcomes = await runTaskGroup(
      selected.map((category) => ({ label: category, run: () => this.executeCategory(category, target) })),
      { concurrency: this.config.scanning.maxConcurrentScans }
    );

    const results: CategoryResults = {};
    outcomes.forEach((outcome, index) => {
      const category = selected[index];
      if (outcome.status === "fulfilled") {
        results[category] = outcome.value;
        return;
      }
      const error = errorMessage(outcome.reason);
      this.logger.error(`${category} scan failed: ${error}`);
      results[category] = ScanResult.failed({
        tool: this.config.scanning.tools[category],
        target,
        scanType: category,
        error,
        scanDuration: 0
      });
    });
    return results;
  }
}
