import path from "node:path";
import { readdir } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { supportsTarget } from "../backends/supports.js";
import { runTaskGroup } from "../utils/taskGroup.js";
import { PluginIdentityError, PluginLifecycleError, PluginRoleError } from "../errors/plugin.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger, scopedLogger } from "../logging/logger.js";
import type { ScanAggregate } from "../types/domain/aggregate.js";
import { ScanResult } from "../types/domain/scan-result.js";
import type { JsonRecord } from "../utils/records.js";
import { toRecord } from "../utils/records.js";
import { BASE_PLUGIN_CLASSES } from "./base.js";
import type {
  IntegrationSinkPlugin,
  PluginBase,
  PluginRole,
  PluginState,
  ReportSinkPlugin,
  RolePlugin,
  ScannerPlugin
} from "./contracts.js";
import {
  detectRoles,
  isIntegrationSinkPlugin,
  isPluginBase,
  isReportSinkPlugin,
  isScannerPlugin
} from "./contracts.js";

type RoleAssignment =
  | { role: "scanner"; plugin: ScannerPlugin }
  | { role: "report"; plugin: ReportSinkPlugin }
  | { role: "integration"; plugin: IntegrationSinkPlugin };

export type PluginRecord = RoleAssignment & {
  state: PluginState;
  lastError: string | null;
};

export interface PluginInfo {
  name: string;
  version: string;
  description: string;
  author: string;
  role: PluginRole;
  state: PluginState;
  lastError: string | null;
}

export type PluginOutcome<T> = { plugin: string; ok: true; value: T } | { plugin: string; ok: false; error: string };

export interface PluginRegistryOptions {
  logger?: Logger;
  concurrency?: number;
}

type PluginClass = new () => unknown;

const PLUGIN_MODULE_EXTENSIONS = new Set([".js", ".mjs"]);

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function classify(plugin: PluginBase): RoleAssignment {
  const roles = detectRoles(plugin);
  if (roles.length !== 1) {
    throw new PluginRoleError(plugin.name, roles);
  }
  if (isScannerPlugin(plugin)) return { role: "scanner", plugin };
  if (isReportSinkPlugin(plugin)) return { role: "report", plugin };
  if (isIntegrationSinkPlugin(plugin)) return { role: "integration", plugin };
  throw new PluginRoleError(plugin.name, []);
}

function validateIdentity(plugin: PluginBase): void {
  if (typeof plugin.name !== "string" || !plugin.name.trim()) {
    throw new PluginIdentityError("name must be a non-empty string");
  }
  if (typeof plugin.version !== "string") {
    throw new PluginIdentityError(`${plugin.name}: version must be a string`);
  }
}

function isPluginClass(value: unknown): value is PluginClass {
  if (typeof value !== "function" || BASE_PLUGIN_CLASSES.includes(value)) return false;
  const prototype: unknown = value.prototype;
  return typeof prototype === "object" && prototype !== null && detectRoles(prototype).length > 0;
}

/**
 * Normalizes what a scanner plugin returns. A plugin bundling its own copy of
 * ScanResult fails `instanceof`, so anything with `toStructured()` is rebuilt
 * from that; plain structured objects are parsed as-is.
 */
export function toScanResult(value: unknown): ScanResult {
  if (value instanceof ScanResult) return value;
  if (typeof value === "object" && value !== null) {
    const toStructured: unknown = Reflect.get(value, "toStructured");
    if (typeof toStructured === "function") {
      const structured: unknown = Reflect.apply(toStructured, value, []);
      return ScanResult.fromStructured(structured);
    }
  }
  return ScanResult.fromStructured(value);
}

export class PluginRegistry {
  private readonly records = new Map<string, PluginRecord>();
  private readonly logger: Logger;
  private readonly concurrency: number | undefined;

  constructor(options: PluginRegistryOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.concurrency = options.concurrency;
  }

  /**
   * Classifies the plugin once and stores it. A name already present is
   * replaced. Returns false for a malformed identity or a plugin with no
   * single role.
   */
  register(plugin: PluginBase): boolean {
    let assignment: RoleAssignment;
    try {
      validateIdentity(plugin);
      assignment = classify(plugin);
    } catch (err) {
      this.logger.error(`Rejected plugin: ${errorMessage(err)}`);
      return false;
    }

    if (this.records.has(plugin.name)) {
      this.logger.warn(`Plugin ${plugin.name} is already registered; replacing it`);
    }
    plugin.attachLogger?.(scopedLogger(this.logger, `plugin:${plugin.name}`));
    this.records.set(plugin.name, { ...assignment, state: "registered", lastError: null });
    this.logger.info(`Registered ${assignment.role} plugin ${plugin.name} v${plugin.version}`);
    return true;
  }

  async unregister(name: string): Promise<boolean> {
    const record = this.records.get(name);
    if (!record) return false;
    this.records.delete(name);
    await this.teardown(record.plugin);
    this.logger.info(`Unregistered plugin ${name}`);
    return true;
  }

  get(name: string): RolePlugin | undefined {
    return this.records.get(name)?.plugin;
  }

  getByRole(role: "scanner"): ScannerPlugin[];
  getByRole(role: "report"): ReportSinkPlugin[];
  getByRole(role: "integration"): IntegrationSinkPlugin[];
  getByRole(role: PluginRole): RolePlugin[] {
    return [...this.records.values()].filter((record) => record.role === role).map((record) => record.plugin);
  }

  list(): PluginInfo[] {
    return [...this.records.values()].map((record) => ({
      name: record.plugin.name,
      version: record.plugin.version,
      description: record.plugin.description ?? "",
      author: record.plugin.author ?? "",
      role: record.role,
      state: record.state,
      lastError: record.lastError
    }));
  }

  get size(): number {
    return this.records.size;
  }

  /** Initializes every plugin with its own settings block; returns how many are ready. */
  async initializeAll(settings: Record<string, JsonRecord> = {}): Promise<number> {
    let ready = 0;
    for (const name of [...this.records.keys()]) {
      if (await this.initialize(name, settings[name] ?? {})) ready += 1;
    }
    this.logger.info(`Initialized ${ready}/${this.records.size} plugin(s)`);
    return ready;
  }

  async initialize(name: string, config: JsonRecord = {}): Promise<boolean> {
    const record = this.records.get(name);
    if (!record) {
      this.logger.warn(`Cannot initialize unknown plugin ${name}`);
      return false;
    }
    try {
      const ok = await record.plugin.initialize(config);
      if (!ok) {
        throw new Error("initialize() returned false");
      }
      record.state = "ready";
      record.lastError = null;
      return true;
    } catch (err) {
      const failure = new PluginLifecycleError(name, "initialize", errorMessage(err));
      record.state = "failed";
      record.lastError = failure.message;
      this.logger.error(failure.message);
      return false;
    }
  }

  private ready(): PluginRecord[] {
    return [...this.records.values()].filter((record) => record.state === "ready");
  }

  /**
   * Ready scanners, optionally restricted to `names`, that accept the target.
   * Running them is up to the caller (see ScanOrchestrator.runPlugins).
   */
  async selectScanners(target: string, names?: readonly string[]): Promise<ScannerPlugin[]> {
    const wanted = names?.length ? new Set(names) : null;
    const selected: ScannerPlugin[] = [];
    for (const record of this.ready()) {
      if (record.role !== "scanner") continue;
      if (wanted && !wanted.has(record.plugin.name)) continue;
      const plugin = record.plugin;
      try {
        const supported = plugin.supports
          ? await plugin.supports(target)
          : await supportsTarget(target, plugin.fileTypes);
        if (supported) selected.push(plugin);
      } catch (err) {
        this.logger.warn(`Scanner plugin ${plugin.name} could not check ${target}: ${errorMessage(err)}`);
      }
    }
    return selected;
  }

  async generateReports(data: ScanAggregate, outputDir: string): Promise<PluginOutcome<string>[]> {
    const sinks: ReportSinkPlugin[] = [];
    for (const record of this.ready()) {
      if (record.role === "report") sinks.push(record.plugin);
    }
    return await this.runSinks(
      "Report",
      sinks.map((plugin) => ({ label: plugin.name, run: () => plugin.generateReport(data, outputDir) }))
    );
  }

  async publish(data: ScanAggregate): Promise<PluginOutcome<boolean>[]> {
    const sinks: IntegrationSinkPlugin[] = [];
    for (const record of this.ready()) {
      if (record.role === "integration") sinks.push(record.plugin);
    }
    return await this.runSinks(
      "Integration",
      sinks.map((plugin) => ({
        label: plugin.name,
        run: async () => {
          if (!(await plugin.connect())) {
            throw new Error(`could not connect to ${plugin.serviceName}`);
          }
          return await plugin.sendData(data);
        }
      }))
    );
  }

  private async runSinks<T>(kind: string, tasks: { label: string; run: () => Promise<T> }[]): Promise<PluginOutcome<T>[]> {
    const outcomes = await runTaskGroup(tasks, { concurrency: this.concurrency });
    return outcomes.map((outcome): PluginOutcome<T> => {
      if (outcome.status === "fulfilled") {
        return { plugin: outcome.label, ok: true, value: outcome.value };
      }
      const error = errorMessage(outcome.reason);
      this.logger.error(`${kind} plugin ${outcome.label} failed: ${error}`);
      return { plugin: outcome.label, ok: false, error };
    });
  }

  /** Tears every plugin down concurrently. Failures are logged; this never rejects. */
  async cleanupAll(): Promise<void> {
    const records = [...this.records.values()];
    await runTaskGroup(
      records.map((record) => ({ label: record.plugin.name, run: () => this.teardown(record.plugin) }))
    );
    for (const record of records) {
      record.state = "registered";
    }
  }

  private async teardown(plugin: PluginBase): Promise<void> {
    if (!plugin.cleanup) return;
    try {
      await plugin.cleanup();
    } catch (err) {
      this.logger.error(new PluginLifecycleError(plugin.name, "cleanup", errorMessage(err)).message);
    }
  }

  /**
   * Imports every `.js`/`.mjs` module in `dir` (files starting with `_` are
   * skipped) and registers the plugin classes and instances they export.
   * Returns how many plugins were registered.
   */
  async loadFromDirectory(dir: string): Promise<number> {
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (err) {
      this.logger.error(`Cannot read plugin directory ${dir}: ${errorMessage(err)}`);
      return 0;
    }

    let count = 0;
    const files = names
      .filter((name) => PLUGIN_MODULE_EXTENSIONS.has(path.extname(name)) && !name.startsWith("_"))
      .sort();
    for (const name of files) {
      const filePath = path.join(dir, name);
      let exported: JsonRecord;
      try {
        const mod: unknown = await import(pathToFileURL(filePath).href);
        exported = toRecord(mod);
      } catch (err) {
        this.logger.error(new PluginLifecycleError(name, "load", errorMessage(err)).message);
        continue;
      }
      for (const [exportName, value] of Object.entries(exported)) {
        const plugin = this.instantiate(name, exportName, value);
        if (plugin && this.register(plugin)) count += 1;
      }
    }
    this.logger.info(`Loaded ${count} plugin(s) from ${dir}`);
    return count;
  }

  private instantiate(fileName: string, exportName: string, value: unknown): PluginBase | null {
    if (isPluginClass(value)) {
      let instance: unknown;
      try {
        instance = new value();
      } catch (err) {
        this.logger.error(new PluginLifecycleError(`${fileName}#${exportName}`, "load", errorMessage(err)).message);
        return null;
      }
      if (isPluginBase(instance)) return instance;
      this.logger.warn(`${fileName}#${exportName} does not expose a plugin name and initialize()`);
      return null;
    }
    if (isPluginBase(value) && detectRoles(value).length > 0) return value;
    return null;
  }
}
