import type { Logger } from "../logging/logger.js";
import type { ScanAggregate } from "../types/domain/aggregate.js";
import type { ScanCategory, ScanResult } from "../types/domain/scan-result.js";
import type { JsonRecord } from "../utils/records.js";

export type PluginRole = "scanner" | "report" | "integration";

export type PluginState = "registered" | "ready" | "failed";

export interface PluginBase {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly author: string;
  /** Resolves false when the plugin cannot run with the given settings. */
  initialize(config: JsonRecord): Promise<boolean>;
  cleanup?(): Promise<void>;
  /** Called once on registration with a logger scoped to the plugin. */
  attachLogger?(logger: Logger): void;
}

export interface ScannerPlugin extends PluginBase {
  readonly scanType: ScanCategory;
  readonly fileTypes: readonly string[];
  scan(target: string): Promise<ScanResult>;
  supports?(target: string): Promise<boolean>;
}

export interface ReportSinkPlugin extends PluginBase {
  readonly outputFormat: string;
  /** Returns the path of the written report. */
  generateReport(data: ScanAggregate, outputPath: string): Promise<string>;
}

export interface IntegrationSinkPlugin extends PluginBase {
  readonly serviceName: string;
  connect(): Promise<boolean>;
  sendData(data: ScanAggregate): Promise<boolean>;
}

export type RolePlugin = ScannerPlugin | ReportSinkPlugin | IntegrationSinkPlugin;

function hasMethod(value: object, name: string): boolean {
  const member: unknown = Reflect.get(value, name);
  return typeof member === "function";
}

export function isScannerPlugin(plugin: object): plugin is ScannerPlugin {
  return hasMethod(plugin, "scan");
}

export function isReportSinkPlugin(plugin: object): plugin is ReportSinkPlugin {
  return hasMethod(plugin, "generateReport");
}

export function isIntegrationSinkPlugin(plugin: object): plugin is IntegrationSinkPlugin {
  return hasMethod(plugin, "sendData") && hasMethod(plugin, "connect");
}

/** Every role whose capability the value exhibits; prototypes count. */
export function detectRoles(value: object): PluginRole[] {
  const roles: PluginRole[] = [];
  if (isScannerPlugin(value)) roles.push("scanner");
  if (isReportSinkPlugin(value)) roles.push("report");
  if (isIntegrationSinkPlugin(value)) roles.push("integration");
  return roles;
}

export function isPluginBase(value: unknown): value is PluginBase {
  if (!value || typeof value !== "object") return false;
  return typeof Reflect.get(value, "name") === "string" && hasMethod(value, "initialize");
}
