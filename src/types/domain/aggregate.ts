import type { Severity } from "./severity.js";
import { SEVERITIES, emptySeverityCounts, isAtLeast } from "./severity.js";
import type { BackendCategory, ScanResult, StructuredScanResult } from "./scan-result.js";
import { BACKEND_CATEGORIES } from "./scan-result.js";

export type CategoryResults = Partial<Record<BackendCategory, ScanResult>>;

export interface ScanAggregate {
  target: string;
  startedAt: string;
  completedAt: string;
  categories: CategoryResults;
  plugins: ScanResult[];
}

export interface AggregateSummary {
  total: number;
  by_severity: Record<Severity, number>;
  has_high_severity: boolean;
  failed_tools: string[];
  tools: string[];
}

export interface StructuredAggregate {
  target: string;
  started_at: string;
  completed_at: string;
  scan_results: Partial<Record<BackendCategory, StructuredScanResult>>;
  plugin_results: StructuredScanResult[];
  summary: AggregateSummary;
}

export function aggregateResults(aggregate: Pick<ScanAggregate, "categories" | "plugins">): ScanResult[] {
  const fromCategories: ScanResult[] = [];
  for (const category of BACKEND_CATEGORIES) {
    const result = aggregate.categories[category];
    if (result) fromCategories.push(result);
  }
  return [...fromCategories, ...aggregate.plugins];
}

export function aggregateHasHighSeverity(aggregate: Pick<ScanAggregate, "categories" | "plugins">): boolean {
  return aggregateResults(aggregate).some((result) => result.hasHighSeverityIssues());
}

export function summarizeAggregate(aggregate: Pick<ScanAggregate, "categories" | "plugins">): AggregateSummary {
  const bySeverity = emptySeverityCounts();
  const failedTools: string[] = [];
  const tools: string[] = [];
  let total = 0;
  for (const result of aggregateResults(aggregate)) {
    tools.push(result.tool);
    if (result.failed) failedTools.push(result.tool);
    const counts = result.countBySeverity();
    for (const severity of SEVERITIES) {
      bySeverity[severity] += counts[severity];
    }
    total += result.vulnerabilities.length;
  }
  return {
    total,
    by_severity: bySeverity,
    has_high_severity: bySeverity.HIGH > 0 || bySeverity.CRITICAL > 0,
    failed_tools: failedTools,
    tools
  };
}

export function aggregateToStructured(aggregate: ScanAggregate): StructuredAggregate {
  const scanResults: Partial<Record<BackendCategory, StructuredScanResult>> = {};
  for (const category of BACKEND_CATEGORIES) {
    const result = aggregate.categories[category];
    if (result) scanResults[category] = result.toStructured();
  }
  return {
    target: aggregate.target,
    started_at: aggregate.startedAt,
    completed_at: aggregate.completedAt,
    scan_results: scanResults,
    plugin_results: aggregate.plugins.map((result) => result.toStructured()),
    summary: summarizeAggregate(aggregate)
  };
}

/** True when any finding is at or above the threshold. */
export function exceedsThreshold(aggregate: Pick<ScanAggregate, "categories" | "plugins">, threshold: Severity): boolean {
  return aggregateResults(aggregate).some((result) =>
    result.vulnerabilities.some((vuln) => isAtLeast(vuln.severity, threshold))
  );
}
