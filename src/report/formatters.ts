import pc from "picocolors";
import type { CacheStats } from "../cache/scanCache.js";
import type { MetricsSnapshot } from "../metrics/metricsCollector.js";
import type { PluginInfo } from "../plugins/pluginRegistry.js";
import type { ScanAggregate } from "../types/domain/aggregate.js";
import { aggregateResults, aggregateToStructured, summarizeAggregate } from "../types/domain/aggregate.js";
import type { ScanResult } from "../types/domain/scan-result.js";
import type { Severity } from "../types/domain/severity.js";
import { SEVERITIES, compareSeverity, isAtLeast } from "../types/domain/severity.js";
import type { Vulnerability } from "../types/domain/vulnerability.js";

export type Colors = ReturnType<typeof pc.createColors>;

export interface TextFormatOptions {
  /** Findings below this severity are counted but not listed. */
  threshold?: Severity;
  colors?: Colors;
}

function severityLabel(severity: Severity, c: Colors): string {
  switch (severity) {
    case "CRITICAL":
      return c.bgRed(c.white(" CRITICAL "));
    case "HIGH":
      return c.red("HIGH");
    case "MEDIUM":
      return c.yellow("MEDIUM");
    case "LOW":
      return c.green("LOW");
    case "INFO":
    default:
      return c.blue("INFO");
  }
}

function formatLocation(vuln: Vulnerability): string | null {
  if (!vuln.filePath) return null;
  return vuln.lineNumber ? `${vuln.filePath}:${vuln.lineNumber}` : vuln.filePath;
}

function formatDuration(seconds: number): string {
  return `${seconds.toFixed(1)}s`;
}

function formatResultText(result: ScanResult, threshold: Severity, c: Colors): string[] {
  const count = result.vulnerabilities.length;
  const status =
    result.status === "failed"
      ? c.red("failed")
      : result.status === "no_issues_found"
        ? c.green("no issues")
        : c.yellow(`${count} finding${count === 1 ? "" : "s"}`);
  const lines = [`${c.bold(result.tool)} ${c.dim(`(${result.scanType})`)}  ${status}  ${c.dim(formatDuration(result.scanDuration))}`];

  if (result.failed) {
    lines.push(`  ${c.red(result.error ?? "unknown error")}`);
    return lines;
  }
  const reason = result.metadata.reason;
  if (typeof reason === "string") {
    lines.push(`  ${c.dim(`skipped: ${reason}`)}`);
  }

  const shown = result.vulnerabilities
    .filter((vuln) => isAtLeast(vuln.severity, threshold))
    .sort((a, b) => compareSeverity(b.severity, a.severity));
  for (const vuln of shown) {
    lines.push(`  ${severityLabel(vuln.severity, c)} ${vuln.title}`);
    const details = [formatLocation(vuln), vuln.ruleId ?? null, vuln.cwe ?? null].filter(
      (part): part is string => Boolean(part)
    );
    if (details.length) lines.push(`      ${c.dim(details.join("  "))}`);
  }
  const hidden = count - shown.length;
  if (hidden > 0) {
    lines.push(`  ${c.dim(`${hidden} below ${threshold} not shown`)}`);
  }
  return lines;
}

export function formatScanText(aggregate: ScanAggregate, options: TextFormatOptions = {}): string {
  const c = options.colors ?? pc;
  const threshold = options.threshold ?? "INFO";
  const results = aggregateResults(aggregate);
  if (!results.length) {
    return c.green("No scans were run.");
  }

  const blocks = results.map((result) => formatResultText(result, threshold, c).join("\n"));
  const summary = summarizeAggregate(aggregate);
  const counts = SEVERITIES.map((severity) => `${severity.toLowerCase()} ${summary.by_severity[severity]}`).join(", ");
  const footer = [`Total: ${summary.total} (${counts})`];
  if (summary.failed_tools.length) {
    footer.push(c.red(`Failed: ${summary.failed_tools.join(", ")}`));
  }
  return [...blocks, "", ...footer].join("\n");
}

export function formatScanJson(aggregate: ScanAggregate): string {
  return JSON.stringify(aggregateToStructured(aggregate), null, 2);
}

export function formatCacheStats(stats: CacheStats, ttlSeconds: number): string {
  return `Cache entries: ${stats.total} (valid ${stats.valid}, expired ${stats.expired}), TTL ${ttlSeconds}s`;
}

export function formatPluginList(plugins: readonly PluginInfo[], colors: Colors = pc): string {
  if (!plugins.length) return "No plugins registered.";
  return plugins
    .map((plugin) => {
      const state =
        plugin.state === "ready"
          ? colors.green(plugin.state)
          : plugin.state === "failed"
            ? colors.red(plugin.state)
            : colors.dim(plugin.state);
      const line = `${colors.bold(plugin.name)} v${plugin.version}  ${plugin.role}  ${state}`;
      return plugin.lastError ? `${line}\n  ${colors.dim(plugin.lastError)}` : line;
    })
    .join("\n");
}

export function formatMetrics(snapshot: MetricsSnapshot): string {
  return [
    `Scans: ${snapshot.scans_completed}`,
    `Vulnerabilities: ${snapshot.vulnerabilities_found}`,
    `Average scan duration: ${snapshot.average_scan_duration.toFixed(2)}s`
  ].join("\n");
}
