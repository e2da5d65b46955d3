import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ScanAggregate } from "../types/domain/aggregate.js";
import { aggregateResults } from "../types/domain/aggregate.js";
import type { ScanCategory, ScanResult } from "../types/domain/scan-result.js";
import type { Severity } from "../types/domain/severity.js";
import { SEVERITIES, emptySeverityCounts } from "../types/domain/severity.js";

interface MetricsState {
  scans_completed: number;
  vulnerabilities_found: number;
  vulnerabilities_by_severity: Record<Severity, number>;
  scan_types: Partial<Record<ScanCategory, number>>;
  tools_used: Record<string, number>;
  scan_durations: number[];
  last_updated: string | null;
}

export interface MetricsSnapshot extends MetricsState {
  average_scan_duration: number;
  total_scan_time: number;
  average_vulnerabilities_per_scan: number;
}

function initialState(): MetricsState {
  return {
    scans_completed: 0,
    vulnerabilities_found: 0,
    vulnerabilities_by_severity: emptySeverityCounts(),
    scan_types: {},
    tools_used: {},
    scan_durations: [],
    last_updated: null
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Process-lifetime counters. Each `record` call counts as one completed scan
 * and builds the next state before swapping it in, so `snapshot` never sees a
 * half-applied update.
 */
export class MetricsCollector {
  private state: MetricsState = initialState();

  constructor(private readonly now: () => Date = () => new Date()) {}

  record(input: ScanAggregate | Pick<ScanAggregate, "categories" | "plugins"> | readonly ScanResult[]): void {
    const results = "categories" in input ? aggregateResults(input) : input;
    const current = this.state;
    const next: MetricsState = {
      scans_completed: current.scans_completed + 1,
      vulnerabilities_found: current.vulnerabilities_found,
      vulnerabilities_by_severity: { ...current.vulnerabilities_by_severity },
      scan_types: { ...current.scan_types },
      tools_used: { ...current.tools_used },
      scan_durations: [...current.scan_durations],
      last_updated: this.now().toISOString()
    };

    for (const result of results) {
      next.scan_types[result.scanType] = (next.scan_types[result.scanType] ?? 0) + 1;
      next.tools_used[result.tool] = (next.tools_used[result.tool] ?? 0) + 1;
      next.vulnerabilities_found += result.vulnerabilities.length;
      const counts = result.countBySeverity();
      for (const severity of SEVERITIES) {
        next.vulnerabilities_by_severity[severity] += counts[severity];
      }
      if (result.scanDuration > 0) next.scan_durations.push(result.scanDuration);
    }

    this.state = next;
  }

  snapshot(): MetricsSnapshot {
    const state = this.state;
    const total = state.scan_durations.reduce((sum, value) => sum + value, 0);
    return {
      ...state,
      vulnerabilities_by_severity: { ...state.vulnerabilities_by_severity },
      scan_types: { ...state.scan_types },
      tools_used: { ...state.tools_used },
      scan_durations: [...state.scan_durations],
      average_scan_duration: state.scan_durations.length ? total / state.scan_durations.length : 0,
      total_scan_time: total,
      average_vulnerabilities_per_scan: state.scans_completed
        ? round2(state.vulnerabilities_found / state.scans_completed)
        : 0
    };
  }

  reset(): void {
    this.state = initialState();
  }

  async exportTo(filePath: string): Promise<string> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(this.snapshot(), null, 2)}\n`, "utf-8");
    return filePath;
  }
}
