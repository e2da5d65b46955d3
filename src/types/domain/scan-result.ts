import { ParseError } from "../../errors/backend.errors.js";
import { ScanResultInvariantError } from "../../errors/model.errors.js";
import { isPlainObject, readNumber, readString, readStringArray, toArray, toRecord } from "../../utils/records.js";
import type { Severity } from "./severity.js";
import { emptySeverityCounts, isSeverity } from "./severity.js";
import type { StructuredVulnerability, Vulnerability } from "./vulnerability.js";
import { createVulnerability, vulnerabilityToStructured } from "./vulnerability.js";

export const SCAN_CATEGORIES = ["sast", "sca", "secrets", "iac", "container", "custom"] as const;

export type ScanCategory = (typeof SCAN_CATEGORIES)[number];

/** Categories that have a designated backend; `custom` is reserved for plugins. */
export const BACKEND_CATEGORIES = ["sast", "sca", "secrets", "iac", "container"] as const;

export type BackendCategory = (typeof BACKEND_CATEGORIES)[number];

export type ScanStatus = "completed" | "failed" | "no_issues_found";

export type ScanMetadata = Record<string, unknown>;

export function isScanCategory(value: unknown): value is ScanCategory {
  return SCAN_CATEGORIES.some((category) => category === value);
}

export function isBackendCategory(value: unknown): value is BackendCategory {
  return BACKEND_CATEGORIES.some((category) => category === value);
}

export interface ScanResultInit {
  tool: string;
  target: string;
  scanType: ScanCategory;
  vulnerabilities: readonly Vulnerability[];
  scanDuration: number;
  timestamp?: string;
  metadata?: ScanMetadata;
}

export interface ScanSummary {
  total: number;
  by_severity: Record<Severity, number>;
  has_high_severity: boolean;
}

export interface StructuredScanResult {
  tool: string;
  target: string;
  scan_type: ScanCategory;
  vulnerabilities: StructuredVulnerability[];
  scan_duration: number;
  timestamp: string;
  metadata: ScanMetadata;
  summary: ScanSummary;
}

export class ScanResult {
  readonly tool: string;
  readonly target: string;
  readonly scanType: ScanCategory;
  readonly vulnerabilities: readonly Vulnerability[];
  readonly scanDuration: number;
  readonly timestamp: string;
  readonly metadata: Readonly<ScanMetadata>;

  constructor(init: ScanResultInit) {
    const metadata = { ...(init.metadata ?? {}) };
    if (metadata.status === "failed" && init.vulnerabilities.length > 0) {
      throw new ScanResultInvariantError(init.tool, init.vulnerabilities.length);
    }
    this.tool = init.tool;
    this.target = init.target;
    this.scanType = init.scanType;
    this.vulnerabilities = Object.freeze([...init.vulnerabilities]);
    this.scanDuration = Math.max(0, init.scanDuration);
    this.timestamp = init.timestamp ?? new Date().toISOString();
    this.metadata = Object.freeze(metadata);
    Object.freeze(this);
  }

  static failed(params: {
    tool: string;
    target: string;
    scanType: ScanCategory;
    error: string;
    scanDuration: number;
    metadata?: ScanMetadata;
  }): ScanResult {
    return new ScanResult({
      tool: params.tool,
      target: params.target,
      scanType: params.scanType,
      vulnerabilities: [],
      scanDuration: params.scanDuration,
      metadata: { ...params.metadata, status: "failed", error: params.error }
    });
  }

  static empty(params: {
    tool: string;
    target: string;
    scanType: ScanCategory;
    scanDuration: number;
    metadata?: ScanMetadata;
  }): ScanResult {
    return new ScanResult({
      tool: params.tool,
      target: params.target,
      scanType: params.scanType,
      vulnerabilities: [],
      scanDuration: params.scanDuration,
      metadata: { ...params.metadata, status: "no_issues_found" }
    });
  }

  get status(): ScanStatus {
    const raw = this.metadata.status;
    if (raw === "failed" || raw === "no_issues_found") return raw;
    return "completed";
  }

  get failed(): boolean {
    return this.status === "failed";
  }

  get error(): string | undefined {
    return typeof this.metadata.error === "string" ? this.metadata.error : undefined;
  }

  countBySeverity(): Record<Severity, number> {
    const counts = emptySeverityCounts();
    for (const vuln of this.vulnerabilities) {
      counts[vuln.severity] += 1;
    }
    return counts;
  }

  hasHighSeverityIssues(): boolean {
    return this.vulnerabilities.some((vuln) => vuln.severity === "HIGH" || vuln.severity === "CRITICAL");
  }

  toStructured(): StructuredScanResult {
    return {
      tool: this.tool,
      target: this.target,
      scan_type: this.scanType,
      vulnerabilities: this.vulnerabilities.map(vulnerabilityToStructured),
      scan_duration: this.scanDuration,
      timestamp: this.timestamp,
      metadata: { ...this.metadata },
      summary: {
        total: this.vulnerabilities.length,
        by_severity: this.countBySeverity(),
        has_high_severity: this.hasHighSeverityIssues()
      }
    };
  }

  static fromStructured(value: unknown): ScanResult {
    if (!isPlainObject(value)) {
      throw new ParseError("scan result", "expected an object");
    }
    const tool = readString(value, "tool");
    const target = readString(value, "target");
    const scanType = value.scan_type;
    const timestamp = readString(value, "timestamp");
    const scanDuration = readNumber(value, "scan_duration");
    if (!tool || !target || !timestamp || scanDuration === undefined || !isScanCategory(scanType)) {
      throw new ParseError("scan result", "missing tool, target, scan_type, timestamp or scan_duration");
    }
    if (!Array.isArray(value.vulnerabilities)) {
      throw new ParseError("scan result", "vulnerabilities must be an array");
    }

    const vulnerabilities = toArray(value.vulnerabilities).map((entry, index) => {
      const record = toRecord(entry);
      const id = readString(record, "id");
      if (!id || !isSeverity(record.severity)) {
        throw new ParseError("scan result", `vulnerability ${index} is missing id or severity`);
      }
      return createVulnerability({
        id,
        title: readString(record, "title") ?? id,
        description: typeof record.description === "string" ? record.description : "",
        severity: record.severity,
        cwe: readString(record, "cwe"),
        cvssScore: readNumber(record, "cvss_score"),
        filePath: readString(record, "file_path"),
        lineNumber: readNumber(record, "line_number"),
        tool: readString(record, "tool") ?? tool,
        ruleId: readString(record, "rule_id"),
        recommendation: readString(record, "recommendation"),
        references: readStringArray(record.references)
      });
    });

    try {
      return new ScanResult({
        tool,
        target,
        scanType,
        vulnerabilities,
        scanDuration,
        timestamp,
        metadata: toRecord(value.metadata)
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ParseError("scan result", message);
    }
  }
}
