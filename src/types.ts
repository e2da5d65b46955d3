export type { Severity } from "./types/domain/severity.js";
export type { Vulnerability, VulnerabilityInput, StructuredVulnerability } from "./types/domain/vulnerability.js";
export type {
  BackendCategory,
  ScanCategory,
  ScanMetadata,
  ScanResultInit,
  ScanStatus,
  ScanSummary,
  StructuredScanResult
} from "./types/domain/scan-result.js";
export type {
  AggregateSummary,
  CategoryResults,
  ScanAggregate,
  StructuredAggregate
} from "./types/domain/aggregate.js";
export { ScanResult } from "./types/domain/scan-result.js";
export {
  SEVERITIES,
  compareSeverity,
  emptySeverityCounts,
  isAtLeast,
  isSeverity,
  mapSeverity,
  parseSeverityThreshold,
  severityFromCvss
} from "./types/domain/severity.js";
export { createVulnerability, vulnerabilityToStructured } from "./types/domain/vulnerability.js";
export { BACKEND_CATEGORIES, SCAN_CATEGORIES, isBackendCategory, isScanCategory } from "./types/domain/scan-result.js";
export {
  aggregateHasHighSeverity,
  aggregateResults,
  aggregateToStructured,
  exceedsThreshold,
  summarizeAggregate
} from "./types/domain/aggregate.js";
