import { ConfigInvalidValueError } from "../../errors/config.errors.js";

export const SEVERITIES = ["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"] as const;

export type Severity = (typeof SEVERITIES)[number];

const SEVERITY_RANK: Record<Severity, number> = {
  CRITICAL: 4,
  HIGH: 3,
  MEDIUM: 2,
  LOW: 1,
  INFO: 0
};

// Backend-native labels that are not one of the canonical names.
const SEVERITY_ALIASES: Record<string, Severity> = {
  ERROR: "HIGH",
  WARNING: "MEDIUM",
  WARN: "MEDIUM",
  MODERATE: "MEDIUM",
  NOTE: "INFO",
  NEGLIGIBLE: "INFO",
  UNKNOWN: "INFO"
};

export function isSeverity(value: unknown): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function isAtLeast(severity: Severity, threshold: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

/**
 * Maps a backend-native severity label onto the canonical scale.
 * Unrecognized input of any type lands on INFO.
 */
export function mapSeverity(raw: unknown): Severity {
  if (typeof raw !== "string") return "INFO";
  const value = raw.trim().toUpperCase();
  if (isSeverity(value)) return value;
  return SEVERITY_ALIASES[value] ?? "INFO";
}

export function severityFromCvss(score: number | null | undefined): Severity {
  if (score == null || !Number.isFinite(score)) return "INFO";
  if (score >= 9.0) return "CRITICAL";
  if (score >= 7.0) return "HIGH";
  if (score >= 4.0) return "MEDIUM";
  if (score > 0) return "LOW";
  return "INFO";
}

export function parseSeverityThreshold(raw: unknown, field = "severityThreshold"): Severity {
  const value = typeof raw === "string" ? raw.trim().toUpperCase() : "";
  if (isSeverity(value)) return value;
  throw new ConfigInvalidValueError(field, raw, SEVERITIES.join(" | "));
}

export function emptySeverityCounts(): Record<Severity, number> {
  return { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFO: 0 };
}
