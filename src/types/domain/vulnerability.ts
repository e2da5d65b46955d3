import type { Severity } from "./severity.js";
import { mapSeverity } from "./severity.js";

export interface Vulnerability {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly severity: Severity;
  readonly cwe?: string;
  readonly cvssScore?: number;
  readonly filePath?: string;
  readonly lineNumber?: number;
  readonly tool: string;
  readonly ruleId?: string;
  readonly recommendation?: string;
  readonly references: readonly string[];
}

export type VulnerabilityInput = Omit<Vulnerability, "severity" | "references"> & {
  severity: Severity | string | null | undefined;
  references?: readonly string[] | null;
};

export interface StructuredVulnerability {
  id: string;
  title: string;
  description: string;
  severity: Severity;
  cwe: string | null;
  cvss_score: number | null;
  file_path: string | null;
  line_number: number | null;
  tool: string;
  rule_id: string | null;
  recommendation: string | null;
  references: string[];
}

function optionalText(value: string | null | undefined): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function optionalNumber(value: number | null | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

export function createVulnerability(input: VulnerabilityInput): Vulnerability {
  const lineNumber = optionalNumber(input.lineNumber);
  const vulnerability: Vulnerability = {
    id: input.id,
    title: input.title,
    description: input.description,
    severity: mapSeverity(input.severity),
    cwe: optionalText(input.cwe),
    cvssScore: optionalNumber(input.cvssScore),
    filePath: optionalText(input.filePath),
    lineNumber: lineNumber && lineNumber > 0 ? Math.trunc(lineNumber) : undefined,
    tool: input.tool,
    ruleId: optionalText(input.ruleId),
    recommendation: optionalText(input.recommendation),
    references: Object.freeze((input.references ?? []).filter((ref) => typeof ref === "string" && ref.length > 0))
  };
  return Object.freeze(vulnerability);
}

export function vulnerabilityToStructured(vuln: Vulnerability): StructuredVulnerability {
  return {
    id: vuln.id,
    title: vuln.title,
    description: vuln.description,
    severity: vuln.severity,
    cwe: vuln.cwe ?? null,
    cvss_score: vuln.cvssScore ?? null,
    file_path: vuln.filePath ?? null,
    line_number: vuln.lineNumber ?? null,
    tool: vuln.tool,
    rule_id: vuln.ruleId ?? null,
    recommendation: vuln.recommendation ?? null,
    references: [...vuln.references]
  };
}
