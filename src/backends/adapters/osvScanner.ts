import type { CommandPlan, ExitCodeTable, ExitOutcome } from "../backend.js";
import { CommandBackend, parseJsonOutput } from "../backend.js";
import type { CommandResult } from "../commandRunner.js";
import type { Severity } from "../../types/domain/severity.js";
import { mapSeverity, severityFromCvss } from "../../types/domain/severity.js";
import type { Vulnerability } from "../../types/domain/vulnerability.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";
import type { JsonRecord } from "../../utils/records.js";
import { readString, toArray, toRecord } from "../../utils/records.js";
import { firstCwe, referenceUrls, relativeTo } from "./shared.js";

const NO_SOURCES_EXIT_CODE = 128;

function extractCvssScore(vuln: JsonRecord): number | undefined {
  for (const entry of toArray(vuln.severity)) {
    const sev = toRecord(entry);
    const type = readString(sev, "type");
    if (type !== "CVSS_V3" && type !== "CVSS_V4" && type !== "CVSS_V2") continue;
    const score = readString(sev, "score");
    const match = score?.match(/(\d+(?:\.\d+)?)\s*$/);
    if (match) return parseFloat(match[1]);
  }
  return undefined;
}

function resolveSeverity(vuln: JsonRecord, cvssScore: number | undefined): Severity {
  if (cvssScore !== undefined) return severityFromCvss(cvssScore);
  return mapSeverity(toRecord(vuln.database_specific).severity);
}

function fixedVersion(vuln: JsonRecord): string | undefined {
  for (const affected of toArray(vuln.affected)) {
    for (const range of toArray(toRecord(affected).ranges)) {
      for (const event of toArray(toRecord(range).events)) {
        const fixed = readString(toRecord(event), "fixed");
        if (fixed) return fixed;
      }
    }
  }
  return undefined;
}

export class OsvScannerBackend extends CommandBackend {
  readonly name = "osv-scanner";
  readonly category = "sca" as const;
  protected readonly exitCodes: ExitCodeTable = { 0: "clean", 1: "findings" };

  protected buildCommand(target: string): CommandPlan {
    return { args: ["--format", "json", "--recursive", target] };
  }

  protected async skipReason(): Promise<string | null> {
    return null;
  }

  protected classifyExit(result: CommandResult): ExitOutcome | null {
    if (result.code === NO_SOURCES_EXIT_CODE && /no package sources found/i.test(result.stderr)) {
      return "empty";
    }
    return super.classifyExit(result);
  }

  protected parseOutput(result: CommandResult, target: string): Vulnerability[] {
    const json = toRecord(parseJsonOutput(this.name, result.stdout, {}));
    const findings: Vulnerability[] = [];

    for (const entry of toArray(json.results)) {
      const sourcePath = readString(toRecord(toRecord(entry).source), "path");
      const filePath = sourcePath ? relativeTo(target, sourcePath) : undefined;

      for (const pkgEntry of toArray(toRecord(entry).packages)) {
        const info = toRecord(toRecord(pkgEntry).package);
        const packageName = readString(info, "name") ?? "unknown";
        const packageVersion = readString(info, "version") ?? "unknown";
        const ecosystem = readString(info, "ecosystem") ?? "unknown";

        for (const vulnEntry of toArray(toRecord(pkgEntry).vulnerabilities)) {
          const vuln = toRecord(vulnEntry);
          const vulnId = readString(vuln, "id") ?? "unknown";
          const cvssScore = extractCvssScore(vuln);
          const fixed = fixedVersion(vuln);
          findings.push(
            createVulnerability({
              id: `${vulnId}:${packageName}@${packageVersion}`,
              title: `${readString(vuln, "summary") ?? vulnId} in ${packageName}@${packageVersion}`,
              description: readString(vuln, "details") ?? `Vulnerable package: ${packageName}@${packageVersion} (${ecosystem})`,
              severity: resolveSeverity(vuln, cvssScore),
              cwe: firstCwe(toRecord(vuln.database_specific).cwe_ids),
              cvssScore,
              filePath,
              tool: this.name,
              ruleId: vulnId,
              recommendation: fixed ? `Upgrade ${packageName} to ${fixed} or later.` : undefined,
              references: referenceUrls(vuln.references)
            })
          );
        }
      }
    }

    return findings;
  }
}
