import { existsSync } from "node:fs";
import type { CommandPlan, ExitCodeTable } from "../backend.js";
import { CommandBackend, parseJsonOutput } from "../backend.js";
import type { CommandResult } from "../commandRunner.js";
import { mapSeverity } from "../../types/domain/severity.js";
import type { Vulnerability } from "../../types/domain/vulnerability.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";
import type { JsonRecord } from "../../utils/records.js";
import { readNumber, readString, readStringArray, toArray, toRecord } from "../../utils/records.js";
import { firstCwe } from "./shared.js";

/** Highest score across the vendor CVSS blocks (nvd, ghsa, redhat...). */
function bestCvssScore(vuln: JsonRecord): number | undefined {
  let best: number | undefined;
  for (const vendor of Object.values(toRecord(vuln.CVSS))) {
    const score = readNumber(toRecord(vendor), "V3Score", "V2Score");
    if (score !== undefined && (best === undefined || score > best)) best = score;
  }
  return best;
}

export class TrivyBackend extends CommandBackend {
  readonly name = "trivy";
  readonly category = "container" as const;
  protected readonly exitCodes: ExitCodeTable = { 0: "clean", 1: "findings" };

  // Targets that are not paths are treated as image references.
  protected async skipReason(): Promise<string | null> {
    return null;
  }

  protected buildCommand(target: string): CommandPlan {
    const mode = existsSync(target) ? "fs" : "image";
    const args = [mode, "--format", "json", "--quiet"];
    if (mode === "fs") {
      for (const exclude of this.excludePaths) {
        args.push("--skip-dirs", exclude);
      }
    }
    args.push(target);
    return { args };
  }

  protected parseOutput(result: CommandResult): Vulnerability[] {
    const json = toRecord(parseJsonOutput(this.name, result.stdout, {}));
    const findings: Vulnerability[] = [];

    for (const entry of toArray(json.Results)) {
      const section = toRecord(entry);
      const location = readString(section, "Target");

      for (const vulnEntry of toArray(section.Vulnerabilities)) {
        const vuln = toRecord(vulnEntry);
        const vulnId = readString(vuln, "VulnerabilityID") ?? "unknown";
        const pkg = readString(vuln, "PkgName") ?? "unknown";
        const installed = readString(vuln, "InstalledVersion") ?? "unknown";
        const fixed = readString(vuln, "FixedVersion");
        findings.push(
          createVulnerability({
            id: `${vulnId}:${pkg}@${installed}`,
            title: readString(vuln, "Title") ?? `${vulnId} in ${pkg}@${installed}`,
            description: readString(vuln, "Description") ?? `Vulnerable package: ${pkg}@${installed}`,
            severity: mapSeverity(vuln.Severity),
            cwe: firstCwe(vuln.CweIDs),
            cvssScore: bestCvssScore(vuln),
            filePath: location,
            tool: this.name,
            ruleId: vulnId,
            recommendation: fixed ? `Upgrade ${pkg} to ${fixed}.` : undefined,
            references: readStringArray(vuln.References)
          })
        );
      }

      for (const misEntry of toArray(section.Misconfigurations)) {
        const mis = toRecord(misEntry);
        const misId = readString(mis, "AVDID", "ID") ?? "misconfiguration";
        const line = readNumber(toRecord(mis.CauseMetadata), "StartLine");
        findings.push(
          createVulnerability({
            id: `${misId}:${location ?? "-"}:${line ?? 0}`,
            title: readString(mis, "Title") ?? misId,
            description: readString(mis, "Message", "Description") ?? misId,
            severity: mapSeverity(mis.Severity),
            filePath: location,
            lineNumber: line,
            tool: this.name,
            ruleId: misId,
            recommendation: readString(mis, "Resolution"),
            references: readStringArray(mis.References)
          })
        );
      }
    }

    return findings;
  }
}
