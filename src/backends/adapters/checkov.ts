import { statSync } from "node:fs";
import type { CommandPlan, ExitCodeTable } from "../backend.js";
import { CommandBackend, parseJsonOutput } from "../backend.js";
import type { CommandResult } from "../commandRunner.js";
import { mapSeverity } from "../../types/domain/severity.js";
import type { Vulnerability } from "../../types/domain/vulnerability.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";
import { readString, toArray, toRecord } from "../../utils/records.js";
import { relativeTo } from "./shared.js";

function isFile(target: string): boolean {
  try {
    return statSync(target).isFile();
  } catch {
    return false;
  }
}

export class CheckovBackend extends CommandBackend {
  readonly name = "checkov";
  readonly category = "iac" as const;
  readonly fileTypes = [".tf", ".yaml", ".yml", ".json", "dockerfile", ".bicep"];
  protected readonly exitCodes: ExitCodeTable = { 0: "clean", 1: "findings" };

  protected buildCommand(target: string): CommandPlan {
    const args = [isFile(target) ? "-f" : "-d", target, "--output", "json", "--quiet", "--compact"];
    return { args };
  }

  protected parseOutput(result: CommandResult, target: string): Vulnerability[] {
    const json = parseJsonOutput(this.name, result.stdout, []);
    // One report per framework: a single object or an array of them.
    const reports = Array.isArray(json) ? json : [json];
    const findings: Vulnerability[] = [];

    for (const report of reports) {
      for (const entry of toArray(toRecord(toRecord(report).results).failed_checks)) {
        const check = toRecord(entry);
        const checkId = readString(check, "check_id") ?? "checkov";
        const rawPath = readString(check, "file_path", "repo_file_path");
        const filePath = rawPath ? relativeTo(target, rawPath.replace(/^\//, "")) : undefined;
        const [start] = toArray(check.file_line_range);
        const line = typeof start === "number" ? start : undefined;
        const resource = readString(check, "resource");
        const guideline = readString(check, "guideline");
        findings.push(
          createVulnerability({
            id: `${checkId}:${filePath ?? "-"}:${resource ?? line ?? 0}`,
            title: readString(check, "check_name") ?? checkId,
            description: resource ? `${checkId} failed for ${resource}.` : `${checkId} failed.`,
            severity: mapSeverity(check.severity),
            filePath,
            lineNumber: line,
            tool: this.name,
            ruleId: checkId,
            recommendation: guideline ? `See ${guideline}` : undefined,
            references: guideline ? [guideline] : []
          })
        );
      }
    }

    return findings;
  }
}
