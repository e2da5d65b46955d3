import type { CommandPlan, ExitCodeTable } from "../backend.js";
import { CommandBackend, parseJsonOutput } from "../backend.js";
import type { CommandResult } from "../commandRunner.js";
import type { Vulnerability } from "../../types/domain/vulnerability.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";
import { ParseError } from "../../errors/backend.errors.js";
import { readNumber, readString, toRecord } from "../../utils/records.js";
import { relativeTo } from "./shared.js";

export class GitleaksBackend extends CommandBackend {
  readonly name = "gitleaks";
  readonly category = "secrets" as const;
  protected readonly exitCodes: ExitCodeTable = { 0: "clean", 1: "findings" };

  protected async skipReason(): Promise<string | null> {
    return null;
  }

  protected buildCommand(target: string): CommandPlan {
    return {
      args: ["detect", "--no-git", "--no-banner", "--source", target, "--report-format", "json", "--report-path", "-"]
    };
  }

  protected parseOutput(result: CommandResult, target: string): Vulnerability[] {
    const json = parseJsonOutput(this.name, result.stdout, []);
    if (!Array.isArray(json)) {
      throw new ParseError(this.name, "expected a JSON array of findings");
    }

    // The matched secret is never copied into the finding.
    return json.map((entry) => {
      const item = toRecord(entry);
      const ruleId = readString(item, "RuleID", "Rule") ?? "gitleaks";
      const file = readString(item, "File");
      const line = readNumber(item, "StartLine", "startLine");
      const filePath = file ? relativeTo(target, file) : undefined;
      return createVulnerability({
        id: `${ruleId}:${filePath ?? "-"}:${line ?? 0}`,
        title: readString(item, "Description") ?? "Secret detected",
        description: `Potential secret matched rule ${ruleId}${filePath ? ` in ${filePath}` : ""}.`,
        severity: "HIGH",
        cwe: "CWE-798",
        filePath,
        lineNumber: line,
        tool: this.name,
        ruleId,
        recommendation: "Rotate the credential and remove it from the repository.",
        references: []
      });
    });
  }
}
