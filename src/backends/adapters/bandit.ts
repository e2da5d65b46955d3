import type { CommandPlan, ExitCodeTable } from "../backend.js";
import { CommandBackend, parseJsonOutput } from "../backend.js";
import type { CommandResult } from "../commandRunner.js";
import { mapSeverity } from "../../types/domain/severity.js";
import type { Vulnerability } from "../../types/domain/vulnerability.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";
import { readNumber, readString, toArray, toRecord } from "../../utils/records.js";
import { firstCwe, relativeTo } from "./shared.js";

export class BanditBackend extends CommandBackend {
  readonly name = "bandit";
  readonly category = "sast" as const;
  readonly fileTypes = [".py"];
  protected readonly exitCodes: ExitCodeTable = { 0: "clean", 1: "findings" };

  protected buildCommand(target: string): CommandPlan {
    const args = ["-r", target, "-f", "json", "-q"];
    const excluded = this.excludePaths.map((pattern) => pattern.replace(/^\*\*\//, "").replace(/\/\*\*$/, ""));
    if (excluded.length) {
      args.push("--exclude", excluded.join(","));
    }
    return { args };
  }

  protected parseOutput(result: CommandResult, target: string): Vulnerability[] {
    const json = toRecord(parseJsonOutput(this.name, result.stdout, {}));
    return toArray(json.results).map((entry) => {
      const item = toRecord(entry);
      const testId = readString(item, "test_id") ?? "unknown";
      const filePath = readString(item, "filename");
      const line = readNumber(item, "line_number");
      const moreInfo = readString(item, "more_info");
      return createVulnerability({
        id: `bandit-${testId}:${filePath ?? "-"}:${line ?? 0}`,
        title: readString(item, "test_name") ?? testId,
        description: readString(item, "issue_text") ?? "",
        severity: mapSeverity(item.issue_severity),
        cwe: firstCwe(readNumber(toRecord(item.issue_cwe), "id")),
        filePath: filePath ? relativeTo(target, filePath) : undefined,
        lineNumber: line,
        tool: this.name,
        ruleId: testId,
        recommendation: moreInfo ? `See ${moreInfo}` : undefined,
        references: moreInfo ? [moreInfo] : []
      });
    });
  }
}
