import type { CommandPlan, ExitCodeTable } from "../backend.js";
import { CommandBackend, parseJsonOutput } from "../backend.js";
import type { CommandResult } from "../commandRunner.js";
import { mapSeverity } from "../../types/domain/severity.js";
import type { Vulnerability } from "../../types/domain/vulnerability.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";
import { readNumber, readString, toArray, toRecord } from "../../utils/records.js";
import { referenceUrls, relativeTo } from "./shared.js";

export class TfsecBackend extends CommandBackend {
  readonly name = "tfsec";
  readonly category = "iac" as const;
  readonly fileTypes = [".tf"];
  protected readonly exitCodes: ExitCodeTable = { 0: "clean", 1: "findings" };

  protected buildCommand(target: string): CommandPlan {
    return { args: [target, "--format", "json", "--no-colour"] };
  }

  protected parseOutput(result: CommandResult, target: string): Vulnerability[] {
    const json = toRecord(parseJsonOutput(this.name, result.stdout, {}));
    // "results" is null when nothing was found.
    return toArray(json.results).map((entry) => {
      const item = toRecord(entry);
      const ruleId = readString(item, "long_id", "rule_id") ?? "tfsec";
      const location = toRecord(item.location);
      const rawPath = readString(location, "filename");
      const filePath = rawPath ? relativeTo(target, rawPath) : undefined;
      const line = readNumber(location, "start_line");
      const description = readString(item, "description") ?? ruleId;
      return createVulnerability({
        id: `${ruleId}:${filePath ?? "-"}:${line ?? 0}`,
        title: readString(item, "rule_description") ?? description,
        description,
        severity: mapSeverity(item.severity),
        filePath,
        lineNumber: line,
        tool: this.name,
        ruleId,
        recommendation: readString(item, "resolution"),
        references: referenceUrls(item.links)
      });
    });
  }
}
