import type { BackendOptions, CommandPlan, ExitCodeTable } from "../backend.js";
import { CommandBackend, parseJsonOutput } from "../backend.js";
import type { CommandResult } from "../commandRunner.js";
import { mapSeverity } from "../../types/domain/severity.js";
import type { Vulnerability } from "../../types/domain/vulnerability.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";
import { readNumber, readString, readStringArray, toArray, toRecord } from "../../utils/records.js";
import { firstCwe, relativeTo, summarizeMessage } from "./shared.js";

export interface SemgrepOptions extends BackendOptions {
  configs?: string[];
}

export class SemgrepBackend extends CommandBackend {
  readonly name = "semgrep";
  readonly category = "sast" as const;
  protected readonly exitCodes: ExitCodeTable = { 0: "clean", 1: "findings" };
  private readonly configs: string[];

  constructor(options: SemgrepOptions = {}) {
    super(options);
    this.configs = options.configs?.length ? options.configs : ["auto"];
  }

  protected buildCommand(target: string): CommandPlan {
    const args = ["scan", "--json", "--metrics=off", "--disable-version-check", "--quiet"];
    for (const cfg of this.configs) {
      args.push("--config", cfg);
    }
    for (const exclude of this.excludePaths) {
      args.push("--exclude", exclude);
    }
    args.push(target);
    return { args };
  }

  protected parseOutput(result: CommandResult, target: string): Vulnerability[] {
    const json = toRecord(parseJsonOutput(this.name, result.stdout, {}));
    return toArray(json.results).map((entry) => {
      const item = toRecord(entry);
      const extra = toRecord(item.extra);
      const meta = toRecord(extra.metadata);
      const checkId = readString(item, "check_id") ?? "semgrep";
      const filePath = readString(item, "path");
      const line = readNumber(toRecord(item.start), "line");
      const message = readString(extra, "message") ?? checkId;
      return createVulnerability({
        id: `${checkId}:${filePath ?? "-"}:${line ?? 0}`,
        title: summarizeMessage(message),
        description: message,
        severity: mapSeverity(extra.severity),
        cwe: firstCwe(meta.cwe),
        filePath: filePath ? relativeTo(target, filePath) : undefined,
        lineNumber: line,
        tool: this.name,
        ruleId: checkId,
        recommendation: readString(extra, "fix"),
        references: readStringArray(meta.references)
      });
    });
  }
}
