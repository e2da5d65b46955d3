import path from "node:path";
import { existsSync, statSync } from "node:fs";
import type { CommandPlan, ExitCodeTable } from "../backend.js";
import { CommandBackend, parseJsonOutput } from "../backend.js";
import type { CommandResult } from "../commandRunner.js";
import { BackendExecutionError } from "../../errors/backend.errors.js";
import { mapSeverity } from "../../types/domain/severity.js";
import type { Vulnerability } from "../../types/domain/vulnerability.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";
import { readNumber, readString, toArray, toRecord } from "../../utils/records.js";
import { firstCwe } from "./shared.js";

function projectDir(target: string): string {
  try {
    return statSync(target).isDirectory() ? target : path.dirname(target);
  } catch {
    return target;
  }
}

export class NpmAuditBackend extends CommandBackend {
  readonly name = "npm-audit";
  readonly category = "sca" as const;
  protected readonly executable = "npm";
  protected readonly exitCodes: ExitCodeTable = { 0: "clean", 1: "findings" };

  protected async skipReason(target: string): Promise<string | null> {
    return existsSync(path.join(projectDir(target), "package.json")) ? null : "no package.json found";
  }

  protected buildCommand(target: string): CommandPlan {
    return { args: ["audit", "--json"], cwd: projectDir(target) };
  }

  protected parseOutput(result: CommandResult): Vulnerability[] {
    const json = toRecord(parseJsonOutput(this.name, result.stdout, {}));
    // npm reports its own failures (ENOLOCK and friends) as JSON on exit 1.
    const error = toRecord(json.error);
    const code = readString(error, "code");
    const summary = readString(error, "summary");
    if (code || summary) {
      throw new BackendExecutionError(this.name, summary ?? `npm audit failed with ${code}`, {
        exitCode: result.code,
        stderr: result.stderr
      });
    }

    const findings: Vulnerability[] = [];
    const seen = new Set<string>();

    for (const [packageName, entry] of Object.entries(toRecord(json.vulnerabilities))) {
      const pkg = toRecord(entry);
      const fix = pkg.fixAvailable;
      const fixInfo = toRecord(fix);
      const recommendation =
        readString(fixInfo, "name") && readString(fixInfo, "version")
          ? `Upgrade ${readString(fixInfo, "name")} to ${readString(fixInfo, "version")}.`
          : fix === true
            ? "Run `npm audit fix`."
            : undefined;

      for (const via of toArray(pkg.via)) {
        // String entries point at another package's advisory.
        if (typeof via === "string") continue;
        const advisory = toRecord(via);
        const source = readNumber(advisory, "source");
        const url = readString(advisory, "url");
        const advisoryId = url?.split("/").pop() ?? (source !== undefined ? String(source) : "unknown");
        const key = `${advisoryId}:${packageName}`;
        if (seen.has(key)) continue;
        seen.add(key);

        const range = readString(advisory, "range");
        findings.push(
          createVulnerability({
            id: key,
            title: readString(advisory, "title") ?? `Vulnerable package: ${packageName}`,
            description: `${packageName}${range ? ` ${range}` : ""} is affected by ${advisoryId}.`,
            severity: mapSeverity(advisory.severity),
            cwe: firstCwe(advisory.cwe),
            cvssScore: readNumber(toRecord(advisory.cvss), "score"),
            filePath: "package.json",
            tool: this.name,
            ruleId: advisoryId,
            recommendation,
            references: url ? [url] : []
          })
        );
      }
    }

    return findings;
  }
}
