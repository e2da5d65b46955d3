import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { TestContext } from "node:test";
import { setTimeout as sleep } from "node:timers/promises";
import type { ScanBackend } from "../../backends/backend.js";
import type { ScanmeshConfig } from "../../config/loadConfig.js";
import { loadConfig } from "../../config/loadConfig.js";
import { BaseScannerPlugin } from "../../plugins/base.js";
import type { BackendCategory, ScanCategory } from "../../types/domain/scan-result.js";
import { ScanResult } from "../../types/domain/scan-result.js";
import type { Severity } from "../../types/domain/severity.js";
import { createVulnerability } from "../../types/domain/vulnerability.js";

export async function tempProject(t: TestContext, prefix = "scanmesh-engine-"): Promise<string> {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

export async function testConfig(
  projectRoot: string,
  scanning: Partial<ScanmeshConfig["scanning"]> = {}
): Promise<ScanmeshConfig> {
  const base = await loadConfig({ projectRoot });
  return { ...base, scanning: { ...base.scanning, ...scanning } };
}

export function findingResult(
  tool: string,
  scanType: ScanCategory,
  target: string,
  severities: readonly Severity[]
): ScanResult {
  return new ScanResult({
    tool,
    target,
    scanType,
    scanDuration: 1.5,
    vulnerabilities: severities.map((severity, index) =>
      createVulnerability({
        id: `${tool}-${index}`,
        title: `${tool} finding ${index}`,
        description: "",
        severity,
        filePath: "app.py",
        lineNumber: index + 1,
        tool
      })
    )
  });
}

/** Records every target it is asked to scan and answers with canned findings. */
export class FakeBackend implements ScanBackend {
  readonly fileTypes: readonly string[] = [];
  readonly targets: string[] = [];

  constructor(
    readonly category: BackendCategory,
    readonly name: string,
    private readonly severities: readonly Severity[] = ["MEDIUM"],
    private readonly delayMs = 0
  ) {}

  async supports(): Promise<boolean> {
    return true;
  }

  async execute(target: string): Promise<ScanResult> {
    this.targets.push(target);
    if (this.delayMs) await sleep(this.delayMs);
    return findingResult(this.name, this.category, target, this.severities);
  }
}

export class FakeScannerPlugin extends BaseScannerPlugin {
  readonly scanType: ScanCategory = "custom";
  scans = 0;

  constructor(
    readonly name: string,
    private readonly behavior: "ok" | "throw" = "ok"
  ) {
    super();
  }

  async scan(target: string): Promise<ScanResult> {
    this.scans += 1;
    if (this.behavior === "throw") {
      throw new Error(`${this.name} crashed`);
    }
    return findingResult(this.name, this.scanType, target, ["LOW"]);
  }
}
