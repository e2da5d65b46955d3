import path from "node:path";
import { mkdir, writeFile } from "node:fs/promises";
import type { ScanAggregate } from "../../types/domain/aggregate.js";
import { aggregateToStructured } from "../../types/domain/aggregate.js";
import type { JsonRecord } from "../../utils/records.js";
import { readString } from "../../utils/records.js";
import { BaseReportPlugin } from "../base.js";

export const DEFAULT_REPORT_FILE = "scanmesh-report.json";

export class JsonReportPlugin extends BaseReportPlugin {
  readonly name = "json-report";
  readonly description = "Writes the aggregated scan results as JSON.";
  readonly outputFormat = "json";
  private fileName = DEFAULT_REPORT_FILE;

  async initialize(config: JsonRecord): Promise<boolean> {
    this.fileName = readString(config, "fileName") ?? DEFAULT_REPORT_FILE;
    return await super.initialize(config);
  }

  async generateReport(data: ScanAggregate, outputPath: string): Promise<string> {
    await mkdir(outputPath, { recursive: true });
    const filePath = path.join(outputPath, this.fileName);
    await writeFile(filePath, `${JSON.stringify(aggregateToStructured(data), null, 2)}\n`, "utf-8");
    this.logger.info(`Wrote report to ${filePath}`);
    return filePath;
  }
}
