import type { ScanBackend } from "../../backends/backend.js";
import type { ScanCategory, ScanResult } from "../../types/domain/scan-result.js";
import { BaseScannerPlugin } from "../base.js";

/** Exposes a backend adapter as a scanner plugin. */
export class BackendScannerPlugin extends BaseScannerPlugin {
  readonly name: string;
  readonly scanType: ScanCategory;
  readonly fileTypes: readonly string[];
  readonly description: string;

  constructor(private readonly backend: ScanBackend) {
    super();
    this.name = backend.name;
    this.scanType = backend.category;
    this.fileTypes = backend.fileTypes;
    this.description = `${backend.category} scanning with ${backend.name}`;
  }

  async scan(target: string): Promise<ScanResult> {
    return await this.backend.execute(target);
  }

  async supports(target: string): Promise<boolean> {
    return await this.backend.supports(target);
  }
}
