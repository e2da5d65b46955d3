import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import { supportsTarget } from "../backends/supports.js";
import type { ScanAggregate } from "../types/domain/aggregate.js";
import type { ScanCategory, ScanResult } from "../types/domain/scan-result.js";
import type { JsonRecord } from "../utils/records.js";
import type { IntegrationSinkPlugin, PluginBase, ReportSinkPlugin, ScannerPlugin } from "./contracts.js";

abstract class BasePlugin implements PluginBase {
  abstract readonly name: string;
  readonly version: string = "0.1.0";
  readonly description: string = "";
  readonly author: string = "unknown";
  protected config: JsonRecord = {};
  protected logger: Logger = noopLogger;

  async initialize(config: JsonRecord): Promise<boolean> {
    this.config = config;
    return true;
  }

  async cleanup(): Promise<void> {}

  attachLogger(logger: Logger): void {
    this.logger = logger;
  }
}

export abstract class BaseScannerPlugin extends BasePlugin implements ScannerPlugin {
  abstract readonly scanType: ScanCategory;
  readonly fileTypes: readonly string[] = [];

  abstract scan(target: string): Promise<ScanResult>;

  async supports(target: string): Promise<boolean> {
    return await supportsTarget(target, this.fileTypes);
  }
}

export abstract class BaseReportPlugin extends BasePlugin implements ReportSinkPlugin {
  abstract readonly outputFormat: string;

  abstract generateReport(data: ScanAggregate, outputPath: string): Promise<string>;
}

export abstract class BaseIntegrationPlugin extends BasePlugin implements IntegrationSinkPlugin {
  abstract readonly serviceName: string;

  async connect(): Promise<boolean> {
    return true;
  }

  abstract sendData(data: ScanAggregate): Promise<boolean>;
}

export const BASE_PLUGIN_CLASSES: readonly unknown[] = [BaseScannerPlugin, BaseReportPlugin, BaseIntegrationPlugin];
