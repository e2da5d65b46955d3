import { ConfigUnsupportedCategoryError, ConfigUnsupportedToolError } from "../errors/config.errors.js";
import type { BackendCategory } from "../types/domain/scan-result.js";
import { isBackendCategory } from "../types/domain/scan-result.js";
import type { ScanBackend } from "./backend.js";
import type { SemgrepOptions } from "./adapters/semgrep.js";
import { SemgrepBackend } from "./adapters/semgrep.js";
import { BanditBackend } from "./adapters/bandit.js";
import { OsvScannerBackend } from "./adapters/osvScanner.js";
import { NpmAuditBackend } from "./adapters/npmAudit.js";
import { GitleaksBackend } from "./adapters/gitleaks.js";
import { CheckovBackend } from "./adapters/checkov.js";
import { TfsecBackend } from "./adapters/tfsec.js";
import { TrivyBackend } from "./adapters/trivy.js";

export type BackendFactoryOptions = SemgrepOptions;

type BackendConstructor = (options: BackendFactoryOptions) => ScanBackend;

const CATALOG: Record<BackendCategory, Record<string, BackendConstructor>> = {
  sast: {
    semgrep: (options) => new SemgrepBackend(options),
    bandit: (options) => new BanditBackend(options)
  },
  sca: {
    "osv-scanner": (options) => new OsvScannerBackend(options),
    "npm-audit": (options) => new NpmAuditBackend(options)
  },
  secrets: {
    gitleaks: (options) => new GitleaksBackend(options)
  },
  iac: {
    checkov: (options) => new CheckovBackend(options),
    tfsec: (options) => new TfsecBackend(options)
  },
  container: {
    trivy: (options) => new TrivyBackend(options)
  }
};

export type BackendFactory = (category: BackendCategory, tool: string, options: BackendFactoryOptions) => ScanBackend;

export const createBackend: BackendFactory = (category, tool, options) => {
  if (!isBackendCategory(category)) {
    throw new ConfigUnsupportedCategoryError(category);
  }
  const tools = CATALOG[category];
  const factory = Object.hasOwn(tools, tool) ? tools[tool] : undefined;
  if (!factory) {
    throw new ConfigUnsupportedToolError(category, tool, Object.keys(tools));
  }
  return factory(options);
};

export function listSupportedTools(): Record<BackendCategory, string[]> {
  return {
    sast: Object.keys(CATALOG.sast),
    sca: Object.keys(CATALOG.sca),
    secrets: Object.keys(CATALOG.secrets),
    iac: Object.keys(CATALOG.iac),
    container: Object.keys(CATALOG.container)
  };
}
