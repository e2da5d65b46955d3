import type { BackendCategory } from "../types/domain/scan-result.js";

export const STATE_DIR_NAME = ".scanmesh";

export const CONFIG_FILE_CANDIDATES = ["scanmesh.config.json", ".scanmeshrc.json"];

export const DEFAULT_TOOLS: Record<BackendCategory, string> = {
  sast: "semgrep",
  sca: "osv-scanner",
  secrets: "gitleaks",
  iac: "checkov",
  container: "trivy"
};

export const DEFAULT_EXCLUDES = [
  "**/node_modules/**",
  "**/.git/**",
  "**/.scanmesh/**",
  "**/.venv/**",
  "**/__pycache__/**",
  "**/dist/**",
  "**/build/**",
  "**/coverage/**"
];

export const DEFAULT_SEMGREP_CONFIGS = ["auto"];

export const DEFAULT_TIMEOUT_SECONDS = 300;
export const DEFAULT_MAX_CONCURRENT_SCANS = 4;
export const DEFAULT_CACHE_TTL_SECONDS = 3600;

/** Largest delay setTimeout honours; anything above fires after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_MS / 1000);
