import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { readEnv, readEnvBool, readEnvList, readEnvNumber } from "./env.js";
import {
  CONFIG_FILE_CANDIDATES,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_EXCLUDES,
  DEFAULT_MAX_CONCURRENT_SCANS,
  DEFAULT_SEMGREP_CONFIGS,
  DEFAULT_TIMEOUT_SECONDS,
  DEFAULT_TOOLS,
  MAX_TIMEOUT_SECONDS,
  STATE_DIR_NAME
} from "./defaults.js";
import { ConfigFileParseError, ConfigInvalidValueError } from "../errors/config.errors.js";
import type { LogLevel } from "../logging/logger.js";
import type { BackendCategory } from "../types/domain/scan-result.js";
import { BACKEND_CATEGORIES } from "../types/domain/scan-result.js";
import type { Severity } from "../types/domain/severity.js";
import { parseSeverityThreshold } from "../types/domain/severity.js";
import type { JsonRecord } from "../utils/records.js";
import { isPlainObject, readStringArray, toRecord } from "../utils/records.js";

export type CacheBackend = "file" | "sqlite";
export type OutputFormat = "text" | "json";

export interface ScanmeshConfig {
  projectRoot: string;
  stateDir: string;
  scanning: {
    enabled: Record<BackendCategory, boolean>;
    tools: Record<BackendCategory, string>;
    toolPaths: Record<string, string>;
    semgrepConfigs: string[];
    excludePaths: string[];
    excludeRules: string[];
    timeoutSeconds: number;
    maxConcurrentScans: number;
    containerImage: string | null;
    severityThreshold: Severity;
    failOnHigh: boolean;
    failOnCritical: boolean;
  };
  cache: {
    enabled: boolean;
    backend: CacheBackend;
    ttlSeconds: number;
  };
  plugins: {
    directory: string | null;
    settings: Record<string, JsonRecord>;
  };
  output: {
    format: OutputFormat;
    reportDir: string | null;
  };
  logging: {
    level: LogLevel;
  };
}

export interface LoadConfigParams {
  projectRoot: string;
  configPath?: string | null;
  overrides?: Partial<ScanmeshConfig>;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

async function loadConfigFile(projectRoot: string, configPath?: string | null): Promise<JsonRecord> {
  const candidates = configPath
    ? [path.resolve(projectRoot, configPath)]
    : CONFIG_FILE_CANDIDATES.map((name) => path.resolve(projectRoot, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigFileParseError(candidate, err instanceof Error ? err.message : String(err));
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigFileParseError(candidate, "top level must be a JSON object");
    }
    return parsed;
  }

  return {};
}

function positiveNumber(field: string, value: unknown, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value === "number" && Number.isFinite(value) && value > 0 && value <= max) return value;
  throw new ConfigInvalidValueError(
    field,
    value,
    max === Number.MAX_SAFE_INTEGER ? "a positive number" : `a positive number up to ${max}`
  );
}

function booleanValue(field: string, value: unknown, fallback: boolean): boolean {
  if (value === undefined || value === null) return fallback;
  if (typeof value === "boolean") return value;
  throw new ConfigInvalidValueError(field, value, "true or false");
}

function optionalString(field: string, value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "string") return value.trim() || null;
  throw new ConfigInvalidValueError(field, value, "a string");
}

function oneOf<T extends string>(field: string, value: unknown, allowed: readonly T[], fallback: T): T {
  if (value === undefined || value === null) return fallback;
  const match = allowed.find((item) => item === value);
  if (match) return match;
  throw new ConfigInvalidValueError(field, value, allowed.join(" | "));
}

function envToolName(category: BackendCategory): string {
  return `SCANMESH_${category.toUpperCase()}_TOOL`;
}

function envToolPathName(tool: string): string {
  return `SCANMESH_${tool.toUpperCase().replace(/[^A-Z0-9]+/g, "_")}_PATH`;
}

function resolveTools(scanningFile: JsonRecord): Record<BackendCategory, string> {
  const fileTools = toRecord(scanningFile.tools);
  const tools = { ...DEFAULT_TOOLS };
  for (const category of BACKEND_CATEGORIES) {
    const fromEnv = readEnv(envToolName(category));
    const fromFile = optionalString(`scanning.tools.${category}`, fileTools[category]);
    tools[category] = fromEnv || fromFile || DEFAULT_TOOLS[category];
  }
  return tools;
}

function resolveEnabled(scanningFile: JsonRecord): Record<BackendCategory, boolean> {
  const fileEnabled = toRecord(scanningFile.enabled);
  const enabledFromEnv = readEnvList("SCANMESH_CATEGORIES");
  const enabled: Record<BackendCategory, boolean> = { sast: true, sca: true, secrets: true, iac: true, container: true };
  for (const category of BACKEND_CATEGORIES) {
    enabled[category] = enabledFromEnv
      ? enabledFromEnv.includes(category)
      : booleanValue(`scanning.enabled.${category}`, fileEnabled[category], true);
  }
  return enabled;
}

function resolveToolPaths(scanningFile: JsonRecord, tools: Record<BackendCategory, string>): Record<string, string> {
  const fileToolPaths = toRecord(scanningFile.toolPaths);
  const toolPaths: Record<string, string> = {};
  for (const [tool, value] of Object.entries(fileToolPaths)) {
    const resolved = optionalString(`scanning.toolPaths.${tool}`, value);
    if (resolved) toolPaths[tool] = resolved;
  }
  for (const tool of Object.values(tools)) {
    const fromEnv = readEnv(envToolPathName(tool));
    if (fromEnv) toolPaths[tool] = fromEnv;
  }
  return toolPaths;
}

function resolvePluginSettings(pluginsFile: JsonRecord): Record<string, JsonRecord> {
  const settings: Record<string, JsonRecord> = {};
  for (const [name, value] of Object.entries(toRecord(pluginsFile.settings))) {
    if (!isPlainObject(value)) {
      throw new ConfigInvalidValueError(`plugins.settings.${name}`, value, "an object");
    }
    settings[name] = value;
  }
  return settings;
}

export async function loadConfig(params: LoadConfigParams): Promise<ScanmeshConfig> {
  const configFile = await loadConfigFile(params.projectRoot, params.configPath);
  const scanningFile = toRecord(configFile.scanning);
  const cacheFile = toRecord(configFile.cache);
  const pluginsFile = toRecord(configFile.plugins);
  const outputFile = toRecord(configFile.output);
  const loggingFile = toRecord(configFile.logging);

  const tools = resolveTools(scanningFile);

  const cfg: ScanmeshConfig = {
    projectRoot: params.projectRoot,
    stateDir: path.join(params.projectRoot, STATE_DIR_NAME),
    scanning: {
      enabled: resolveEnabled(scanningFile),
      tools,
      toolPaths: resolveToolPaths(scanningFile, tools),
      semgrepConfigs:
        readEnvList("SCANMESH_SEMGREP_CONFIG") ??
        (Array.isArray(scanningFile.semgrepConfigs) ? readStringArray(scanningFile.semgrepConfigs) : DEFAULT_SEMGREP_CONFIGS),
      excludePaths: Array.isArray(scanningFile.excludePaths)
        ? readStringArray(scanningFile.excludePaths)
        : DEFAULT_EXCLUDES,
      excludeRules: readStringArray(scanningFile.excludeRules),
      timeoutSeconds: positiveNumber(
        "scanning.timeoutSeconds",
        readEnvNumber("SCANMESH_TIMEOUT_SECONDS") ?? scanningFile.timeoutSeconds,
        DEFAULT_TIMEOUT_SECONDS,
        MAX_TIMEOUT_SECONDS
      ),
      maxConcurrentScans: Math.trunc(
        positiveNumber(
          "scanning.maxConcurrentScans",
          readEnvNumber("SCANMESH_MAX_CONCURRENCY") ?? scanningFile.maxConcurrentScans,
          DEFAULT_MAX_CONCURRENT_SCANS
        )
      ),
      containerImage: readEnv("SCANMESH_CONTAINER_IMAGE") ?? optionalString("scanning.containerImage", scanningFile.containerImage),
      severityThreshold: parseSeverityThreshold(
        readEnv("SCANMESH_SEVERITY_THRESHOLD") ?? scanningFile.severityThreshold ?? "MEDIUM",
        "scanning.severityThreshold"
      ),
      failOnHigh: readEnvBool("SCANMESH_FAIL_ON_HIGH") ?? booleanValue("scanning.failOnHigh", scanningFile.failOnHigh, true),
      failOnCritical:
        readEnvBool("SCANMESH_FAIL_ON_CRITICAL") ??
        booleanValue("scanning.failOnCritical", scanningFile.failOnCritical, true)
    },
    cache: {
      enabled: readEnvBool("SCANMESH_CACHE_DISABLED") === true
        ? false
        : booleanValue("cache.enabled", cacheFile.enabled, true),
      backend: oneOf<CacheBackend>("cache.backend", readEnv("SCANMESH_CACHE_BACKEND") ?? cacheFile.backend, ["file", "sqlite"], "file"),
      ttlSeconds: positiveNumber(
        "cache.ttlSeconds",
        readEnvNumber("SCANMESH_CACHE_TTL") ?? cacheFile.ttlSeconds,
        DEFAULT_CACHE_TTL_SECONDS
      )
    },
    plugins: {
      directory: readEnv("SCANMESH_PLUGINS_DIR") ?? optionalString("plugins.directory", pluginsFile.directory),
      settings: resolvePluginSettings(pluginsFile)
    },
    output: {
      format: oneOf<OutputFormat>("output.format", readEnv("SCANMESH_OUTPUT_FORMAT") ?? outputFile.format, ["text", "json"], "text"),
      reportDir: optionalString("output.reportDir", outputFile.reportDir)
    },
    logging: {
      level: oneOf<LogLevel>("logging.level", readEnv("SCANMESH_LOG_LEVEL")?.toLowerCase() ?? loggingFile.level, LOG_LEVELS, "info")
    }
  };

  return {
    ...cfg,
    ...params.overrides
  };
}
