#!/usr/bin/env node
import path from "node:path";
import { existsSync, statSync } from "node:fs";
import { Command, Option } from "commander";
import pc from "picocolors";
import { listSupportedTools } from "./backends/catalog.js";
import { resolveToolPath } from "./backends/toolPaths.js";
import { createScanCache } from "./cache/scanCache.js";
import { STATE_DIR_NAME } from "./config/defaults.js";
import type { ScanmeshConfig } from "./config/loadConfig.js";
import { loadConfig } from "./config/loadConfig.js";
import { ConfigUnsupportedCategoryError } from "./errors/config.errors.js";
import type { AppLogger, LogLevel, Logger } from "./logging/logger.js";
import { createAppLogger, noopLogger, teeLogger } from "./logging/logger.js";
import { formatCacheStats, formatMetrics, formatPluginList, formatScanJson, formatScanText } from "./report/formatters.js";
import { createPluginRegistry, parseDeadline, runScan } from "./scan/runScan.js";
import type { BackendCategory } from "./types/domain/scan-result.js";
import { BACKEND_CATEGORIES } from "./types/domain/scan-result.js";
import { parseSeverityThreshold } from "./types/domain/severity.js";

const program = new Command();

// Console output goes to stderr so stdout stays clean for JSON.
function createConsoleLogger(debug: boolean): Logger {
  return {
    debug: (message) => {
      if (debug) console.error(pc.dim(message));
    },
    info: (message) => console.error(pc.dim(message)),
    warn: (message) => console.error(pc.yellow(message)),
    error: (message) => console.error(pc.red(message))
  };
}

async function openAppLogger(stateDir: string, label: string, minLevel: LogLevel): Promise<AppLogger | null> {
  try {
    return await createAppLogger({ stateDir, label, minLevel });
  } catch (err) {
    console.error(pc.yellow(`File logging disabled: ${err instanceof Error ? err.message : String(err)}`));
    return null;
  }
}

function parseCategories(values: string[] | undefined): BackendCategory[] | undefined {
  if (!values?.length) return undefined;
  return values
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter(Boolean)
    .map((value) => {
      const match = BACKEND_CATEGORIES.find((category) => category === value);
      if (!match) throw new ConfigUnsupportedCategoryError(value);
      return match;
    });
}

/** A directory target is its own project root; files and image references use the working directory. */
function projectRootFor(target: string | undefined): string {
  if (!target) return process.cwd();
  const resolved = path.resolve(process.cwd(), target);
  return existsSync(resolved) && statSync(resolved).isDirectory() ? resolved : process.cwd();
}

function reportCliError(logger: Logger, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  logger.error(`Error: ${message}`, { kind: err instanceof Error ? err.name : "unknown" });
  process.exitCode = 1;
}

async function withCommandContext(
  label: string,
  options: { config?: string; debug?: boolean },
  run: (config: ScanmeshConfig, logger: Logger) => Promise<void>
): Promise<void> {
  const projectRoot = process.cwd();
  const consoleLogger = createConsoleLogger(Boolean(options.debug));
  let appLogger: AppLogger | null = null;
  try {
    const config = await loadConfig({ projectRoot, configPath: options.config });
    appLogger = await openAppLogger(config.stateDir, label, options.debug ? "debug" : config.logging.level);
    await run(config, appLogger ?? noopLogger);
  } catch (err) {
    reportCliError(appLogger ? teeLogger(appLogger, consoleLogger) : consoleLogger, err);
  } finally {
    await appLogger?.close();
  }
}

program
  .name("scanmesh")
  .description("Run security scanners against a codebase and merge their findings")
  .version("0.1.0");

program
  .command("scan [target]")
  .description("Scan a project directory, file or container image")
  .addOption(new Option("-c, --config <path>", "Path to scanmesh.config.json"))
  .option("--category <categories...>", "Categories to run (sast, sca, secrets, iac, container)")
  .addOption(new Option("-f, --format <format>", "Output format").choices(["text", "json"]))
  .option("--json", "Shortcut for --format json")
  .option("--no-cache", "Ignore and do not update the result cache")
  .option("--plugins-dir <path>", "Directory of scanner/report/integration plugins")
  .option("--plugin <names...>", "Only run these scanner plugins")
  .option("--report-dir <path>", "Write reports through the report plugins")
  .option("--publish", "Send the results to the integration plugins")
  .option("--fail-on <severity>", "Exit with code 2 when a finding at or above this severity exists")
  .option("--deadline <seconds>", "Give up on the whole scan after this many seconds")
  .option("--metrics <file>", "Write the run's metrics snapshot as JSON")
  .option("--debug", "Enable debug logging")
  .action(async (
    target: string | undefined,
    options: {
      config?: string;
      category?: string[];
      format?: string;
      json?: boolean;
      cache: boolean;
      pluginsDir?: string;
      plugin?: string[];
      reportDir?: string;
      publish?: boolean;
      failOn?: string;
      deadline?: string;
      metrics?: string;
      debug?: boolean;
    }
  ) => {
    const projectRoot = projectRootFor(target);
    const consoleLogger = createConsoleLogger(Boolean(options.debug));
    const appLogger = await openAppLogger(
      path.join(projectRoot, STATE_DIR_NAME),
      "scan",
      options.debug ? "debug" : "info"
    );
    const logger = appLogger ? teeLogger(appLogger, consoleLogger) : consoleLogger;

    try {
      const failOn = options.failOn ? parseSeverityThreshold(options.failOn, "--fail-on") : null;
      const deadlineMs = parseDeadline(options.deadline);
      const result = await runScan({
        projectRoot,
        target: target ?? projectRoot,
        configPath: options.config ? path.resolve(options.config) : undefined,
        categories: parseCategories(options.category),
        plugins: options.plugin,
        pluginsDir: options.pluginsDir ? path.resolve(options.pluginsDir) : undefined,
        reportDir: options.reportDir ? path.resolve(options.reportDir) : undefined,
        publish: options.publish,
        noCache: !options.cache,
        failOn,
        deadlineMs,
        metricsFile: options.metrics ? path.resolve(options.metrics) : undefined,
        logger
      });

      const format = options.json ? "json" : options.format ?? result.config.output.format;
      if (format === "json") {
        console.log(formatScanJson(result.aggregate));
      } else {
        console.log(formatScanText(result.aggregate, { threshold: result.config.scanning.severityThreshold }));
      }
      for (const report of result.reports) {
        if (report.ok) logger.info(`Report written: ${report.value}`);
      }
      logger.debug(formatMetrics(result.metrics));
      if (result.metricsFile) logger.info(`Metrics written: ${result.metricsFile}`);
      process.exitCode = result.failBuild ? 2 : 0;
    } catch (err) {
      reportCliError(logger, err);
    } finally {
      await appLogger?.close();
    }
  });

const cache = program.command("cache").description("Inspect or clear the scan result cache");

cache
  .command("clear")
  .description("Remove every cached scan result")
  .option("-c, --config <path>", "Path to scanmesh.config.json")
  .action(async (options: { config?: string }) => {
    await withCommandContext("cache", options, async (config, logger) => {
      const scanCache = createScanCache(config, { logger });
      try {
        await scanCache.invalidateAll();
      } finally {
        scanCache.close();
      }
      logger.info("Cache cleared");
      console.log(pc.green("Cache cleared."));
    });
  });

cache
  .command("stats")
  .description("Show cache entry counts")
  .option("-c, --config <path>", "Path to scanmesh.config.json")
  .action(async (options: { config?: string }) => {
    await withCommandContext("cache", options, async (config, logger) => {
      const scanCache = createScanCache(config, { logger });
      try {
        console.log(formatCacheStats(await scanCache.stats(), scanCache.ttlSeconds));
      } finally {
        scanCache.close();
      }
    });
  });

program
  .command("plugins")
  .description("Plugin commands")
  .command("list")
  .description("List registered plugins and their state")
  .option("-c, --config <path>", "Path to scanmesh.config.json")
  .option("--plugins-dir <path>", "Directory of plugins to load")
  .action(async (options: { config?: string; pluginsDir?: string }) => {
    await withCommandContext("plugins", options, async (config, logger) => {
      const pluginsDir = options.pluginsDir ? path.resolve(options.pluginsDir) : undefined;
      const registry = await createPluginRegistry(config, { pluginsDir, logger });
      try {
        console.log(formatPluginList(registry.list()));
      } finally {
        await registry.cleanupAll();
      }
    });
  });

program
  .command("tools")
  .description("List supported backends and whether each is installed")
  .option("-c, --config <path>", "Path to scanmesh.config.json")
  .action(async (options: { config?: string }) => {
    await withCommandContext("tools", options, async (config) => {
      const supported = listSupportedTools();
      for (const category of BACKEND_CATEGORIES) {
        for (const tool of supported[category]) {
          const executable = tool === "npm-audit" ? "npm" : tool;
          const resolved = resolveToolPath(executable, config.scanning.toolPaths[tool] ?? null);
          const selected = config.scanning.tools[category] === tool ? pc.cyan(" (selected)") : "";
          const status = resolved ? pc.green(resolved) : pc.red("not found");
          console.log(`${category.padEnd(10)} ${tool.padEnd(12)} ${status}${selected}`);
        }
      }
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  reportCliError(createConsoleLogger(false), err);
});
