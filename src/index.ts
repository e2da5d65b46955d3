export * from "./types.js";
export * from "./backends/backend.js";
export * from "./backends/catalog.js";
export type { CommandRequest, CommandResult, CommandRunner } from "./backends/commandRunner.js";
export { runCommand } from "./backends/commandRunner.js";
export type { ToolResolver, ToolResolverOptions } from "./backends/toolPaths.js";
export { createToolResolver, isExecutableFile, resolveToolPath } from "./backends/toolPaths.js";
export * from "./cache/cacheKey.js";
export * from "./cache/store.js";
export * from "./cache/fileStore.js";
export * from "./cache/sqliteStore.js";
export * from "./cache/scanCache.js";
export * from "./config/loadConfig.js";
export * from "./utils/taskGroup.js";
export * from "./engine/orchestrator.js";
export * from "./errors/backend.errors.js";
export * from "./errors/config.errors.js";
export * from "./errors/engine.errors.js";
export * from "./errors/model.errors.js";
export * from "./errors/plugin.errors.js";
export * from "./logging/logger.js";
export * from "./metrics/metricsCollector.js";
export * from "./plugins/contracts.js";
export * from "./plugins/base.js";
export * from "./plugins/pluginRegistry.js";
export * from "./plugins/builtin/backendScanner.js";
export * from "./plugins/builtin/jsonReport.js";
export * from "./plugins/builtin/webhook.js";
export * from "./report/formatters.js";
export * from "./scan/runScan.js";
