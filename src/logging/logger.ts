import path from "node:path";
import { createWriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
};

export type AppLogger = Logger & {
  path: string;
  close: () => Promise<void>;
};

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export type LogMeta = Record<string, unknown>;

/** Adds `scope` to every entry's meta, for plugin and backend logs. */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const withScope = (meta?: LogMeta): LogMeta => ({ scope, ...meta });
  return {
    debug: (message, meta) => logger.debug(message, withScope(meta)),
    info: (message, meta) => logger.info(message, withScope(meta)),
    warn: (message, meta) => logger.warn(message, withScope(meta)),
    error: (message, meta) => logger.error(message, withScope(meta))
  };
}

export function teeLogger(...loggers: Logger[]): Logger {
  return {
    debug: (message, meta) => loggers.forEach((logger) => logger.debug(message, meta)),
    info: (message, meta) => loggers.forEach((logger) => logger.info(message, meta)),
    warn: (message, meta) => loggers.forEach((logger) => logger.warn(message, meta)),
    error: (message, meta) => loggers.forEach((logger) => logger.error(message, meta))
  };
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

type AppLoggerParams = {
  stateDir: string;
  label?: string;
  minLevel?: LogLevel;
};

export async function createAppLogger(params: AppLoggerParams): Promise<AppLogger> {
  const dir = path.join(params.stateDir, "logs");
  await mkdir(dir, { recursive: true });
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  const label = params.label ?? "scanmesh";
  const filePath = path.join(dir, `${label}-${timestamp}.jsonl`);
  const stream = createWriteStream(filePath, { flags: "a" });
  const minLevel = params.minLevel ?? "info";
  let closed = false;

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (closed) return;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const normalizedLevel = level === "warn" ? "warning" : level;
    const payload = {
      timestamp: new Date().toISOString(),
      level: normalizedLevel,
      message,
      meta: meta ?? undefined
    };
    try {
      stream.write(`${JSON.stringify(payload)}\n`);
    } catch {
      closed = true;
    }
  };

  stream.on("error", () => {
    closed = true;
  });

  const close = async () => {
    if (closed) return;
    closed = true;
    await new Promise<void>((resolve) => stream.end(resolve));
  };

  return {
    path: filePath,
    close,
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}
