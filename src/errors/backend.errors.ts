export class BackendExecutionError extends Error {
  exitCode?: number | null;
  stderr?: string;

  constructor(tool: string, message: string, details: { exitCode?: number | null; stderr?: string } = {}) {
    super(`${tool}: ${message}`);
    this.name = "BackendExecutionError";
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

export class BackendTimeoutError extends BackendExecutionError {
  timeoutMs: number;

  constructor(tool: string, timeoutMs: number) {
    super(tool, `timed out after ${formatSeconds(timeoutMs)}s`);
    this.name = "BackendTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ParseError extends Error {
  constructor(source: string, message: string) {
    super(`Could not parse ${source} output: ${message}`);
    this.name = "ParseError";
  }
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? String(seconds) : seconds.toFixed(2).replace(/0+$/, "");
}
