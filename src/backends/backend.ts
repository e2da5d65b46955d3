import { BackendExecutionError, BackendTimeoutError, ParseError } from "../errors/backend.errors.js";
import type { Logger } from "../logging/logger.js";
import { noopLogger } from "../logging/logger.js";
import { DEFAULT_EXCLUDES, DEFAULT_TIMEOUT_SECONDS, MAX_TIMER_MS } from "../config/defaults.js";
import type { BackendCategory } from "../types/domain/scan-result.js";
import { ScanResult } from "../types/domain/scan-result.js";
import type { Vulnerability } from "../types/domain/vulnerability.js";
import type { CommandRequest, CommandResult, CommandRunner } from "./commandRunner.js";
import { runCommand } from "./commandRunner.js";
import { supportsTarget } from "./supports.js";
import type { ToolResolver } from "./toolPaths.js";
import { resolveToolPath } from "./toolPaths.js";

export interface ScanBackend {
  readonly name: string;
  readonly category: BackendCategory;
  readonly fileTypes: readonly string[];
  supports(target: string): Promise<boolean>;
  /** Never rejects: failures come back as a ScanResult with `metadata.status = "failed"`. */
  execute(target: string): Promise<ScanResult>;
}

export interface BackendOptions {
  timeoutMs?: number;
  runner?: CommandRunner;
  toolPath?: string | null;
  resolveTool?: ToolResolver;
  excludePaths?: readonly string[];
  excludeRules?: readonly string[];
  logger?: Logger;
  now?: () => number;
}

/**
 * How a process exit is read:
 * - `clean`: ran and found nothing
 * - `findings`: ran and reported issues, output must be parsed
 * - `empty`: nothing applicable to scan
 * Codes missing from the table are failures.
 */
export type ExitOutcome = "clean" | "findings" | "empty";

export type ExitCodeTable = Readonly<Record<number, ExitOutcome>>;

export interface CommandPlan {
  args: string[];
  cwd?: string;
}

export abstract class CommandBackend implements ScanBackend {
  abstract readonly name: string;
  abstract readonly category: BackendCategory;
  /** Executable looked up through the tool resolver; defaults to `name`. */
  protected readonly executable?: string;
  readonly fileTypes: readonly string[] = [];
  protected abstract readonly exitCodes: ExitCodeTable;

  protected readonly timeoutMs: number;
  protected readonly logger: Logger;
  protected readonly excludePaths: readonly string[];
  private readonly runner: CommandRunner;
  private readonly toolPath: string | null;
  private readonly resolveTool: ToolResolver;
  private readonly excludeRules: ReadonlySet<string>;
  private readonly now: () => number;

  constructor(options: BackendOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_SECONDS * 1000;
    this.runner = options.runner ?? runCommand;
    this.toolPath = options.toolPath ?? null;
    this.resolveTool = options.resolveTool ?? resolveToolPath;
    this.excludePaths = options.excludePaths ?? DEFAULT_EXCLUDES;
    this.excludeRules = new Set(options.excludeRules ?? []);
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  protected abstract buildCommand(target: string): CommandPlan | Promise<CommandPlan>;

  protected abstract parseOutput(result: CommandResult, target: string): Vulnerability[];

  async supports(target: string): Promise<boolean> {
    return await supportsTarget(target, this.fileTypes, this.excludePaths);
  }

  /** Returns a reason when there is nothing for this tool to scan. */
  protected async skipReason(target: string): Promise<string | null> {
    if (await this.supports(target)) return null;
    return `no files matching ${this.fileTypes.join(", ")}`;
  }

  protected classifyExit(result: CommandResult): ExitOutcome | null {
    if (result.code === null) return null;
    return this.exitCodes[result.code] ?? null;
  }

  async execute(target: string): Promise<ScanResult> {
    const startedAt = this.now();
    const elapsedSeconds = () => (this.now() - startedAt) / 1000;
    const base = { tool: this.name, target, scanType: this.category };

    try {
      const reason = await this.skipReason(target);
      if (reason) {
        this.logger.info(`${this.name}: skipped ${target} (${reason})`);
        return ScanResult.empty({ ...base, scanDuration: elapsedSeconds(), metadata: { reason } });
      }

      const command = this.resolveCommand();
      const plan = await this.buildCommand(target);
      this.logger.debug(`${this.name}: running`, { command, args: plan.args, cwd: plan.cwd });
      const result = await this.runWithTimeout({ command, args: plan.args, cwd: plan.cwd });

      const outcome = this.classifyExit(result);
      if (outcome === null) {
        const detail = result.stderr.trim() || result.stdout.trim().slice(0, 400);
        const exit = result.code === null ? `signal ${result.signal ?? "unknown"}` : `code ${result.code}`;
        throw new BackendExecutionError(this.name, `exited with ${exit}${detail ? `: ${detail}` : ""}`, {
          exitCode: result.code,
          stderr: result.stderr
        });
      }
      const metadata = { command: [command, ...plan.args].join(" "), exit_code: result.code };
      if (outcome === "empty") {
        return ScanResult.empty({ ...base, scanDuration: elapsedSeconds(), metadata });
      }

      const vulnerabilities = this.parseOutput(result, target).filter(
        (vuln) => !vuln.ruleId || !this.excludeRules.has(vuln.ruleId)
      );
      this.logger.info(`${this.name}: ${vulnerabilities.length} finding(s) for ${target}`);
      return new ScanResult({
        ...base,
        vulnerabilities,
        scanDuration: elapsedSeconds(),
        metadata: { ...metadata, status: vulnerabilities.length ? "completed" : "no_issues_found" }
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`${this.name} scan failed: ${message}`, {
        kind: err instanceof Error ? err.name : "unknown"
      });
      return ScanResult.failed({ ...base, error: message, scanDuration: elapsedSeconds() });
    }
  }

  private resolveCommand(): string {
    const executable = this.executable ?? this.name;
    const resolved = this.resolveTool(executable, this.toolPath);
    if (!resolved) {
      throw new BackendExecutionError(this.name, `${executable} is not installed or not on PATH`);
    }
    return resolved;
  }

  private async runWithTimeout(request: CommandRequest): Promise<CommandResult> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle first so the runner's abort rejection does not win the race.
        reject(new BackendTimeoutError(this.name, this.timeoutMs));
        controller.abort();
      }, Math.min(this.timeoutMs, MAX_TIMER_MS));
    });
    try {
      return await Promise.race([this.runner({ ...request, signal: controller.signal }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}

export function parseJsonOutput(tool: string, stdout: string, fallback: unknown = null): unknown {
  const trimmed = stdout.trim();
  if (!trimmed) return fallback;
  try {
    return JSON.parse(trimmed);
  } catch (err) {
    throw new ParseError(tool, err instanceof Error ? err.message : String(err));
  }
}
