import { spawn } from "node:child_process";

export interface CommandRequest {
  command: string;
  args: string[];
  cwd?: string;
  signal?: AbortSignal;
}

export interface CommandResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (request: CommandRequest) => Promise<CommandResult>;

/** Spawns the tool and buffers its output; the child is killed when `signal` aborts. */
export const runCommand: CommandRunner = async (request) => {
  return await new Promise((resolve, reject) => {
    let proc: ReturnType<typeof spawn>;
    try {
      proc = spawn(request.command, request.args, {
        stdio: ["ignore", "pipe", "pipe"],
        cwd: request.cwd,
        signal: request.signal,
        killSignal: "SIGKILL"
      });
    } catch (err) {
      reject(err);
      return;
    }
    let stdout = "";
    let stderr = "";
    proc.stdout?.on("data", (chunk) => {
      stdout += chunk.toString();
    });
    proc.stderr?.on("data", (chunk) => {
      stderr += chunk.toString();
    });
    proc.on("error", (err) => reject(err));
    proc.on("close", (code, signal) => resolve({ code, signal, stdout, stderr }));
  });
};
