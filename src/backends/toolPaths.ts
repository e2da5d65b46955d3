import path from "node:path";
import os from "node:os";
import { accessSync, constants, statSync } from "node:fs";

export type ToolResolver = (tool: string, override?: string | null) => string | null;

export interface ToolResolverOptions {
  /** Defaults to ~/.scanmesh/tools. */
  toolsDir?: string;
  /** Defaults to process.env.PATH at lookup time. */
  pathEnv?: string;
  platform?: NodeJS.Platform;
}

export function getToolsDir(): string {
  return path.join(os.homedir(), ".scanmesh", "tools");
}

function isWindows(platform: NodeJS.Platform): boolean {
  return platform === "win32";
}

/**
 * Managed installs live either in their own prefix (pip venvs, unpacked
 * release archives) or as a single binary in the shared bin directory.
 */
function managedCandidates(toolsDir: string, tool: string, platform: NodeJS.Platform): string[] {
  if (isWindows(platform)) {
    return [path.join(toolsDir, tool, "Scripts", `${tool}.exe`), path.join(toolsDir, "bin", `${tool}.exe`)];
  }
  return [path.join(toolsDir, tool, "bin", tool), path.join(toolsDir, "bin", tool)];
}

function pathCandidates(pathEnv: string, tool: string, platform: NodeJS.Platform): string[] {
  const extList = isWindows(platform) ? [".exe", ".cmd", ".bat", ""] : [""];
  return pathEnv
    .split(path.delimiter)
    .filter(Boolean)
    .flatMap((dir) => extList.map((ext) => path.join(dir, `${tool}${ext}`)));
}

/** Regular files only; off Windows the execute bit must be set for this user. */
export function isExecutableFile(filePath: string, platform: NodeJS.Platform = process.platform): boolean {
  try {
    if (!statSync(filePath).isFile()) return false;
    if (!isWindows(platform)) accessSync(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Explicit override first, then the managed tools dir, then PATH. */
export function createToolResolver(options: ToolResolverOptions = {}): ToolResolver {
  return (tool, override) => {
    const platform = options.platform ?? process.platform;
    const candidates = [
      ...(override ? [override] : []),
      ...managedCandidates(options.toolsDir ?? getToolsDir(), tool, platform),
      ...pathCandidates(options.pathEnv ?? process.env.PATH ?? "", tool, platform)
    ];
    return candidates.find((candidate) => isExecutableFile(candidate, platform)) ?? null;
  };
}

export const resolveToolPath: ToolResolver = createToolResolver();
