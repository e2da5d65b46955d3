import type { Stats } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import ignore from "ignore";
import { DEFAULT_EXCLUDES } from "../config/defaults.js";

async function loadGitignore(root: string): Promise<string[]> {
  try {
    const raw = await readFile(path.join(root, ".gitignore"), "utf-8");
    return raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line && !line.startsWith("#"));
  } catch {
    return [];
  }
}

export function normalizeFileTypes(fileTypes: readonly string[]): string[] {
  return fileTypes.map((type) => type.trim().toLowerCase()).filter(Boolean);
}

/**
 * A target is supported when no file types are declared, when a file target's
 * name ends with one of them, or when any file under a directory target does.
 * Files ignored by the directory's .gitignore do not count.
 */
export async function supportsTarget(
  target: string,
  fileTypes: readonly string[],
  exclude: readonly string[] = DEFAULT_EXCLUDES
): Promise<boolean> {
  const types = normalizeFileTypes(fileTypes);
  if (!types.length) return true;

  let info: Stats;
  try {
    info = await stat(target);
  } catch {
    return false;
  }

  if (info.isFile()) {
    const name = path.basename(target).toLowerCase();
    return types.some((type) => name.endsWith(type));
  }
  if (!info.isDirectory()) return false;

  const stream = fg.stream(
    types.map((type) => `**/*${fg.escapePath(type)}`),
    {
      cwd: target,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      caseSensitiveMatch: false,
      ignore: [...exclude]
    }
  );
  const ig = ignore().add(await loadGitignore(target));
  for await (const entry of stream) {
    if (!ig.ignores(entry.toString())) return true;
  }
  return false;
}
