/**
 * Path manipulation and executable lookup
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

/**
 * Ensure a path ends with a separator
 */
export function ensureTrailingSep(dirPath: string): string {
  return dirPath.endsWith(path.sep) ? dirPath : dirPath + path.sep;
}

/**
 * Get the base name without extension
 */
export function getBaseName(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a command name against PATH the way a shell's `command -v` does.
 * Names containing a separator are checked as paths directly.
 */
export async function resolveExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | null> {
  if (command.includes(path.sep)) {
    const absolute = path.resolve(command);
    return (await isExecutableFile(absolute)) ? absolute : null;
  }

  const dirs = (env.PATH ?? "")
    .split(path.delimiter)
    .filter((dir) => dir.length > 0);
  for (const dir of dirs) {
    const candidate = path.join(dir, command);
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}
