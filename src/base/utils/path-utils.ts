// src/base/utils/path-utils.ts
import * as os from 'os';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Directory name for checkpoint-redo configuration
 */
export const CONFIG_DIR = '.checkpoint-redo';

/**
 * User-level configuration directory
 */
export function getUserConfigDir(): string {
  return path.join(os.homedir(), CONFIG_DIR);
}

/**
 * Check if a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find project root by looking for a .git or .checkpoint-redo directory
 */
export async function findProjectRoot(cwd: string): Promise<string> {
  let current = path.resolve(cwd);
  const root = path.parse(current).root;

  while (current !== root) {
    if (await pathExists(path.join(current, '.git'))) {
      return current;
    }

    if (await pathExists(path.join(current, CONFIG_DIR))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return cwd;
}
