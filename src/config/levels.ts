/**
 * Configuration Levels - Path resolution for multi-level config
 */

import * as path from 'path';
import * as os from 'os';
import {
  CONFIG_DIR,
  CONFIG_ENV,
  SETTINGS_FILE_NAME,
  SETTINGS_LOCAL_FILE_NAME,
  type ConfigLevelType,
} from './types.js';
import { pathExists, findProjectRoot, getUserConfigDir } from '../base/utils/path-utils.js';

export { findProjectRoot };

/**
 * One settings file a level may provide
 */
export interface ConfigPathInfo {
  settingsPath: string;
  dir: string;
  exists: boolean;
}

/**
 * Configuration level with resolved paths
 */
export interface ResolvedLevel {
  type: ConfigLevelType;
  priority: number;
  paths: ConfigPathInfo[];
  description: string;
}

/**
 * Parse the CHECKPOINT_REDO_CONFIG environment variable
 */
export function parseExtraConfigDirs(): string[] {
  const value = process.env[CONFIG_ENV];
  if (!value) return [];

  return value
    .split(':')
    .map((dir) => dir.trim())
    .filter((dir) => dir.length > 0)
    .map((dir) => dir.replace(/^~/, os.homedir()));
}

async function pathInfo(dir: string, fileName: string): Promise<ConfigPathInfo> {
  const settingsPath = path.join(dir, fileName);
  return { settingsPath, dir, exists: await pathExists(settingsPath) };
}

/**
 * Get all configuration levels with resolved paths, lowest priority first
 */
export async function getConfigLevels(cwd: string, userDir = getUserConfigDir()): Promise<ResolvedLevel[]> {
  const projectRoot = await findProjectRoot(cwd);
  const projectDir = path.join(projectRoot, CONFIG_DIR);
  const levels: ResolvedLevel[] = [];

  levels.push({
    type: 'user',
    priority: 10,
    paths: [await pathInfo(userDir, SETTINGS_FILE_NAME)],
    description: 'User global settings',
  });

  const extraDirs = parseExtraConfigDirs();
  for (let i = 0; i < extraDirs.length; i++) {
    const dir = extraDirs[i];
    levels.push({
      type: 'extra',
      priority: 20 + i, // Each extra dir has slightly higher priority
      paths: [await pathInfo(dir, SETTINGS_FILE_NAME)],
      description: `Extra config from ${dir}`,
    });
  }

  levels.push({
    type: 'project',
    priority: 30,
    paths: [await pathInfo(projectDir, SETTINGS_FILE_NAME)],
    description: 'Project shared settings',
  });

  levels.push({
    type: 'local',
    priority: 40,
    paths: [await pathInfo(projectDir, SETTINGS_LOCAL_FILE_NAME)],
    description: 'Local personal settings (gitignored)',
  });

  return levels.sort((a, b) => a.priority - b.priority);
}
