/**
 * Configuration Loader - Load settings files from every level
 */

import * as fs from 'fs/promises';
import type { Settings, ConfigSource, ConfigLevelType } from './types.js';
import { getConfigLevels, type ConfigPathInfo } from './levels.js';
import { isPlainObject } from './merger.js';
import { logger } from '../base/utils/logger.js';

/**
 * Load a single JSON settings file.
 * Missing files are skipped silently; unreadable ones are logged and skipped.
 */
export async function loadJsonFile(filePath: string): Promise<Settings | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    if (isPlainObject(parsed)) {
      return parsed;
    }
    logger.warn('Config', 'Settings file is not a JSON object', { path: filePath });
  } catch (error) {
    logger.warn('Config', 'Failed to parse settings file', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return null;
}

async function loadFromPathInfo(info: ConfigPathInfo, level: ConfigLevelType): Promise<ConfigSource | null> {
  if (!info.exists) return null;

  const settings = await loadJsonFile(info.settingsPath);
  if (!settings) return null;

  return { level, path: info.settingsPath, settings };
}

/**
 * Load all configuration sources in priority order (lowest first)
 */
export async function loadAllSources(cwd: string, userDir?: string): Promise<ConfigSource[]> {
  const levels = await getConfigLevels(cwd, userDir);
  const sources: ConfigSource[] = [];

  for (const level of levels) {
    for (const info of level.paths) {
      const source = await loadFromPathInfo(info, level.type);
      if (source) {
        sources.push(source);
      }
    }
  }

  logger.debug('Config', 'Loaded sources', { count: sources.length });
  return sources;
}

/**
 * Check which config files exist
 */
export async function getExistingConfigFiles(cwd: string, userDir?: string): Promise<string[]> {
  const levels = await getConfigLevels(cwd, userDir);
  return levels.flatMap((level) => level.paths.filter((info) => info.exists).map((info) => info.settingsPath));
}
