/**
 * Config Module Exports
 */

export { ConfigManager, toCommandsOptions, type ConfigManagerOptions } from './manager.js';
export { deepMerge, mergeSettings, createMergeSummary } from './merger.js';
export { getConfigLevels, parseExtraConfigDirs, findProjectRoot } from './levels.js';
export { loadAllSources, loadJsonFile } from './loader.js';
export type { Settings, ConfigSource, ConfigLevelType, MergedConfig, ResolvedSettings } from './types.js';
export { CONFIG_DIR, CONFIG_ENV, SETTINGS_FILE_NAME, SETTINGS_LOCAL_FILE_NAME } from './types.js';
