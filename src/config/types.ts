/**
 * Configuration Types - Multi-level configuration
 *
 * Configuration hierarchy (priority from low to high):
 * 1. User Level: ~/.checkpoint-redo/
 * 2. Extra Dirs: CHECKPOINT_REDO_CONFIG environment variable
 * 3. Project Level: <project>/.checkpoint-redo/settings.json
 * 4. Local Level: <project>/.checkpoint-redo/settings.local.json
 * 5. CLI Arguments: Command line overrides
 */

export { CONFIG_DIR } from '../base/utils/path-utils.js';
export type { ResolvedSettings } from '../base/utils/config-validator.js';

// =============================================================================
// Settings Types
// =============================================================================

/**
 * Raw settings as read from one file, before validation
 */
export type Settings = Record<string, unknown>;

// =============================================================================
// Source Types
// =============================================================================

export type ConfigLevelType = 'user' | 'extra' | 'project' | 'local' | 'cli';

/**
 * One loaded settings file
 */
export interface ConfigSource {
  level: ConfigLevelType;
  path: string;
  settings: Settings;
}

/**
 * All sources merged in priority order
 */
export interface MergedConfig {
  settings: Settings;
  sources: ConfigSource[];
}

// =============================================================================
// Constants
// =============================================================================

export const SETTINGS_FILE_NAME = 'settings.json';
export const SETTINGS_LOCAL_FILE_NAME = 'settings.local.json';

/**
 * Colon-separated list of extra config directories
 */
export const CONFIG_ENV = 'CHECKPOINT_REDO_CONFIG';
