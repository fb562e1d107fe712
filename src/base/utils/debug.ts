/**
 * Debug configuration module
 * Controls debug output for the controller components
 *
 * Debug Levels:
 * - CHECKPOINT_REDO_DEBUG=0 or unset: No debug output (default)
 * - CHECKPOINT_REDO_DEBUG=1: Standard debug output (checks, step counts)
 * - CHECKPOINT_REDO_DEBUG=2: Verbose debug output (log positions, state dumps)
 */

export type DebugLevel = 0 | 1 | 2;

export const DEBUG_ENV = 'CHECKPOINT_REDO_DEBUG';

export interface DebugConfig {
  level: DebugLevel;
  enabled: boolean; // level >= 1
  verbose: boolean; // level >= 2
  components: {
    history: DebugLevel;
    checkpoint: DebugLevel;
    commands: DebugLevel;
    config: DebugLevel;
    host: DebugLevel;
  };
}

export type DebugComponent = keyof DebugConfig['components'];

let cachedConfig: DebugConfig | null = null;

/**
 * Parse debug level from environment variable
 */
function parseDebugLevel(value: string | undefined): DebugLevel {
  if (!value) return 0;
  const level = parseInt(value, 10);
  if (level === 2) return 2;
  if (level === 1) return 1;
  return 0;
}

/**
 * Get debug configuration based on environment variables
 *
 * - CHECKPOINT_REDO_DEBUG=0|1|2: global level
 * - CHECKPOINT_REDO_DEBUG_<COMPONENT>=1|2: component-specific level
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env[DEBUG_ENV]);
  const componentLevel = (name: string): DebugLevel =>
    parseDebugLevel(process.env[`${DEBUG_ENV}_${name}`]) || globalLevel;

  cachedConfig = {
    level: globalLevel,
    enabled: globalLevel >= 1,
    verbose: globalLevel >= 2,
    components: {
      history: componentLevel('HISTORY'),
      checkpoint: componentLevel('CHECKPOINT'),
      commands: componentLevel('COMMANDS'),
      config: componentLevel('CONFIG'),
      host: componentLevel('HOST'),
    },
  };

  return cachedConfig;
}

/**
 * Check if debug is enabled for a specific component (level >= 1)
 */
export function isDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 1;
}

/**
 * Check if verbose debug is enabled for a specific component (level >= 2)
 */
export function isVerboseDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 2;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}
