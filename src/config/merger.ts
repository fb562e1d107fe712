/**
 * Configuration Merger - Merge settings from multiple sources
 *
 * - Objects: deep merge recursively
 * - Scalars and arrays: higher priority replaces lower
 */

import type { Settings, ConfigSource, MergedConfig } from './types.js';

/**
 * Check if a value is a plain object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two settings objects; undefined never overrides
 */
export function deepMerge(base: Settings, override: Settings): Settings {
  const result: Settings = { ...base };

  for (const [key, overrideValue] of Object.entries(override)) {
    if (overrideValue === undefined) {
      continue;
    }

    const baseValue = result[key];
    result[key] =
      isPlainObject(baseValue) && isPlainObject(overrideValue) ? deepMerge(baseValue, overrideValue) : overrideValue;
  }

  return result;
}

/**
 * Merge all sources (lowest priority first) into a single settings object
 */
export function mergeSettings(sources: ConfigSource[]): Settings {
  let merged: Settings = {};

  for (const source of sources) {
    merged = deepMerge(merged, source.settings);
  }

  return merged;
}

export function mergeAllSources(sources: ConfigSource[]): MergedConfig {
  return { settings: mergeSettings(sources), sources };
}

/**
 * CLI arguments have the highest priority
 */
export function mergeWithCliArgs(merged: MergedConfig, cliArgs: Settings): MergedConfig {
  return {
    settings: deepMerge(merged.settings, cliArgs),
    sources: [...merged.sources, { level: 'cli', path: '<cli>', settings: cliArgs }],
  };
}

/**
 * Create a debug summary of the merge process
 */
export function createMergeSummary(merged: MergedConfig): string {
  const lines: string[] = ['Configuration Sources (in priority order):'];

  if (merged.sources.length === 0) {
    lines.push('  (none, using defaults)');
  }
  for (const source of merged.sources) {
    lines.push(`  ${source.level} - ${source.path}`);
  }

  return lines.join('\n');
}
