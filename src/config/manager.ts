/**
 * Configuration Manager - Multi-level settings for the undo/redo commands
 *
 * Configuration hierarchy (merged in order, later overrides earlier):
 * 1. User: ~/.checkpoint-redo/settings.json
 * 2. Extra: CHECKPOINT_REDO_CONFIG directories
 * 3. Project: .checkpoint-redo/settings.json
 * 4. Local: .checkpoint-redo/settings.local.json
 * 5. CLI: Command line arguments
 *
 * The merged object is validated once; invalid settings fall back to the
 * defaults.
 */

import type { Settings, MergedConfig, ConfigSource, ResolvedSettings } from './types.js';
import { loadAllSources, getExistingConfigFiles } from './loader.js';
import { mergeAllSources, mergeWithCliArgs, createMergeSummary } from './merger.js';
import { findProjectRoot } from './levels.js';
import { defaultSettings, validateSettings } from '../base/utils/config-validator.js';
import type { CommandsOptions } from '../core/commands/commands.js';
import { logger } from '../base/utils/logger.js';

export interface ConfigManagerOptions {
  cwd?: string;
  /** Overrides ~/.checkpoint-redo */
  userDir?: string;
}

export class ConfigManager {
  private cwd: string;
  private userDir?: string;
  private projectRoot: string | null = null;
  private mergedConfig: MergedConfig | null = null;
  private resolved: ResolvedSettings = defaultSettings();
  private cliArgs: Settings = {};

  constructor(options: ConfigManagerOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.userDir = options.userDir;
  }

  /**
   * Load, merge and validate all configuration sources
   */
  async load(): Promise<MergedConfig> {
    this.projectRoot = await findProjectRoot(this.cwd);

    const sources = await loadAllSources(this.cwd, this.userDir);
    let merged = mergeAllSources(sources);

    if (Object.keys(this.cliArgs).length > 0) {
      merged = mergeWithCliArgs(merged, this.cliArgs);
    }

    this.mergedConfig = merged;
    this.resolved = this.resolve(merged);
    return merged;
  }

  /**
   * Set CLI argument overrides; applied on the next load
   */
  setCliArgs(args: Settings): void {
    this.cliArgs = args;
  }

  /**
   * Validated settings (defaults until load() runs)
   */
  get(): ResolvedSettings {
    return { ...this.resolved, notices: { ...this.resolved.notices } };
  }

  getSources(): ConfigSource[] {
    return this.mergedConfig?.sources ?? [];
  }

  async getExistingFiles(): Promise<string[]> {
    return getExistingConfigFiles(this.cwd, this.userDir);
  }

  getDebugSummary(): string {
    if (!this.mergedConfig) {
      return 'Configuration not loaded';
    }
    return createMergeSummary(this.mergedConfig);
  }

  getProjectRoot(): string {
    return this.projectRoot ?? this.cwd;
  }

  getCwd(): string {
    return this.cwd;
  }

  private resolve(merged: MergedConfig): ResolvedSettings {
    const context = merged.sources.map((source) => source.path).join(', ') || '<defaults>';
    const result = validateSettings(merged.settings, context);

    if (!result.valid || !result.data) {
      logger.warn('Config', 'Using default settings', { errors: (result.errors ?? []).join('; ') });
      return defaultSettings();
    }
    return result.data;
  }
}

/**
 * Map validated settings onto the command facade's options
 */
export function toCommandsOptions(settings: ResolvedSettings): CommandsOptions {
  return {
    selectionScopedUndo: settings.selectionScopedUndo,
    redoAllLimit: settings.redoAllLimit,
    confirmSteps: settings.notices.enabled,
  };
}
