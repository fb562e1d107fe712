/**
 * Shared test utilities for config tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { CONFIG_DIR, CONFIG_ENV } from './types.js';

export interface TestProject {
  tempDir: string;
  projectDir: string;
  userDir: string;
  cleanup: () => Promise<void>;
}

/**
 * Create a test project with temp directory, git marker and empty user dir
 */
export async function createTestProject(prefix = 'checkpoint-redo-test-'): Promise<TestProject> {
  const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  const projectDir = path.join(tempDir, 'project');
  const userDir = path.join(tempDir, 'home', CONFIG_DIR);

  await fs.mkdir(projectDir, { recursive: true });
  await fs.mkdir(path.join(projectDir, '.git'));

  return {
    tempDir,
    projectDir,
    userDir,
    cleanup: async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
      delete process.env[CONFIG_ENV];
    },
  };
}

/**
 * Write JSON settings into a directory's settings file
 */
export async function writeSettingsFile(
  dir: string,
  settings: Record<string, unknown>,
  local = false
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });

  const filename = local ? 'settings.local.json' : 'settings.json';
  const filePath = path.join(dir, filename);
  await fs.writeFile(filePath, JSON.stringify(settings));

  return filePath;
}

/**
 * Write JSON settings to the project's config directory
 */
export async function writeSettings(
  projectDir: string,
  settings: Record<string, unknown>,
  local = false
): Promise<string> {
  return writeSettingsFile(path.join(projectDir, CONFIG_DIR), settings, local);
}
