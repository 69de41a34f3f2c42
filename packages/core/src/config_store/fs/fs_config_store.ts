/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Also provides the static project root lookup used by the CLI.
 */

import { promises as fs, existsSync } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import { CONFIG_FILE_NAME } from '../config_store';
import type { ProjectConfigFile } from '../../config_manager/config_manager.types';
import { ConfigValidationError } from '../../errors';
import { isErrnoException, writeFileAtomic } from '../../utils/fs_helpers';
import { ConfigManager } from '../../config_manager/config_manager';

export class FsConfigStore implements ConfigStore {
  private readonly configPath: string;

  constructor(projectRootPath: string) {
    this.configPath = path.join(projectRootPath, CONFIG_FILE_NAME);
  }

  /**
   * @returns parsed JSON, or null when the file does not exist
   * @throws ConfigValidationError when the file is not valid JSON
   */
  async loadConfig(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new ConfigValidationError(this.configPath, [{
        field: 'root',
        message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        value: null,
      }]);
    }
  }

  async saveConfig(config: ProjectConfigFile): Promise<void> {
    await writeFileAtomic(this.configPath, JSON.stringify(config, null, 2) + '\n');
  }

  describeLocation(): string {
    return this.configPath;
  }

  // ==================== Static Utility Methods ====================

  /**
   * Finds the project root by searching upwards for relpack.config.json,
   * falling back to the nearest directory holding .git.
   *
   * @param startPath - Starting path (default: process.cwd())
   * @returns Absolute path to project root, or null if not found
   */
  static findProjectRoot(startPath: string = process.cwd()): string | null {
    const ancestors: string[] = [];
    let currentPath = path.resolve(startPath);
    for (;;) {
      ancestors.push(currentPath);
      const parent = path.dirname(currentPath);
      if (parent === currentPath) break;
      currentPath = parent;
    }

    return ancestors.find(dir => existsSync(path.join(dir, CONFIG_FILE_NAME)))
      ?? ancestors.find(dir => existsSync(path.join(dir, '.git')))
      ?? null;
  }
}

/**
 * Create a ConfigManager for the current project.
 *
 * @param projectRoot - Optional project root path (auto-detected if not provided)
 * @returns ConfigManager instance with FsConfigStore backend
 */
export function createConfigManager(projectRoot?: string): ConfigManager {
  const resolvedRoot = projectRoot || FsConfigStore.findProjectRoot() || process.cwd();
  return new ConfigManager(new FsConfigStore(resolvedRoot), resolvedRoot);
}
