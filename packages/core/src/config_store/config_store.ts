/**
 * ConfigStore Interface
 *
 * Abstraction for relpack.config.json persistence (filesystem, or memory
 * for tests).
 */

import type { ProjectConfigFile } from '../config_manager/config_manager.types';

export const CONFIG_FILE_NAME = 'relpack.config.json';

/**
 * Interface for project configuration persistence.
 *
 * Implementations:
 * - FsConfigStore: Filesystem-based (<projectRoot>/relpack.config.json)
 * - MemoryConfigStore: In-memory for tests
 */
export interface ConfigStore {
  /**
   * Load the raw parsed configuration. Schema validation is the
   * ConfigManager's job.
   *
   * @returns parsed JSON, or null when there is no config file
   */
  loadConfig(): Promise<unknown>;

  saveConfig(config: ProjectConfigFile): Promise<void>;

  /** Human-readable location used in error messages */
  describeLocation(): string;
}
