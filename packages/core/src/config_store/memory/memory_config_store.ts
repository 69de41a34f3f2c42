/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 */

import type { ConfigStore } from '../config_store';
import type { ProjectConfigFile } from '../../config_manager/config_manager.types';

/**
 * In-memory ConfigStore implementation for tests.
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ product: 'tool', concurrency: 4 });
 * const manager = new ConfigManager(configStore, '/work/tool');
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: unknown = null;

  async loadConfig(): Promise<unknown> {
    return this.config;
  }

  async saveConfig(config: ProjectConfigFile): Promise<void> {
    this.config = config;
  }

  describeLocation(): string {
    return 'memory://relpack.config.json';
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set configuration directly (for test setup). Accepts any value so
   * invalid configurations can be exercised; null clears it.
   */
  setConfig(config: unknown): void {
    this.config = config;
  }
}
