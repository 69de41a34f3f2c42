/**
 * ConfigStore - Configuration persistence abstraction
 *
 * This module only exports the interface. For implementations, use:
 * - @relpack/core/fs for FsConfigStore
 * - @relpack/core/memory for MemoryConfigStore
 */

export type { ConfigStore } from './config_store';
export { CONFIG_FILE_NAME } from './config_store';
