/**
 * ConfigManager - Project Configuration Manager
 *
 * Provides typed access to relpack.config.json with defaults applied.
 * Uses ConfigStore abstraction for backend-agnostic persistence.
 */

import * as path from "path";
import type { ConfigStore } from "../config_store/config_store";
import type {
  IConfigManager,
  ProjectConfigFile,
  ReleaseConfig,
  VersionFileRule,
} from "./config_manager.types";
import { ReleaseConfigSchema, validateAgainstSchema } from "../schemas";
import { ConfigValidationError } from "../errors";
import { containsPath } from "../utils/fs_helpers";

const THIRTY_MINUTES = 30 * 60 * 1000;
const FIVE_MINUTES = 5 * 60 * 1000;

export const DEFAULT_BUILD_CANDIDATES = ["goreleaser", "~/go/bin/goreleaser"];
export const DEFAULT_BUILD_ARGS = ["release", "--clean", "--skip-validate", "--skip-publish"];
export const DEFAULT_VERSION_FILES: VersionFileRule[] = [
  {
    path: "build-with-version.sh",
    pattern: "^VERSION=\\$\\{1:-v[0-9]+\\.[0-9]+\\.[0-9]+\\}",
    replacement: "VERSION=${1:-{version}}",
  },
];

function isProjectConfigFile(data: unknown): data is ProjectConfigFile {
  return validateAgainstSchema(ReleaseConfigSchema, data).length === 0;
}

/**
 * Configuration Manager Class
 *
 * @example
 * ```typescript
 * // Production usage
 * const configManager = new ConfigManager(new FsConfigStore(root), root);
 *
 * // Test usage
 * const store = new MemoryConfigStore();
 * store.setConfig({ product: "tool" });
 * const configManager = new ConfigManager(store, "/work/tool");
 * ```
 */
export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;
  private readonly projectRoot: string;

  constructor(configStore: ConfigStore, projectRoot: string) {
    this.configStore = configStore;
    this.projectRoot = path.resolve(projectRoot);
  }

  /**
   * Load and validate relpack.config.json
   *
   * @returns null when the project has no config file
   * @throws ConfigValidationError when the file does not match the schema
   */
  async loadConfig(): Promise<ProjectConfigFile | null> {
    const raw = await this.configStore.loadConfig();
    if (raw === null) return null;

    if (!isProjectConfigFile(raw)) {
      throw new ConfigValidationError(
        this.configStore.describeLocation(),
        validateAgainstSchema(ReleaseConfigSchema, raw)
      );
    }
    return raw;
  }

  /**
   * Resolve the effective configuration, applying defaults to every key
   */
  async resolveConfig(): Promise<ReleaseConfig> {
    const config = (await this.loadConfig()) ?? {};
    const resolve = (value: string) => path.resolve(this.projectRoot, value);

    const distDir = resolve(config.distDir || "dist");
    // distDir is deleted before every build
    if (containsPath(distDir, this.projectRoot)) {
      throw new ConfigValidationError(this.configStore.describeLocation(), [{
        field: "distDir",
        message: "must not be the project root or one of its parents",
        value: config.distDir,
      }]);
    }
    const platformsDir = config.platformsDir ? resolve(config.platformsDir) : path.join(distDir, "platforms");
    const buildConfigFile = config.build?.configFile;

    return {
      projectRoot: this.projectRoot,
      product: config.product || path.basename(this.projectRoot),
      distDir,
      platformsDir,
      platformArchivesDir: config.platformArchivesDir ? resolve(config.platformArchivesDir) : platformsDir,
      releaseNotesDir: resolve(config.releaseNotesDir || "release-notes"),
      releaseNotesOutput: config.releaseNotesOutput || "RELEASE-NOTES.md",
      build: {
        candidates: config.build?.candidates || DEFAULT_BUILD_CANDIDATES,
        args: config.build?.args || DEFAULT_BUILD_ARGS,
        configFile: buildConfigFile === undefined ? ".goreleaser.yml" : buildConfigFile,
        timeoutMs: config.build?.timeoutMs || THIRTY_MINUTES,
      },
      platformBuild: config.platformBuild === null
        ? null
        : {
          command: config.platformBuild?.command || "make",
          args: config.platformBuild?.args || (config.platformBuild ? [] : ["build-all-platforms"]),
          timeoutMs: config.platformBuild?.timeoutMs || THIRTY_MINUTES,
        },
      versionFiles: config.versionFiles || DEFAULT_VERSION_FILES,
      versionFilesCommand: config.versionFilesCommand
        ? {
          command: config.versionFilesCommand.command,
          args: config.versionFilesCommand.args || ["{version}"],
          timeoutMs: config.versionFilesCommand.timeoutMs || FIVE_MINUTES,
        }
        : null,
      concurrency: config.concurrency || 2,
      injectionFailurePolicy: config.injectionFailurePolicy || "fail-run",
      completeness: config.completeness || "warn-only",
      git: {
        timeoutMs: config.git?.timeoutMs || 30_000,
      },
    };
  }
}
