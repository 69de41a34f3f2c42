/**
 * ConfigManager Types
 */

export type InjectionFailurePolicy = "fail-run" | "report-only";

export type CompletenessMode = "strict" | "warn-only";

/**
 * Regex rewrite applied to a source file before the build. `replacement`
 * contains `{version}`, substituted with the release tag.
 */
export type VersionFileRule = {
  path: string;
  pattern: string;
  replacement: string;
};

/**
 * Contents of relpack.config.json. Every key is optional.
 */
export type ProjectConfigFile = {
  product?: string;
  distDir?: string;
  platformsDir?: string;
  platformArchivesDir?: string;
  releaseNotesDir?: string;
  releaseNotesOutput?: string;
  build?: {
    candidates?: string[];
    args?: string[];
    configFile?: string | null;
    timeoutMs?: number;
  };
  platformBuild?: {
    command: string;
    args?: string[];
    timeoutMs?: number;
  } | null;
  versionFiles?: VersionFileRule[];
  versionFilesCommand?: {
    command: string;
    args?: string[];
    timeoutMs?: number;
  } | null;
  concurrency?: number;
  injectionFailurePolicy?: InjectionFailurePolicy;
  completeness?: CompletenessMode;
  git?: {
    timeoutMs?: number;
  };
};

export type BuildToolConfig = {
  /** Probed in order with `--version`; the first that answers is used */
  candidates: string[];
  args: string[];
  /** Project-relative file that must exist before building, or null */
  configFile: string | null;
  timeoutMs: number;
};

export type PlatformBuildConfig = {
  command: string;
  args: string[];
  timeoutMs: number;
};

/**
 * Run after the version files are rewritten, e.g. to regenerate a resource
 * file from them. `{version}` in `args` becomes the release tag.
 */
export type VersionFilesCommandConfig = {
  command: string;
  args: string[];
  timeoutMs: number;
};

/**
 * Fully resolved configuration. Directory paths are absolute.
 */
export type ReleaseConfig = {
  projectRoot: string;
  product: string;
  distDir: string;
  platformsDir: string;
  platformArchivesDir: string;
  releaseNotesDir: string;
  /** File name of the aggregated notes document */
  releaseNotesOutput: string;
  build: BuildToolConfig;
  platformBuild: PlatformBuildConfig | null;
  versionFiles: VersionFileRule[];
  versionFilesCommand: VersionFilesCommandConfig | null;
  concurrency: number;
  injectionFailurePolicy: InjectionFailurePolicy;
  completeness: CompletenessMode;
  git: {
    timeoutMs: number;
  };
};

export interface IConfigManager {
  loadConfig(): Promise<ProjectConfigFile | null>;
  resolveConfig(): Promise<ReleaseConfig>;
}
