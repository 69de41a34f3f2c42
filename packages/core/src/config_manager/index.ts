export { ConfigManager, DEFAULT_BUILD_CANDIDATES, DEFAULT_BUILD_ARGS, DEFAULT_VERSION_FILES } from "./config_manager";
export type {
  IConfigManager,
  ProjectConfigFile,
  ReleaseConfig,
  BuildToolConfig,
  PlatformBuildConfig,
  VersionFileRule,
  VersionFilesCommandConfig,
  InjectionFailurePolicy,
  CompletenessMode,
} from "./config_manager.types";
