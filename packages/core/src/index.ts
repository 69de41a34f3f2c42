export * as Version from "./version";
export * as Platform from "./platform";
export * as Archive from "./archive";
export * as PlatformArchives from "./platform_archives";
export * as Injector from "./injector";
export * as ReleaseNotes from "./release_notes";
export * as Pipeline from "./pipeline";

// Supporting modules
export * as Checksum from "./checksum";
export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Errors from "./errors";
export * as Exec from "./exec";
export * as Git from "./git";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as ToolLocator from "./tool_locator";
export * as Utils from "./utils";
