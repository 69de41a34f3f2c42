/**
 * Standard Command Interface for the relpack CLI
 */

/**
 * Base options that all commands support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  /** False when `--no-color` was given */
  color?: boolean;
}
