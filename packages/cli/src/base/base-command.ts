/**
 * Base Command Class for the relpack CLI
 *
 * Provides common functionality and enforces standards across all commands.
 */

import { DependencyInjectionService } from '../services/dependency-injection';
import { Reporter, resolveColor } from '../reporter';
import type { BaseCommandOptions } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions> {

  protected readonly dependencyService = DependencyInjectionService.getInstance();

  /**
   * Reporter honouring `--quiet`, `--verbose` and `--no-color`.
   * Under `--json` human output is suppressed.
   */
  protected createReporter(options: TOptions): Reporter {
    return new Reporter({
      color: resolveColor(options.color),
      quiet: Boolean(options.quiet || options.json),
      verbose: Boolean(options.verbose),
    });
  }

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: unknown, exitCode: number = 1, data?: unknown): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode,
        ...(data === undefined ? {} : { data })
      }, null, 2));
    } else {
      this.createReporter(options).error(message);
      if (options.verbose && error instanceof Error && error.stack) {
        console.error(error.stack);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    if (options.json) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else if (message) {
      this.createReporter(options).success(message);
    }
  }

  protected errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
