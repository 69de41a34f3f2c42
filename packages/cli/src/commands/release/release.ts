import { Command } from 'commander';
import { ReleaseCommand } from './release-command';
import type { ReleaseCommandOptions } from './release-command';

/**
 * Registers the release command
 */
export function registerReleaseCommands(program: Command): void {
  const releaseCommand = new ReleaseCommand();

  program
    .command('release')
    .description('Build, package, inject and document a release')
    .argument('<version>', 'Release version, vX.Y.Z')
    .addHelpText('after', `
STAGES:
  validate version → check dependencies → update version files →
  tag → build → remove tag → platform archives → inject → checksums → notes

EXAMPLES:
  relpack release v1.4.0
  relpack release v1.4.0 --json`)
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Show every stage as it starts')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .action(async (version: string, options: ReleaseCommandOptions) => {
      await releaseCommand.executeRelease(version, options);
    });
}
