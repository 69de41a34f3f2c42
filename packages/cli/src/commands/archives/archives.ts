import { Command, InvalidArgumentError } from 'commander';
import { ArchivesCommand } from './archives-command';
import type { ArchivesCommandOptions } from './archives-command';

function parseConcurrency(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Concurrency must be a positive integer.');
  }
  return parsed;
}

/**
 * Registers the platform archives command
 */
export function registerArchivesCommands(program: Command): void {
  const archivesCommand = new ArchivesCommand();

  program
    .command('archives')
    .description('Package per-platform binary directories into archives')
    .argument('[platformsDir]', 'Directory with one subdirectory per platform (default: config platformsDir)')
    .argument('[outputDir]', 'Where to write the archives (default: platformsDir)')
    .option('-c, --concurrency <n>', 'Platforms packaged in parallel', parseConcurrency)
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .action(async (platformsDir: string | undefined, outputDir: string | undefined, options: ArchivesCommandOptions) => {
      await archivesCommand.executeArchives(platformsDir, outputDir, options);
    });
}
