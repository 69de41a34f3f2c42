import { Command } from 'commander';
import { InjectCommand } from './inject-command';
import type { InjectCommandOptions } from './inject-command';

/**
 * Registers the inject command
 */
export function registerInjectCommands(program: Command): void {
  const injectCommand = new InjectCommand();

  program
    .command('inject')
    .description('Inject platform archives into the release archives under platforms/')
    .option('--dist-dir <dir>', 'Directory holding the release archives (default: config distDir)')
    .option('--platform-archives-dir <dir>', 'Directory holding the platform archives (default: config platformArchivesDir)')
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .action(async (options: InjectCommandOptions) => {
      await injectCommand.executeInject(options);
    });
}
