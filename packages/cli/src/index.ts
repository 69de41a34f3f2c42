import { Command } from 'commander';
import { Logger } from '@relpack/core';
import { registerReleaseCommands } from './commands/release/release';
import { registerArchivesCommands } from './commands/archives/archives';
import { registerInjectCommands } from './commands/inject/inject';
import { registerNotesCommands } from './commands/notes/notes';
import type { BaseCommandOptions } from './interfaces/command';

const program = new Command();

program
  .name('relpack')
  .description('Release packaging: build, archive, inject and document a release')
  .version('0.4.0')
  // Subcommand options such as `notes generate --version` must not reach the program
  .enablePositionalOptions();

// Core module logs go through the reporter's verbosity
program.hook('preAction', (_program, actionCommand) => {
  if (Logger.isLogLevel(process.env['LOG_LEVEL'])) return;
  const options: BaseCommandOptions = actionCommand.opts();
  if (options.json || options.quiet) {
    Logger.setLogLevel('silent');
  } else {
    Logger.setLogLevel(options.verbose ? 'debug' : 'warn');
  }
});

registerReleaseCommands(program);
registerArchivesCommands(program);
registerInjectCommands(program);
registerNotesCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error('✗ Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
