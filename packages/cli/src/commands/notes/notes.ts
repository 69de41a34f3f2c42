import { Command, Option } from 'commander';
import { NotesCommand } from './notes-command';
import type { NotesCheckOptions, NotesGenerateOptions, NotesListMissingOptions } from './notes-command';

/**
 * Registers the release notes commands
 */
export function registerNotesCommands(program: Command): void {
  const notesCommand = new NotesCommand();

  const notes = program
    .command('notes')
    .description('Aggregate and check structured release notes')
    .addHelpText('after', `
RECORDS:
  One {version}.json per release in the release notes directory,
  e.g. release-notes/1.4.0.json for tag v1.4.0.

EXAMPLES:
  relpack notes generate
  relpack notes generate --version v1.4.0 --output dist
  relpack notes check --strict`);

  notes
    .command('generate')
    .description('Write the aggregated release notes document')
    .option('--version <version>', 'Only this version (v1.2.3 or 1.2.3)')
    .option('-o, --output <dir>', 'Output directory (default: project root)')
    .option('-f, --filename <name>', 'Output file name (default: config releaseNotesOutput)')
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .action(async (options: NotesGenerateOptions) => {
      await notesCommand.executeGenerate(options);
    });

  notes
    .command('check')
    .description('Fail when a release tag has no valid release notes record')
    .addOption(new Option('--strict', 'Fail on missing or invalid records').conflicts('warnOnly'))
    .addOption(new Option('--warn-only', 'Report findings but always pass').conflicts('strict'))
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .action(async (options: NotesCheckOptions) => {
      await notesCommand.executeCheck(options);
    });

  notes
    .command('list-missing')
    .description('List release tags without a release notes record')
    .option('--json', 'Output results in JSON format')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .action(async (options: NotesListMissingOptions) => {
      await notesCommand.executeListMissing(options);
    });
}
