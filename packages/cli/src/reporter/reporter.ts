/**
 * Reporter - Console output for humans
 *
 * Color is decided once, by the caller, and passed in explicitly.
 */

import chalk from 'chalk';
import type { Pipeline } from '@relpack/core';

type Chalk = InstanceType<typeof chalk.Instance>;

export type ReporterOptions = {
  color: boolean;
  quiet?: boolean;
  verbose?: boolean;
  /** Line sinks, console by default */
  out?: (line: string) => void;
  err?: (line: string) => void;
};

/**
 * Color on unless `--no-color`, NO_COLOR or a non-TTY stdout says otherwise.
 */
export function resolveColor(
  flag: boolean | undefined,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = Boolean(process.stdout.isTTY)
): boolean {
  if (flag === false) return false;
  if (env['NO_COLOR'] !== undefined && env['NO_COLOR'] !== '') return false;
  return isTTY;
}

export class Reporter {
  private readonly chalk: Chalk;
  private readonly quiet: boolean;
  private readonly verbose: boolean;
  private readonly out: (line: string) => void;
  private readonly err: (line: string) => void;

  constructor(options: ReporterOptions) {
    this.chalk = new chalk.Instance({ level: options.color ? 1 : 0 });
    this.quiet = options.quiet ?? false;
    this.verbose = options.verbose ?? false;
    this.out = options.out ?? (line => console.log(line));
    this.err = options.err ?? (line => console.error(line));
  }

  success(message: string): void {
    if (!this.quiet) this.out(`${this.chalk.green('✓')} ${message}`);
  }

  info(message: string): void {
    if (!this.quiet) this.out(`${this.chalk.blue('i')} ${message}`);
  }

  debug(message: string): void {
    if (this.verbose && !this.quiet) this.out(this.chalk.gray(message));
  }

  warn(message: string): void {
    this.err(`${this.chalk.yellow('!')} ${message}`);
  }

  error(message: string): void {
    this.err(`${this.chalk.red('✗')} ${message}`);
  }

  header(title: string): void {
    if (this.quiet) return;
    this.out('');
    this.out(this.chalk.bold.underline(title));
  }

  keyValue(key: string, value: string | number): void {
    if (!this.quiet) this.out(`  ${this.chalk.gray(`${key}:`)} ${value}`);
  }

  line(text: string): void {
    if (!this.quiet) this.out(text);
  }

  /**
   * Prints one line per finished stage; warnings as they happen.
   */
  pipelineObserver(): Pipeline.PipelineObserver {
    return (event) => {
      switch (event.type) {
        case 'stage:started':
          this.debug(`→ ${event.stage}`);
          break;
        case 'stage:warning':
          this.warn(`${event.stage}: ${event.message}`);
          break;
        case 'stage:completed': {
          const { outcome } = event;
          if (outcome.status === 'failed') {
            this.error(`${outcome.stage}: ${outcome.error ?? 'failed'}`);
          } else {
            this.success(`${outcome.stage} ${this.chalk.gray(`(${outcome.durationMs} ms)`)}`);
          }
          break;
        }
        case 'pipeline:completed':
          break;
      }
    };
  }
}
