import type { ExecCommand } from '../exec/exec.types';
import { ToolNotFoundError } from '../errors';
import { createLogger } from '../logger';

const logger = createLogger('[ToolLocator] ');

export type CandidatePredicate = (candidate: string) => Promise<boolean>;

export type ProbeOptions = {
  /** Arguments passed to every candidate (default: ["--version"]) */
  args?: string[];
  timeout?: number;
};

/**
 * Returns the first candidate for which `isValid` holds, in order.
 *
 * @throws ToolNotFoundError listing every candidate tried
 */
export async function locateTool(
  tool: string,
  candidates: string[],
  isValid: CandidatePredicate
): Promise<string> {
  for (const candidate of candidates) {
    if (await isValid(candidate)) {
      logger.debug(`Using ${tool}: ${candidate}`);
      return candidate;
    }
    logger.debug(`${tool} candidate rejected: ${candidate}`);
  }
  throw new ToolNotFoundError(tool, candidates);
}

/**
 * Predicate that accepts a candidate when `<candidate> --version` exits 0.
 */
export function probeCommand(execCommand: ExecCommand, options: ProbeOptions = {}): CandidatePredicate {
  const args = options.args ?? ['--version'];
  return async (candidate: string) => {
    const result = await execCommand(expandHome(candidate), args, { timeout: options.timeout ?? 10_000 });
    return result.exitCode === 0 && !result.timedOut;
  };
}

/**
 * Expands a leading `~/` against HOME; other paths are returned as given.
 */
export function expandHome(candidate: string, home: string | undefined = process.env['HOME']): string {
  if (home && (candidate === '~' || candidate.startsWith('~/'))) {
    return home + candidate.slice(1);
  }
  return candidate;
}
