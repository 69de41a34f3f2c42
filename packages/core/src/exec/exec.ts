import { spawn } from 'child_process';
import type { ExecCommand, ExecCommandFactoryOptions, ExecOptions, ExecResult } from './exec.types';
import { ExternalToolFailureError } from '../errors';
import { isErrnoException } from '../utils/fs_helpers';

/** Exit code reported when the executable could not be spawned at all. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/** Time between SIGTERM and SIGKILL once a command has timed out. */
export const KILL_GRACE_MS = 2000;

// Own process group on POSIX, so a timeout reaches the tool's children too
const USE_PROCESS_GROUP = process.platform !== 'win32';

/**
 * Creates the spawn-backed execCommand injected into git, the tool locator
 * and the pipeline. It never rejects: spawn errors and timeouts are folded
 * into the returned ExecResult.
 *
 * On timeout the whole process group gets SIGTERM, then SIGKILL after
 * KILL_GRACE_MS. The call settles as soon as the direct child has exited,
 * even if a descendant still holds stdout or stderr open.
 */
export function createExecCommand(factoryOptions: ExecCommandFactoryOptions = {}): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions) => {
    return new Promise<ExecResult>((resolve) => {
      const cwd = options?.cwd || factoryOptions.defaultCwd || process.cwd();
      const timeout = options?.timeout ?? factoryOptions.defaultTimeout;
      let timedOut = false;
      let settled = false;
      let exitCode: number | null = null;
      let exited = false;

      const proc = spawn(command, args, {
        cwd,
        env: { ...process.env, ...options?.env },
        detached: USE_PROCESS_GROUP,
      });

      let stdout = '';
      let stderr = '';

      const signalTree = (signal: NodeJS.Signals) => {
        if (USE_PROCESS_GROUP && proc.pid !== undefined) {
          try {
            process.kill(-proc.pid, signal);
            return;
          } catch (error) {
            // ESRCH: the group is already gone
            if (isErrnoException(error) && error.code === 'ESRCH') return;
          }
        }
        proc.kill(signal);
      };

      const finish = (result: ExecResult) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(result);
      };

      const finishTimedOut = () => {
        proc.stdout?.destroy();
        proc.stderr?.destroy();
        finish({ exitCode: exitCode ?? 1, stdout, stderr, timedOut });
      };

      const timer = timeout && timeout > 0
        ? setTimeout(() => {
          timedOut = true;
          signalTree('SIGTERM');
          const killTimer = setTimeout(() => signalTree('SIGKILL'), KILL_GRACE_MS);
          // unref: the SIGKILL fallback alone must not keep the event loop alive
          killTimer.unref();
          if (exited) finishTimedOut();
        }, timeout)
        : undefined;

      proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('exit', (code: number | null) => {
        exited = true;
        exitCode = code;
        if (timedOut) finishTimedOut();
      });

      proc.on('close', (code: number | null) => {
        finish({ exitCode: code ?? 1, stdout, stderr, timedOut });
      });

      proc.on('error', (error: Error) => {
        finish({ exitCode: SPAWN_FAILURE_EXIT_CODE, stdout, stderr: error.message, timedOut });
      });
    });
  };
}

/**
 * Runs a command and throws ExternalToolFailureError on a non-zero exit or
 * a timeout.
 */
export async function runChecked(
  execCommand: ExecCommand,
  command: string,
  args: string[],
  options?: ExecOptions
): Promise<ExecResult> {
  const result = await execCommand(command, args, options);
  if (result.timedOut || result.exitCode !== 0) {
    throw new ExternalToolFailureError(command, result.exitCode, result.stderr, result.timedOut ?? false);
  }
  return result;
}
