/**
 * Options for executing external commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds; the process group receives SIGTERM, then SIGKILL, when exceeded */
  timeout?: number;
};

/**
 * Result of executing an external command
 */
export type ExecResult = {
  /** Exit code (0 = success, 127 = command could not be started) */
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Set when the process was terminated because of `timeout` */
  timedOut?: boolean;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

export type ExecCommandFactoryOptions = {
  /** Working directory used when a call does not pass `cwd` */
  defaultCwd?: string;
  /** Timeout applied when a call does not pass one */
  defaultTimeout?: number;
};
