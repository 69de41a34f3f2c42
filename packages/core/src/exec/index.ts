export { createExecCommand, runChecked, SPAWN_FAILURE_EXIT_CODE } from './exec';
export type { ExecCommand, ExecCommandFactoryOptions, ExecOptions, ExecResult } from './exec.types';
