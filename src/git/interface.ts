/**
 * Git operations interface for dependency injection
 *
 * This interface allows mocking git operations in tests.
 */

import { GitOperations, type GitExecOptions, type GitResult } from './operations.js';

export type { GitExecOptions, GitResult };

export interface GitExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface IGitOperations {
  exec(args: string[], options?: GitExecOptions): Promise<GitExecResult>;
  execResult(args: string[], options?: GitExecOptions): Promise<GitResult<string>>;
}

/**
 * Default implementation using the real GitOperations
 */
export const defaultGitOps: IGitOperations = {
  exec: (args, options) => GitOperations.exec(args, options),
  execResult: (args, options) => GitOperations.execResult(args, options),
};
