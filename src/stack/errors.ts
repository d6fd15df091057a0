/**
 * Branch-tree error types using neverthrow for Rust-style error handling
 */

import { err, ok, Result } from 'neverthrow';
import type { GitError } from '../git/types.js';

/**
 * All possible error codes for branch-tree operations
 */
export type StackErrorCode =
  | 'NOT_IN_REPO'
  | 'LAYOUT_PARSE_ERROR'
  | 'LAYOUT_IO_ERROR'
  | 'FORK_POINT_NOT_FOUND'
  | 'INVARIANT_VIOLATION'
  | 'NOT_MANAGED'
  | 'ALREADY_MANAGED'
  | 'BRANCH_NOT_FOUND'
  | 'NO_BRANCHES'
  | 'NO_CANDIDATE'
  | 'AMBIGUOUS_CANDIDATE'
  | 'OPERATION_IN_PROGRESS'
  | 'INVALID_ARGUMENT'
  | 'CONFIG_ERROR'
  | 'GIT_ERROR';

/**
 * Structured error for branch-tree operations
 */
export class StackError extends Error {
  constructor(
    public readonly code: StackErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'StackError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    let output = this.message;
    if (this.suggestion) {
      output += `\n\nSuggestion: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * Result type alias for branch-tree operations
 */
export type StackResult<T> = Result<T, StackError>;

/**
 * Helper to create a successful result
 */
export const stackOk = <T>(value: T): StackResult<T> => ok(value);

/**
 * Helper to create an error result
 */
export const stackErr = <T = never>(
  code: StackErrorCode,
  message: string,
  details?: Record<string, unknown>,
  suggestion?: string
): StackResult<T> => err(new StackError(code, message, details, suggestion));

/**
 * Wrap a failed git command
 */
export function gitFailure(operation: string, error: GitError): StackError {
  return new StackError('GIT_ERROR', `Git ${operation} failed: ${error.message}`, {
    operation,
    command: error.command,
    exitCode: error.exitCode,
  });
}

/**
 * Common error constructors for consistent error messages
 */
export const StackErrors = {
  notInRepo: () =>
    stackErr(
      'NOT_IN_REPO',
      'Not a git repository',
      undefined,
      'Run this command from within a git repository'
    ),

  layoutParse: (line: number, reason: string, file?: string) =>
    stackErr(
      'LAYOUT_PARSE_ERROR',
      `${file ? `${file}, ` : ''}line ${line}: ${reason}`,
      { line, reason, file }
    ),

  forkPointNotFound: (branch: string) =>
    stackErr(
      'FORK_POINT_NOT_FOUND',
      `Fork point not found for branch ${branch}`,
      { branch },
      `Use 'arbor fork-point ${branch} --override-to=<revision>'`
    ),

  invariant: (message: string) =>
    stackErr('INVARIANT_VIOLATION', `Branch tree invariant violated: ${message}`),

  notManaged: (branch: string) =>
    stackErr(
      'NOT_MANAGED',
      `Branch '${branch}' not found in the tree of branch dependencies`,
      { branch },
      `Use 'arbor add ${branch}' or 'arbor discover'`
    ),

  alreadyManaged: (branch: string) =>
    stackErr(
      'ALREADY_MANAGED',
      `Branch '${branch}' already exists in the tree of branch dependencies`,
      { branch }
    ),

  branchNotFound: (branch: string) =>
    stackErr(
      'BRANCH_NOT_FOUND',
      `'${branch}' is not a local branch`,
      { branch },
      `Create the branch first with 'git checkout -b ${branch}'`
    ),

  noBranches: () =>
    stackErr(
      'NO_BRANCHES',
      'No branches listed in the branch layout file',
      undefined,
      "Use 'arbor discover' or 'arbor add' to build the tree"
    ),

  noCandidate: (message: string) => stackErr('NO_CANDIDATE', message),

  ambiguousCandidate: (message: string, candidates: string[]) =>
    stackErr('AMBIGUOUS_CANDIDATE', message, { candidates }),

  operationInProgress: (operation: string, branch: string) =>
    stackErr(
      'OPERATION_IN_PROGRESS',
      `${operation} of ${branch} in progress`,
      { operation, branch },
      `Finish it with 'git ${operation.toLowerCase()} --continue' or abort it, then run the command again`
    ),

  invalidArgument: (message: string) => stackErr('INVALID_ARGUMENT', message),

  gitError: (operation: string, error: GitError): StackResult<never> => err(gitFailure(operation, error)),

  configError: <T = never>(message: string): StackResult<T> =>
    stackErr('CONFIG_ERROR', `Configuration error: ${message}`),
};
