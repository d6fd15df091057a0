/**
 * Core type definitions for git operations
 */

export interface Repository {
  root: string;
  gitDir: string;
  commonDir: string;
}

/**
 * One line of `git reflog`, newest first
 */
export interface ReflogEntry {
  hash: string;
  subject: string;
}

/**
 * A remote-tracking branch, e.g. `{ remote: 'origin', name: 'origin/feature' }`
 */
export interface RemoteBranch {
  remote: string;
  name: string;
}

export interface CommitSummary {
  hash: string;
  shortHash: string;
  subject: string;
}

export class GitError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'GitError';
  }
}
