/**
 * The capability interface the branch-tree engine consumes.
 *
 * Queries answer from the current repository state and may be cached until
 * the next mutation; every mutation flushes caches and bumps `generation`,
 * so derived caches keyed on it go stale together.
 */

import type { GitResult } from './operations.js';
import type { CommitSummary, ReflogEntry, RemoteBranch } from './types.js';

export interface GitQueryFacade {
  readonly generation: number;

  currentBranch(): Promise<string | null>;
  localBranches(): Promise<string[]>;
  remotes(): Promise<string[]>;
  /** Short names of remote-tracking branches, e.g. `origin/main` */
  remoteBranches(): Promise<string[]>;

  commitHash(revision: string): Promise<string | null>;
  treeHash(revision: string): Promise<string | null>;
  committerTimestamp(revision: string): Promise<number>;
  isAncestorOrEqual(ancestor: string, descendant: string): Promise<boolean>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  mergeBase(a: string, b: string): Promise<string | null>;

  /** Commit hashes reachable from `revision`, tip first, in topological order */
  logHashes(revision: string, limit?: number): Promise<string[]>;
  /** Tree hashes of the commits in `include ^exclude` */
  treeHashesBetween(exclude: string, include: string): Promise<string[]>;
  /** Per-commit patch ids of the commits in `include ^exclude` */
  patchIdsBetween(exclude: string, include: string): Promise<string[]>;
  /** Patch id of the whole `from..to` diff, or null when it is empty */
  patchId(from: string, to: string): Promise<string | null>;
  commitsBetween(from: string, to: string): Promise<CommitSummary[]>;
  /** [commits only in a, commits only in b] */
  aheadBehindCounts(a: string, b: string): Promise<[number, number]>;

  /** Reflog of a local (`feature`) or remote-tracking (`origin/feature`) branch, newest first */
  reflog(ref: string): Promise<ReflogEntry[]>;
  latestCheckoutTimestamps(): Promise<Map<string, number>>;
  parseTimespec(timespec: string): Promise<number | null>;

  /** The configured upstream of the branch, when it is a remote-tracking branch */
  strictCounterpart(branch: string): Promise<RemoteBranch | null>;
  /** `<remote>/<branch>` for the first remote that has one */
  inferredCounterpart(branch: string): Promise<RemoteBranch | null>;
  combinedCounterpart(branch: string): Promise<RemoteBranch | null>;
  /** True when the branch has an upstream configured whose remote-tracking branch is gone */
  isMissingTrackingBranch(branch: string): Promise<boolean>;

  rebasedBranch(): Promise<string | null>;
  isMergeInProgress(): Promise<boolean>;

  configGet(key: string): Promise<string | null>;
  configGetRegexp(pattern: string): Promise<Array<[string, string]>>;
}

export interface GitMutations {
  configSet(key: string, value: string): Promise<GitResult<void>>;
  configUnset(key: string): Promise<GitResult<void>>;

  checkout(branch: string): Promise<GitResult<void>>;
  createBranch(branch: string, startPoint: string): Promise<GitResult<void>>;
  deleteBranch(branch: string, force: boolean): Promise<GitResult<void>>;
  rebase(onto: string, forkPoint: string, branch: string, interactive: boolean): Promise<GitResult<void>>;
  merge(from: string, into: string, noEdit: boolean): Promise<GitResult<void>>;
  mergeFastForwardOnly(revision: string): Promise<GitResult<void>>;
  push(remote: string, branch: string, forceWithLease: boolean): Promise<GitResult<void>>;
  pullFastForwardOnly(remote: string, remoteBranch: string): Promise<GitResult<void>>;
  resetKeep(revision: string): Promise<GitResult<void>>;
  fetch(remote: string): Promise<GitResult<void>>;
  setUpstream(branch: string, remoteBranch: string): Promise<GitResult<void>>;

  flushCaches(): void;
}

export type GitFacade = GitQueryFacade & GitMutations;
