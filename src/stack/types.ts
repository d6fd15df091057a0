/**
 * Types shared by the branch-tree engine
 */

import type { StackError } from './errors.js';

export interface BranchQualifiers {
  rebase: boolean;
  push: boolean;
  slideOut: boolean;
  /** `update=merge`: sync with the parent by merging instead of rebasing */
  updateWithMerge: boolean;
}

export interface Annotation {
  text: string;
  qualifiers: BranchQualifiers;
}

/**
 * A node of the branch arena. Relations are names, never object references.
 */
export interface BranchNode {
  name: string;
  parent: string | null;
  children: string[];
  annotation: Annotation;
}

export type SquashMergeDetection = 'none' | 'simple' | 'exact';

export const SQUASH_MERGE_DETECTION_MODES: readonly SquashMergeDetection[] = ['none', 'simple', 'exact'];

/**
 * Relation of a branch to its parent in the tree
 */
export type ParentSyncStatus = 'in-sync' | 'in-sync-fork-point-off' | 'out-of-sync' | 'merged-into-parent';

export type EdgeColor = 'green' | 'yellow' | 'red' | 'grey';

export const EDGE_COLORS: Record<ParentSyncStatus, EdgeColor> = {
  'in-sync': 'green',
  'in-sync-fork-point-off': 'yellow',
  'out-of-sync': 'red',
  'merged-into-parent': 'grey',
};

/**
 * Relation of a branch to its remote counterpart
 */
export type RemoteSyncStatus =
  | 'no-remotes'
  | 'untracked'
  | 'in-sync'
  | 'ahead'
  | 'behind'
  | 'diverged-newer'
  | 'diverged-older';

export interface RemoteSyncState {
  status: RemoteSyncStatus;
  /** Remote name, set for every status that has a counterpart */
  remote: string | null;
  /** Counterpart short name, e.g. `origin/feature` */
  counterpart: string | null;
}

/**
 * A local branch together with the local or remote-tracking ref whose reflog matched
 */
export interface BranchPair {
  branch: string;
  ref: string;
}

export interface ForkPoint {
  hash: string;
  containing: BranchPair[];
}

/**
 * Result of one step of an interactive walk
 */
export type Outcome = { kind: 'continue' } | { kind: 'cancelled' } | { kind: 'failed'; error: StackError };

export const CONTINUE: Outcome = { kind: 'continue' };
export const CANCELLED: Outcome = { kind: 'cancelled' };

export const failed = (error: StackError): Outcome => ({ kind: 'failed', error });
