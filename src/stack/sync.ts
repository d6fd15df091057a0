/**
 * Sync state of a branch against its parent and its remote counterpart
 */

import type { GitFacade } from '../git/facade.js';
import type { ForkPointResolver } from './fork-point.js';
import type { BranchLayout } from './layout.js';
import type { SquashMergeDetector } from './squash.js';
import {
  EDGE_COLORS,
  type EdgeColor,
  type ParentSyncStatus,
  type RemoteSyncState,
  type SquashMergeDetection,
} from './types.js';

export class SyncStateClassifier {
  constructor(
    private readonly git: GitFacade,
    private readonly layout: BranchLayout,
    private readonly forkPoints: ForkPointResolver,
    private readonly squash: SquashMergeDetector,
    readonly mode: SquashMergeDetection
  ) {}

  /**
   * Null for roots and unmanaged branches
   */
  async parentSyncStatus(branch: string): Promise<ParentSyncStatus | null> {
    const parent = this.layout.parentOf(branch);
    if (parent === null) return null;

    if (await this.squash.isMergedToParent(branch, parent, this.mode)) {
      return 'merged-into-parent';
    }
    if (!(await this.git.isAncestorOrEqual(parent, branch))) {
      return 'out-of-sync';
    }
    const forkPoint = await this.forkPoints.effectiveForkPoint(branch);
    const parentHash = await this.git.commitHash(parent);
    if (forkPoint.isOk() && forkPoint.value.hash === parentHash) {
      return 'in-sync';
    }
    return 'in-sync-fork-point-off';
  }

  async classifyParentEdge(branch: string): Promise<EdgeColor | null> {
    const status = await this.parentSyncStatus(branch);
    return status === null ? null : EDGE_COLORS[status];
  }

  async classifyRemote(branch: string): Promise<RemoteSyncState> {
    if ((await this.git.remotes()).length === 0) {
      return { status: 'no-remotes', remote: null, counterpart: null };
    }
    const counterpart = await this.git.combinedCounterpart(branch);
    if (!counterpart) {
      return { status: 'untracked', remote: null, counterpart: null };
    }

    const state = (status: RemoteSyncState['status']): RemoteSyncState => ({
      status,
      remote: counterpart.remote,
      counterpart: counterpart.name,
    });

    const [ahead, behind] = await this.git.aheadBehindCounts(branch, counterpart.name);
    if (ahead === 0 && behind === 0) return state('in-sync');
    if (behind === 0) return state('ahead');
    if (ahead === 0) return state('behind');

    const local = await this.git.committerTimestamp(branch);
    const remote = await this.git.committerTimestamp(counterpart.name);
    return state(local < remote ? 'diverged-older' : 'diverged-newer');
  }
}
