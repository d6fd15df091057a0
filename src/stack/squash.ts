/**
 * Detects branches whose changes already landed in their parent
 */

import type { GitFacade } from '../git/facade.js';
import type { Reporter } from '../ui/reporter.js';
import type { ForkPointResolver } from './fork-point.js';
import type { SquashMergeDetection } from './types.js';

export class SquashMergeDetector {
  constructor(
    private readonly git: GitFacade,
    private readonly forkPoints: ForkPointResolver,
    private readonly reporter: Reporter
  ) {}

  async isMergedToParent(branch: string, parent: string, mode: SquashMergeDetection): Promise<boolean> {
    if (await this.git.isAncestorOrEqual(branch, parent)) {
      // a branch freshly created off its parent has an empty filtered reflog
      // and is not considered merged yet
      return (await this.forkPoints.filteredReflog(branch)).length > 0;
    }

    switch (mode) {
      case 'none':
        return false;
      case 'simple':
        return this.isEquivalentTreeReachable(branch, parent);
      case 'exact':
        return (
          (await this.isEquivalentTreeReachable(branch, parent)) ||
          (await this.isEquivalentPatchReachable(branch, parent))
        );
    }
  }

  /**
   * Some commit in `parent ^branch` has exactly the tree of the branch tip
   */
  private async isEquivalentTreeReachable(branch: string, parent: string): Promise<boolean> {
    const tree = await this.git.treeHash(branch);
    if (!tree) return false;
    const found = (await this.git.treeHashesBetween(branch, parent)).includes(tree);
    if (found) this.reporter.debug(`tree of ${branch} (${tree}) is reachable from ${parent}`);
    return found;
  }

  /**
   * The branch's whole diff since the merge base equals the patch of some
   * single commit the parent gained since then
   */
  private async isEquivalentPatchReachable(branch: string, parent: string): Promise<boolean> {
    const base = await this.git.mergeBase(parent, branch);
    if (!base) return false;
    const patchId = await this.git.patchId(base, branch);
    if (!patchId) return false;
    const found = (await this.git.patchIdsBetween(base, parent)).includes(patchId);
    if (found) this.reporter.debug(`patch of ${branch} (${patchId}) is reachable from ${parent}`);
    return found;
  }
}
