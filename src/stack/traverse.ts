/**
 * Interactive walk over the branch tree.
 *
 * Each visited branch gets one turn: slide it out when it is merged into its
 * parent, otherwise rebase (or merge) it onto the parent when the edge is not
 * green, then sync it with its remote counterpart. Every action is confirmed
 * through the prompter; `q` stops the walk where it is.
 */

import { GitConfigKeys } from '../config/manager.js';
import { isYes, type Answer } from '../ui/prompter.js';
import { ask, type EngineContext } from './context.js';
import { gitFailure, StackErrors, stackOk, type StackResult } from './errors.js';
import { rootBranch } from './navigation.js';
import { syncWithRemote, type PushOptions } from './remote-sync.js';
import {
  CANCELLED,
  CONTINUE,
  failed,
  type Outcome,
  type ParentSyncStatus,
  type RemoteSyncState,
} from './types.js';
import { printStatus } from './visualizer.js';

export type ReturnTo = 'here' | 'nearest-remaining' | 'stay';

export const RETURN_TO_VALUES: readonly ReturnTo[] = ['here', 'nearest-remaining', 'stay'];

export function isReturnTo(value: string): value is ReturnTo {
  return RETURN_TO_VALUES.some((candidate) => candidate === value);
}

export interface TraverseOptions extends PushOptions {
  fetch: boolean;
  listCommits: boolean;
  merge: boolean;
  noEditMerge: boolean;
  noInteractiveRebase: boolean;
  returnTo: ReturnTo;
  /** `here`, `root`, `first-root` or a managed branch name */
  startFrom: string;
  stopAfter: string | null;
}

export const DEFAULT_TRAVERSE_OPTIONS: TraverseOptions = {
  fetch: false,
  listCommits: false,
  merge: false,
  noEditMerge: false,
  noInteractiveRebase: false,
  pushTracked: true,
  pushUntracked: true,
  returnTo: 'stay',
  startFrom: 'here',
  stopAfter: null,
};

/** Result of a confirmed step: `done` when it ran, `declined` on `N` */
type StepOutcome = Outcome | 'done' | 'declined';

const PUSH_RELATED: ReadonlySet<RemoteSyncState['status']> = new Set([
  'untracked',
  'ahead',
  'diverged-newer',
]);

export class TraversalEngine {
  private current: string;
  private nearestRemaining: string;
  private actionSuggested = false;

  constructor(
    private readonly ctx: EngineContext,
    private readonly initialBranch: string,
    private readonly options: TraverseOptions
  ) {
    this.current = initialBranch;
    this.nearestRemaining = initialBranch;
  }

  async run(): Promise<Outcome> {
    const { ctx, options } = this;

    const blocked = await this.checkNothingInProgress();
    if (blocked.isErr()) return failed(blocked.error);

    if (options.stopAfter !== null && !ctx.layout.has(options.stopAfter)) {
      return StackErrors.notManaged(options.stopAfter).match(() => CONTINUE, failed);
    }

    if (options.fetch) {
      const fetched = await this.fetchRemotes();
      if (fetched.kind !== 'continue') return fetched;
    }

    const start = this.resolveStart();
    if (start.isErr()) return failed(start.error);

    if (start.value !== this.current) {
      const checkout = await ctx.git.checkout(start.value);
      if (checkout.isErr()) return failed(gitFailure('checkout', checkout.error));
      this.current = start.value;
    }

    const order = ctx.layout.branchNames();
    for (const branch of order.slice(order.indexOf(start.value))) {
      if (!ctx.layout.has(branch)) continue;

      const outcome = await this.visit(branch);
      if (outcome.kind !== 'continue') return outcome;
      if (branch === options.stopAfter) break;
    }

    return this.finish();
  }

  private async visit(branch: string): Promise<Outcome> {
    const { ctx, options } = this;
    const parent = ctx.layout.parentOf(branch);
    const qualifiers = ctx.layout.annotationOf(branch).qualifiers;

    const parentStatus = parent === null ? null : await ctx.classifier.parentSyncStatus(branch);
    const needsSlideOut = parentStatus === 'merged-into-parent' && qualifiers.slideOut;

    let remote = await ctx.classifier.classifyRemote(branch);
    const mergeMode = options.merge || qualifiers.updateWithMerge;
    const needsParentSync =
      parent !== null &&
      !needsSlideOut &&
      remote.status !== 'diverged-older' &&
      qualifiers.rebase &&
      needsSync(parentStatus, mergeMode);

    if (!needsSlideOut && !needsParentSync && !this.needsRemoteSync(branch, remote)) {
      return CONTINUE;
    }

    this.actionSuggested = true;
    if (branch !== this.current) {
      const checkout = await ctx.git.checkout(branch);
      if (checkout.isErr()) return failed(gitFailure('checkout', checkout.error));
      this.current = branch;
    }
    ctx.reporter.info('');
    await printStatus(ctx, { listCommits: options.listCommits, warnOnYellowEdges: true });
    ctx.reporter.info('');

    if (needsSlideOut && parent !== null) {
      const step = await this.slideOut(branch, parent);
      // a declined slide-out still goes on to the remote
      if (step !== 'declined') return step;
    } else if (needsParentSync && parent !== null) {
      const step = mergeMode
        ? await this.mergeParent(branch, parent)
        : await this.rebaseOntoParent(branch, parent);
      if (step === 'done') {
        remote = await ctx.classifier.classifyRemote(branch);
      } else if (step !== 'declined') {
        return step;
      }
    }

    if (this.needsRemoteSync(branch, remote)) {
      return syncWithRemote(ctx, branch, remote, options);
    }
    return CONTINUE;
  }

  private needsRemoteSync(branch: string, remote: RemoteSyncState): boolean {
    if (remote.status === 'behind' || remote.status === 'diverged-older') return true;
    if (!PUSH_RELATED.has(remote.status)) return false;
    if (!this.ctx.layout.annotationOf(branch).qualifiers.push) return false;
    return remote.status === 'untracked' ? this.options.pushUntracked : this.options.pushTracked;
  }

  private async slideOut(branch: string, parent: string): Promise<Outcome | 'declined'> {
    const { ctx } = this;
    const head = `Branch ${branch} is merged into ${parent}.`;
    const answer = await ask(ctx, `${head} Slide ${branch} out of the tree of branch dependencies?`, {
      yesMessage: `${head} Sliding ${branch} out of the tree of branch dependencies...`,
    });
    if (!isYes(answer)) return declinedOrQuit(answer);

    const children = ctx.layout.slideOut(branch);
    if (children.isErr()) return failed(children.error);
    const saved = await ctx.store.save(ctx.layout);
    if (saved.isErr()) return failed(saved.error);

    if (this.nearestRemaining === branch) {
      this.nearestRemaining = children.value[0] ?? parent;
    }
    return answer === 'yes-quit' ? CANCELLED : CONTINUE;
  }

  private async rebaseOntoParent(branch: string, parent: string): Promise<StepOutcome> {
    const { ctx, options } = this;
    const answer = await ask(ctx, `Rebase ${branch} onto ${parent}?`, {
      yesMessage: `Rebasing ${branch} onto ${parent}...`,
    });
    if (!isYes(answer)) return declinedOrQuit(answer);

    const forkPoint = await ctx.forkPoints.effectiveForkPoint(branch);
    if (forkPoint.isErr()) return failed(forkPoint.error);

    const result = await ctx.git.rebase(parent, forkPoint.value.hash, branch, !options.noInteractiveRebase);
    if (await ctx.git.rebasedBranch()) {
      ctx.reporter.info(`Rebase of ${branch} in progress; stopping the traversal`);
      return CANCELLED;
    }
    if (result.isErr()) return failed(gitFailure('rebase', result.error));
    return answer === 'yes-quit' ? CANCELLED : 'done';
  }

  private async mergeParent(branch: string, parent: string): Promise<StepOutcome> {
    const { ctx, options } = this;
    const answer = await ask(ctx, `Merge ${parent} into ${branch}?`, {
      yesMessage: `Merging ${parent} into ${branch}...`,
    });
    if (!isYes(answer)) return declinedOrQuit(answer);

    const result = await ctx.git.merge(parent, branch, options.noEditMerge);
    if (await ctx.git.isMergeInProgress()) {
      ctx.reporter.info(`Merge of ${parent} into ${branch} in progress; stopping the traversal`);
      return CANCELLED;
    }
    if (result.isErr()) return failed(gitFailure('merge', result.error));
    return answer === 'yes-quit' ? CANCELLED : 'done';
  }

  private async finish(): Promise<Outcome> {
    const { ctx, options } = this;
    const last = this.current;

    const target =
      options.returnTo === 'here'
        ? this.initialBranch
        : options.returnTo === 'nearest-remaining'
          ? this.nearestRemaining
          : null;
    if (target !== null && target !== this.current) {
      const checkout = await ctx.git.checkout(target);
      if (checkout.isErr()) return failed(gitFailure('checkout', checkout.error));
      this.current = target;
    }

    ctx.reporter.info('');
    await printStatus(ctx, { listCommits: options.listCommits, warnOnYellowEdges: true });
    ctx.reporter.info('');

    const managed = ctx.layout.branchNames();
    if (last === managed[managed.length - 1]) {
      ctx.reporter.info(`Reached branch ${last} which has no successor; nothing left to update`);
    } else {
      ctx.reporter.info(
        `No successor of ${last} needs to be slid out or synced with upstream branch or remote; ` +
          'nothing left to update'
      );
    }
    if (!this.actionSuggested && !ctx.layout.roots.includes(this.initialBranch)) {
      ctx.reporter.info(
        'Tip: traverse starts from the current branch by default; ' +
          'use --start-from= or --whole to change this.'
      );
    }

    const stillThere = this.nearestRemaining === this.initialBranch;
    if (options.returnTo === 'here' || (options.returnTo === 'nearest-remaining' && stillThere)) {
      ctx.reporter.info(`Returned to the initial branch ${this.initialBranch}`);
    } else if (options.returnTo === 'nearest-remaining') {
      ctx.reporter.info(
        `The initial branch ${this.initialBranch} has been slid out. ` +
          `Returned to nearest remaining managed branch ${this.nearestRemaining}`
      );
    }
    return CONTINUE;
  }

  private resolveStart(): StackResult<string> {
    const { layout } = this.ctx;
    const { startFrom } = this.options;
    if (startFrom === 'first-root') {
      const [first] = layout.roots;
      return first === undefined ? StackErrors.noBranches() : stackOk(first);
    }
    if (startFrom === 'root') return rootBranch(this.ctx, this.current, 'first');
    if (startFrom === 'here') {
      return layout.has(this.current) ? stackOk(this.current) : StackErrors.notManaged(this.current);
    }
    return layout.has(startFrom) ? stackOk(startFrom) : StackErrors.notManaged(startFrom);
  }

  private async checkNothingInProgress(): Promise<StackResult<void>> {
    const rebased = await this.ctx.git.rebasedBranch();
    if (rebased) return StackErrors.operationInProgress('Rebase', rebased);
    if (await this.ctx.git.isMergeInProgress()) return StackErrors.operationInProgress('Merge', this.current);
    return stackOk(undefined);
  }

  private async fetchRemotes(): Promise<Outcome> {
    const { ctx } = this;
    for (const remote of await ctx.git.remotes()) {
      if (ctx.config.fetchRemotes[remote] === false) {
        ctx.reporter.debug(`skipping fetch of ${remote} (${GitConfigKeys.traverseFetch(remote)} is false)`);
        continue;
      }
      ctx.reporter.info(`Fetching ${remote}...`);
      const result = await ctx.git.fetch(remote);
      if (result.isErr()) return failed(gitFailure('fetch', result.error));
    }
    return CONTINUE;
  }
}

function needsSync(status: ParentSyncStatus | null, mergeMode: boolean): boolean {
  if (status === 'out-of-sync') return true;
  return !mergeMode && status === 'in-sync-fork-point-off';
}

function declinedOrQuit(answer: Answer): Outcome | 'declined' {
  return answer === 'quit' ? CANCELLED : 'declined';
}
