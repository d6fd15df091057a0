/**
 * Edits of the branch tree that may also touch the repository:
 * adding a branch, sliding branches out, advancing a branch onto its child
 * and deleting branches that left the tree.
 */

import { err } from 'neverthrow';
import { YES_NO, YES_NO_ONLY_QUIT, isYes } from '../ui/prompter.js';
import type { Reporter } from '../ui/reporter.js';
import { ask, type EngineContext } from './context.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';
import type { BranchLayout, InsertPosition } from './layout.js';

export interface AddOptions {
  onto?: string;
  asRoot?: boolean;
  asFirstChild?: boolean;
}

/**
 * Add `branch` to the tree. Resolves to false when the user declined.
 */
export async function addBranch(
  ctx: EngineContext,
  branch: string,
  options: AddOptions = {}
): Promise<StackResult<boolean>> {
  const { git, layout } = ctx;
  if (layout.has(branch)) {
    return StackErrors.alreadyManaged(branch);
  }
  let onto = options.onto;
  if (onto !== undefined && !layout.has(onto)) {
    return StackErrors.notManaged(onto);
  }

  if (!(await git.localBranches()).includes(branch)) {
    const remoteBranch = await soleRemoteBranch(ctx, branch);
    if (remoteBranch) {
      const head = `A local branch ${branch} does not exist, but a remote branch ${remoteBranch} exists.\n`;
      const answer = await ask(ctx, `${head}Check out ${branch} locally?`, {
        yesMessage: `${head}Checking out ${branch} locally...`,
        choices: YES_NO,
      });
      if (!isYes(answer)) return stackOk(false);
      const created = await git.createBranch(branch, remoteBranch);
      if (created.isErr()) return StackErrors.gitError('branch', created.error);
    } else {
      const from = onto ?? 'the current HEAD';
      const answer = await ask(ctx, `A local branch ${branch} does not exist. Create out of ${from}?`, {
        yesMessage: `A local branch ${branch} does not exist. Creating out of ${from}`,
        choices: YES_NO,
      });
      if (!isYes(answer)) return stackOk(false);

      if (onto === undefined) {
        const current = await git.currentBranch();
        if (layout.roots.length > 0) {
          if (current && layout.has(current)) onto = current;
        } else if (current) {
          // an empty tree gets the current branch as its first root
          const root = layout.add(current, null);
          if (root.isErr()) return err(root.error);
          ctx.reporter.info(`Added branch ${current} as a new root`);
          onto = current;
        }
      }
      const created = await git.createBranch(branch, onto ?? 'HEAD');
      if (created.isErr()) return StackErrors.gitError('branch', created.error);
    }
  }

  if (options.asRoot || layout.roots.length === 0) {
    const added = layout.add(branch, null);
    if (added.isErr()) return err(added.error);
    ctx.reporter.info(`Added branch ${branch} as a new root`);
  } else {
    if (onto === undefined) {
      const inferred = await ctx.forkPoints.inferParent(branch, (candidate) => layout.has(candidate));
      if (!inferred) {
        return StackErrors.noCandidate(
          `Could not automatically infer upstream (parent) branch for ${branch}.\n` +
            'You can either:\n' +
            '1) specify the desired upstream branch with --onto or\n' +
            `2) pass --as-root to attach ${branch} as a new root`
        );
      }
      const answer = await ask(ctx, `Add ${branch} onto the inferred upstream (parent) branch ${inferred}?`, {
        yesMessage: `Adding ${branch} onto the inferred upstream (parent) branch ${inferred}`,
        choices: YES_NO,
      });
      if (!isYes(answer)) return stackOk(false);
      onto = inferred;
    }
    const position: InsertPosition = options.asFirstChild ? 'first' : 'last';
    const added = layout.add(branch, onto, { position });
    if (added.isErr()) return err(added.error);
    ctx.reporter.info(`Added branch ${branch} onto ${onto}`);
  }

  const saved = await ctx.store.save(layout);
  return saved.map(() => true);
}

async function soleRemoteBranch(ctx: EngineContext, branch: string): Promise<string | null> {
  const remotes = await ctx.git.remotes();
  const matches = (await ctx.git.remoteBranches()).filter((name) =>
    remotes.some((remote) => name === `${remote}/${branch}`)
  );
  const [only] = matches;
  return matches.length === 1 && only ? only : null;
}

export interface SlideOutOptions {
  deleteBranches?: boolean;
  downForkPoint?: string;
  merge?: boolean;
  noEditMerge?: boolean;
  noInteractiveRebase?: boolean;
}

/**
 * Remove a chain of branches (each the only child of the previous one) from
 * the tree, attach the children of the last one to the parent of the first,
 * and rebase (or merge) those children onto it.
 */
export async function slideOutBranches(
  ctx: EngineContext,
  branches: readonly string[],
  options: SlideOutOptions = {}
): Promise<StackResult<void>> {
  const { git, layout } = ctx;
  const [first] = branches;
  const last = branches[branches.length - 1];
  if (first === undefined || last === undefined) {
    return StackErrors.invalidArgument('No branches to slide out');
  }

  for (const branch of branches) {
    if (!layout.has(branch)) return StackErrors.notManaged(branch);
    if (!layout.annotationOf(branch).qualifiers.slideOut) {
      return StackErrors.invalidArgument(
        `Branch ${branch} is annotated with slide-out=no qualifier, aborting.\n` +
          "Remove the qualifier using 'arbor anno' or edit the branch layout file directly."
      );
    }
    if (layout.parentOf(branch) === null) {
      return StackErrors.invalidArgument(`No upstream branch defined for ${branch}, cannot slide out`);
    }
  }

  let downForkPoint: string | null = null;
  if (options.downForkPoint !== undefined) {
    const children = layout.childrenOf(last);
    const [child] = children;
    if (children.length > 1) {
      return StackErrors.invalidArgument(
        "Last branch to slide out can't have more than one child branch if option --down-fork-point is passed"
      );
    }
    if (child === undefined) {
      return StackErrors.invalidArgument(
        'Last branch to slide out must have a child branch if option --down-fork-point is passed'
      );
    }
    downForkPoint = await git.commitHash(options.downForkPoint);
    if (!downForkPoint) {
      return StackErrors.invalidArgument(`Cannot find revision ${options.downForkPoint}`);
    }
    if (!(await git.isAncestorOrEqual(downForkPoint, child))) {
      return StackErrors.invalidArgument(
        `Fork point ${options.downForkPoint} is not ancestor of or the tip of the ${child} branch`
      );
    }
  }

  for (let i = 0; i + 1 < branches.length; i++) {
    const upper = branches[i] ?? '';
    const lower = branches[i + 1] ?? '';
    const children = layout.childrenOf(upper);
    if (children.length === 0) {
      return StackErrors.invalidArgument(`No downstream branch defined for ${upper}, cannot slide out`);
    }
    if (children.length > 1) {
      return StackErrors.invalidArgument(
        `Multiple downstream branches defined for ${upper}: ${children.join(', ')}; cannot slide out`
      );
    }
    if (children[0] !== lower) {
      return StackErrors.invalidArgument(`${lower} is not downstream of ${upper}, cannot slide out`);
    }
  }

  const newParent = layout.parentOf(first) ?? '';
  const newChildren = [...layout.childrenOf(last)];
  for (const child of newChildren) {
    const moved = layout.reattach(child, newParent, 'last');
    if (moved.isErr()) return moved;
  }
  for (const branch of [...branches].reverse()) {
    const removed = layout.remove(branch);
    if (removed.isErr()) return removed;
  }
  const saved = await ctx.store.save(layout);
  if (saved.isErr()) return saved;

  const checkout = await git.checkout(newParent);
  if (checkout.isErr()) return StackErrors.gitError('checkout', checkout.error);

  for (const child of newChildren) {
    const qualifiers = layout.annotationOf(child).qualifiers;
    const useMerge = options.merge === true || qualifiers.updateWithMerge;
    if (!useMerge && !qualifiers.rebase) continue;

    const switched = await git.checkout(child);
    if (switched.isErr()) return StackErrors.gitError('checkout', switched.error);

    if (useMerge) {
      ctx.reporter.info(`Merging ${newParent} into ${child}...`);
      const merged = await git.merge(newParent, child, options.noEditMerge === true);
      if (merged.isErr()) return StackErrors.gitError('merge', merged.error);
      continue;
    }

    ctx.reporter.info(`Rebasing ${child} onto ${newParent}...`);
    let forkPoint = downForkPoint;
    if (forkPoint === null) {
      const effective = await ctx.forkPoints.effectiveForkPoint(child);
      if (effective.isErr()) return err(effective.error);
      forkPoint = effective.value.hash;
    }
    const rebased = await git.rebase(newParent, forkPoint, child, options.noInteractiveRebase !== true);
    if (rebased.isErr()) return StackErrors.gitError('rebase', rebased.error);
  }

  if (options.deleteBranches) {
    return deleteBranches(ctx, branches, false);
  }
  return stackOk(undefined);
}

/**
 * Slide out every childless managed branch whose upstream was removed from its remote
 */
export async function slideOutRemovedFromRemote(
  ctx: EngineContext,
  options: { deleteBranches?: boolean } = {}
): Promise<StackResult<void>> {
  const { git, layout } = ctx;
  const removed: string[] = [];
  for (const branch of layout.branchNames()) {
    if (layout.childrenOf(branch).length === 0 && (await git.isMissingTrackingBranch(branch))) {
      ctx.reporter.info(`Sliding out ${branch}`);
      removed.push(branch);
    }
  }
  for (const branch of removed) {
    const result = layout.remove(branch);
    if (result.isErr()) return result;
  }
  const saved = await ctx.store.save(layout);
  if (saved.isErr()) return saved;

  if (options.deleteBranches) {
    return deleteBranches(ctx, removed, true);
  }
  return stackOk(undefined);
}

/**
 * Fast-forward `branch` to its single green-edge child, optionally push it,
 * then slide the child out
 */
export async function advance(ctx: EngineContext, branch: string): Promise<StackResult<void>> {
  const { git, layout, forkPoints } = ctx;
  if (!layout.has(branch)) return StackErrors.notManaged(branch);

  const children = layout.childrenOf(branch);
  if (children.length === 0) {
    return StackErrors.noCandidate(
      `${branch} does not have any downstream (child) branches to advance towards`
    );
  }

  const branchHash = await git.commitHash(branch);
  const candidates: string[] = [];
  for (const child of children) {
    if (await ctx.squash.isMergedToParent(child, branch, 'none')) continue;
    if (!(await git.isAncestorOrEqual(branch, child))) continue;
    const overridden = await forkPoints.overriddenForkPoint(child);
    if (overridden || branchHash === (await forkPoints.inferForkPoint(child))) {
      candidates.push(child);
    }
  }

  const [sole] = candidates;
  if (sole === undefined) {
    return StackErrors.noCandidate(
      `No downstream (child) branch of ${branch} is connected to ${branch} with a green edge`
    );
  }

  let child = sole;
  if (candidates.length > 1) {
    if (ctx.config.yes) {
      return StackErrors.ambiguousCandidate(
        `More than one downstream (child) branch of ${branch} is connected to ${branch} ` +
          'with a green edge and -y/--yes option is specified',
        candidates
      );
    }
    const picked = await ctx.prompter.pick(
      `Downstream branch towards which ${branch} is to be fast-forwarded`,
      candidates
    );
    if (picked === null) return stackOk(undefined);
    child = picked;
  } else {
    const answer = await ask(ctx, `Fast-forward ${branch} to match ${child}?`, {
      yesMessage: `Fast-forwarding ${branch} to match ${child}...`,
      choices: YES_NO,
    });
    if (!isYes(answer)) return stackOk(undefined);
  }

  const fastForwarded = await git.mergeFastForwardOnly(child);
  if (fastForwarded.isErr()) return StackErrors.gitError('merge', fastForwarded.error);

  let done = `\nBranch ${branch} is now fast-forwarded to match ${child}.`;
  const counterpart = await git.combinedCounterpart(branch);
  if (counterpart && layout.annotationOf(branch).qualifiers.push) {
    const head = `\nBranch ${branch} is now fast-forwarded to match ${child}. `;
    const answer = await ask(ctx, `${head}Push ${branch} to ${counterpart.remote}?`, {
      yesMessage: `${head}Pushing ${branch} to ${counterpart.remote}...`,
      choices: YES_NO,
    });
    if (isYes(answer)) {
      const pushed = await git.push(counterpart.remote, branch, false);
      if (pushed.isErr()) return StackErrors.gitError('push', pushed.error);
      done = `\nBranch ${branch} is now pushed to ${counterpart.remote}.`;
    }
  }

  if (layout.annotationOf(child).qualifiers.slideOut) {
    const answer = await ask(ctx, `${done} Slide ${child} out of the tree of branch dependencies?`, {
      yesMessage: `${done} Sliding ${child} out of the tree of branch dependencies...`,
      choices: YES_NO,
    });
    if (isYes(answer)) {
      const slid = layout.slideOut(child);
      if (slid.isErr()) return err(slid.error);
      return ctx.store.save(layout);
    }
  }
  return stackOk(undefined);
}

/**
 * Delete local branches that are not in the tree, asking for each
 */
export async function deleteUnmanaged(ctx: EngineContext): Promise<StackResult<void>> {
  ctx.reporter.info('Checking for unmanaged branches...');
  const unmanaged = (await ctx.git.localBranches()).filter((branch) => !ctx.layout.has(branch));
  return deleteBranches(ctx, unmanaged, ctx.config.yes);
}

/**
 * Delete `branches`, never the current one. Branches merged to HEAD come first;
 * they are deleted without force only when their remote counterpart lacks them.
 */
export async function deleteBranches(
  ctx: EngineContext,
  branches: readonly string[],
  yes: boolean
): Promise<StackResult<void>> {
  const { git } = ctx;
  const current = await git.currentBranch();
  let toDelete = [...branches];
  if (current && toDelete.includes(current)) {
    toDelete = toDelete.filter((branch) => branch !== current);
    ctx.reporter.info(`Skipping current branch ${current}`);
  }
  if (toDelete.length === 0) {
    ctx.reporter.info('No branches to delete');
    return stackOk(undefined);
  }

  const merged: string[] = [];
  const unmerged: string[] = [];
  for (const branch of toDelete) {
    ((await git.isAncestorOrEqual(branch, 'HEAD')) ? merged : unmerged).push(branch);
  }

  const confirm = async (description: string) => {
    const context = yes ? { ...ctx, config: { ...ctx.config, yes: true } } : ctx;
    return ask(context, `Delete branch ${description}?`, {
      yesMessage: `Deleting branch ${description}...`,
      choices: YES_NO_ONLY_QUIT,
    });
  };

  for (const branch of merged) {
    const remote = await git.strictCounterpart(branch);
    const mergedToRemote = remote ? await git.isAncestorOrEqual(branch, remote.name) : true;
    const suffix = remote && !mergedToRemote ? `, but not merged to ${remote.name}` : '';
    const answer = await confirm(`${branch} (merged to HEAD${suffix})`);
    if (answer === 'quit') return stackOk(undefined);
    if (isYes(answer)) {
      const deleted = await git.deleteBranch(branch, mergedToRemote);
      if (deleted.isErr()) return StackErrors.gitError('branch', deleted.error);
    }
  }
  for (const branch of unmerged) {
    const answer = await confirm(`${branch} (unmerged to HEAD)`);
    if (answer === 'quit') return stackOk(undefined);
    if (isYes(answer)) {
      const deleted = await git.deleteBranch(branch, true);
      if (deleted.isErr()) return StackErrors.gitError('branch', deleted.error);
    }
  }
  return stackOk(undefined);
}

/**
 * Slide out (in memory) every managed branch that is no longer a local branch.
 * Returns the names that were dropped.
 */
export function dropMissingBranches(
  layout: BranchLayout,
  localBranches: readonly string[],
  reporter: Reporter
): string[] {
  const local = new Set(localBranches);
  const missing = layout.branchNames().filter((branch) => !local.has(branch));
  for (const branch of missing) {
    const result = layout.slideOut(branch);
    if (result.isErr()) {
      reporter.debug(result.error.message);
    }
  }
  if (missing.length > 0) {
    reporter.warn(
      missing.length === 1
        ? `sliding out ${missing.join(', ')} since it does not exist as local branch`
        : `sliding out ${missing.join(', ')} since they do not exist as local branches`
    );
  }
  return missing;
}
