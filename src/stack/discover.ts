/**
 * Builds a branch tree from scratch out of the local branches and their reflogs
 */

import { err } from 'neverthrow';
import { YES_NO, isYes } from '../ui/prompter.js';
import { ask, createEngineContext, type EngineContext } from './context.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';
import { BranchLayout } from './layout.js';
import { printStatus } from './visualizer.js';

/** Non-root branches kept when no --checked-out-since threshold is given */
export const DISCOVER_FRESH_BRANCH_COUNT = 10;

export interface DiscoverOptions {
  checkedOutSince?: string;
  roots?: readonly string[];
  listCommits?: boolean;
}

/**
 * Infer a layout for the repository without touching the saved one.
 * Resolves to null when no branch passes the checkout threshold.
 */
export async function discoverLayout(
  ctx: EngineContext,
  options: DiscoverOptions = {}
): Promise<StackResult<BranchLayout | null>> {
  const { git, reporter } = ctx;
  const local = await git.localBranches();
  if (local.length === 0) {
    return StackErrors.noCandidate('No local branches found');
  }
  for (const root of options.roots ?? []) {
    if (!local.includes(root)) return StackErrors.branchNotFound(root);
  }

  const roots: string[] = options.roots ? [...options.roots] : defaultRoots(local);
  const nonRoots = local.filter((branch) => !roots.includes(branch));

  const checkouts = await git.latestCheckoutTimestamps();
  const byCheckout = nonRoots
    .map((branch): [number, string] => [checkouts.get(branch) ?? 0, branch])
    .sort(([ta, a], [tb, b]) => ta - tb || (a < b ? -1 : a > b ? 1 : 0));

  let stale: Set<string>;
  if (options.checkedOutSince !== undefined) {
    const threshold = await git.parseTimespec(options.checkedOutSince);
    if (threshold === null) {
      return StackErrors.invalidArgument(`Cannot parse date ${options.checkedOutSince}`);
    }
    stale = new Set(byCheckout.filter(([timestamp]) => timestamp < threshold).map(([, branch]) => branch));
  } else {
    const cut = Math.max(0, byCheckout.length - DISCOVER_FRESH_BRANCH_COUNT);
    stale = new Set(byCheckout.slice(0, cut).map(([, branch]) => branch));
    const firstFresh = byCheckout[cut];
    if (stale.size > 0 && firstFresh) {
      const date = new Date(firstFresh[0] * 1000).toISOString().slice(0, 10);
      reporter.warn(
        `to keep the size of the discovered tree reasonable (ca. ${DISCOVER_FRESH_BRANCH_COUNT} branches), ` +
          `only branches checked out at or after ca. ${date} are included.\n` +
          "Use 'arbor discover --checked-out-since=<date>' " +
          "(where <date> can be e.g. '2 weeks ago' or 2020-06-01) " +
          'to change this threshold so that less or more branches are included.'
      );
    }
  }

  const fresh = nonRoots.filter((branch) => !stale.has(branch));
  if (options.checkedOutSince !== undefined && roots.length + fresh.length === 0) {
    reporter.warn(
      'no branches satisfying the criteria. Try moving the value of --checked-out-since further to the past.'
    );
    return stackOk(null);
  }

  // union-find over tentative attachments so that no inferred parent closes a cycle
  const rootOf = new Map(local.map((branch) => [branch, branch]));
  const findRoot = (branch: string): string => {
    const up = rootOf.get(branch) ?? branch;
    if (up === branch) return branch;
    const top = findRoot(up);
    rootOf.set(branch, top);
    return top;
  };

  const parents = new Map<string, string>();
  const children = new Map<string, string[]>();
  const extraRoots: string[] = [];
  for (const branch of fresh) {
    const parent = await ctx.forkPoints.inferParent(
      branch,
      (candidate) => findRoot(candidate) !== branch && !stale.has(candidate)
    );
    if (parent) {
      reporter.debug(
        `inferred upstream of ${branch} is ${parent}, attaching ${branch} as a child of ${parent}`
      );
      parents.set(branch, parent);
      rootOf.set(branch, parent);
      children.set(parent, [...(children.get(parent) ?? []), branch]);
    } else {
      reporter.debug(`inferred no upstream for ${branch}, attaching ${branch} as a new root`);
      extraRoots.push(branch);
    }
  }

  const skipped: string[] = [];
  for (const branch of [...roots, ...fresh]) {
    const parent = parents.get(branch);
    if (!parent || (children.get(branch) ?? []).length > 0) continue;
    if (await ctx.squash.isMergedToParent(branch, parent, 'none')) {
      reporter.debug(`${branch} is merged to ${parent}; skipping it from the discovered tree`);
      skipped.push(branch);
      children.set(parent, (children.get(parent) ?? []).filter((child) => child !== branch));
    }
  }
  if (skipped.length > 0) {
    reporter.warn(
      `skipping ${skipped.join(', ')} since ${skipped.length === 1 ? "it's" : "they're"} ` +
        'merged to another branch ' +
        'and would not have any downstream branches.'
    );
  }

  const layout = new BranchLayout();
  const attach = (branch: string, parent: string | null): StackResult<void> => {
    const added = layout.add(branch, parent);
    if (added.isErr()) return added;
    for (const child of children.get(branch) ?? []) {
      const result = attach(child, branch);
      if (result.isErr()) return result;
    }
    return stackOk(undefined);
  };
  for (const root of [...roots, ...extraRoots]) {
    const result = attach(root, null);
    if (result.isErr()) return err(result.error);
  }
  return stackOk(layout);
}

function defaultRoots(local: readonly string[]): string[] {
  const roots: string[] = [];
  if (local.includes('master')) roots.push('master');
  else if (local.includes('main')) roots.push('main');
  if (local.includes('develop')) roots.push('develop');
  return roots;
}

/**
 * Discover a tree, show it and save it on confirmation, backing up a non-empty existing file
 */
export async function discover(
  ctx: EngineContext,
  options: DiscoverOptions = {}
): Promise<StackResult<boolean>> {
  const discovered = await discoverLayout(ctx, options);
  if (discovered.isErr()) return err(discovered.error);
  const layout = discovered.value;
  if (!layout) return stackOk(false);

  const preview = createEngineContext({
    ...ctx,
    layout,
    config: { ...ctx.config, squashMergeDetection: 'none' },
  });
  ctx.reporter.info('Discovered tree of branch dependencies:\n');
  await printStatus(preview, { listCommits: options.listCommits });
  ctx.reporter.info('');

  const existing = await ctx.store.readText();
  if (existing.isErr()) return err(existing.error);
  const doBackup = existing.value.trim() !== '';
  const backupNote = doBackup
    ? `\nThe existing branch layout file will be backed up as ${ctx.store.path}~`
    : '';

  const answer = await ask(ctx, `Save the above tree to ${ctx.store.path}?${backupNote}`, {
    yesMessage: `Saving the above tree to ${ctx.store.path}...${backupNote}`,
    choices: YES_NO,
  });
  if (!isYes(answer)) return stackOk(false);

  if (doBackup) {
    const backup = await ctx.store.backup();
    if (backup.isErr()) return err(backup.error);
  }
  const saved = await ctx.store.save(layout);
  return saved.map(() => true);
}
