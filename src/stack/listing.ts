/**
 * Branch lists for scripting (`arbor list <category>`)
 */

import type { EngineContext } from './context.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';

export const LIST_CATEGORIES = [
  'managed',
  'unmanaged',
  'slidable',
  'slidable-after',
  'childless',
  'addable',
  'with-overridden-fork-point',
] as const;

export type ListCategory = (typeof LIST_CATEGORIES)[number];

export function isListCategory(value: string): value is ListCategory {
  return LIST_CATEGORIES.some((category) => category === value);
}

export async function listBranches(
  ctx: EngineContext,
  category: ListCategory,
  branch?: string
): Promise<StackResult<string[]>> {
  const { git, layout } = ctx;
  const managed = layout.branchNames();

  switch (category) {
    case 'managed':
      return stackOk(managed);
    case 'unmanaged':
      return stackOk((await git.localBranches()).filter((name) => !layout.has(name)));
    case 'slidable':
      return stackOk(managed.filter((name) => layout.parentOf(name) !== null));
    case 'slidable-after': {
      if (branch === undefined) {
        return StackErrors.invalidArgument('list slidable-after requires a branch');
      }
      if (!layout.has(branch)) return StackErrors.notManaged(branch);
      const children = layout.childrenOf(branch);
      return stackOk(layout.parentOf(branch) !== null && children.length === 1 ? [...children] : []);
    }
    case 'childless':
      return stackOk(managed.filter((name) => layout.childrenOf(name).length === 0));
    case 'addable': {
      // unmanaged local branches, then remote branches no local branch tracks
      const local = await git.localBranches();
      const counterparts = new Set<string>();
      for (const name of local) {
        const counterpart = await git.combinedCounterpart(name);
        if (counterpart) counterparts.add(counterpart.name);
      }
      const remote = (await git.remoteBranches())
        .filter((name) => !counterparts.has(name))
        .map((name) => name.replace(/^[^/]+\//, ''));
      return stackOk([...local.filter((name) => !layout.has(name)), ...remote]);
    }
    case 'with-overridden-fork-point': {
      const result: string[] = [];
      for (const name of await git.localBranches()) {
        if (await ctx.forkPoints.hasOverride(name)) result.push(name);
      }
      return stackOk(result);
    }
  }
}
