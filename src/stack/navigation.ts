/**
 * Moving around the branch tree relative to a branch
 */

import { err } from 'neverthrow';
import type { EngineContext } from './context.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';

export type Direction = 'up' | 'down' | 'first' | 'last' | 'next' | 'prev' | 'root' | 'current';

const ALIASES: Record<string, Direction> = {
  u: 'up',
  up: 'up',
  d: 'down',
  down: 'down',
  f: 'first',
  first: 'first',
  l: 'last',
  last: 'last',
  n: 'next',
  next: 'next',
  p: 'prev',
  prev: 'prev',
  r: 'root',
  root: 'root',
  c: 'current',
  current: 'current',
};

export function parseDirection(value: string): Direction | null {
  return ALIASES[value] ?? null;
}

/**
 * Branches in `direction` from `branch`. `down` yields every child unless
 * `pick` is set, in which case the user chooses one when there are several.
 */
export async function resolveDirection(
  ctx: EngineContext,
  direction: Direction,
  branch: string,
  options: { pick?: boolean } = {}
): Promise<StackResult<string[]>> {
  const { layout } = ctx;
  const single = (result: StackResult<string>): StackResult<string[]> => result.map((name) => [name]);

  switch (direction) {
    case 'current':
      return stackOk([branch]);
    case 'up':
      return single(await up(ctx, branch));
    case 'down': {
      if (!layout.has(branch)) return StackErrors.notManaged(branch);
      const children = [...layout.childrenOf(branch)];
      if (children.length === 0) {
        return StackErrors.noCandidate(`Branch ${branch} has no downstream branch`);
      }
      if (children.length === 1 || !options.pick) return stackOk(children);
      const picked = await ctx.prompter.pick('downstream branch', children);
      return picked === null ? stackOk([]) : stackOk([picked]);
    }
    case 'first': {
      const root = rootBranch(ctx, branch, 'first');
      if (root.isErr()) return err(root.error);
      const [firstChild] = layout.childrenOf(root.value);
      return stackOk([firstChild ?? root.value]);
    }
    case 'last': {
      const root = rootBranch(ctx, branch, 'last');
      if (root.isErr()) return err(root.error);
      let destination = root.value;
      let children = layout.childrenOf(destination);
      while (children.length > 0) {
        destination = children[children.length - 1] ?? destination;
        children = layout.childrenOf(destination);
      }
      return stackOk([destination]);
    }
    case 'next':
    case 'prev': {
      if (!layout.has(branch)) return StackErrors.notManaged(branch);
      const order = layout.branchNames();
      const target = order[order.indexOf(branch) + (direction === 'next' ? 1 : -1)];
      if (target === undefined) {
        const relation = direction === 'next' ? 'successor' : 'predecessor';
        return StackErrors.noCandidate(`Branch ${branch} has no ${relation}`);
      }
      return stackOk([target]);
    }
    case 'root':
      return single(rootBranch(ctx, branch, 'first'));
  }
}

async function up(ctx: EngineContext, branch: string): Promise<StackResult<string>> {
  const { layout } = ctx;
  if (layout.has(branch)) {
    const parent = layout.parentOf(branch);
    return parent === null
      ? StackErrors.noCandidate(`Branch ${branch} has no upstream branch`)
      : stackOk(parent);
  }
  const inferred = await ctx.forkPoints.inferParent(branch);
  if (!inferred) {
    return StackErrors.noCandidate(`Branch ${branch} has no upstream branch`);
  }
  ctx.reporter.warn(`${branch} is not a managed branch, assuming the inferred upstream ${inferred}`);
  return stackOk(inferred);
}

/**
 * Root of a managed branch; an unmanaged branch falls back to the first or last root
 */
export function rootBranch(
  ctx: EngineContext,
  branch: string,
  ifUnmanaged: 'first' | 'last'
): StackResult<string> {
  const { layout } = ctx;
  if (layout.has(branch)) return stackOk(layout.rootOf(branch));

  const roots = layout.roots;
  const fallback = ifUnmanaged === 'first' ? roots[0] : roots[roots.length - 1];
  if (fallback === undefined) return StackErrors.noBranches();
  ctx.reporter.warn(
    `${branch} is not a managed branch, assuming ${fallback} (the ${ifUnmanaged} root) instead as root`
  );
  return stackOk(fallback);
}
