/**
 * Go and show commands - check out or print a branch relative to another
 */

import type { RunFlags } from '../config/manager.js';
import { StackErrors } from '../stack/errors.js';
import { resolveDirection, type Direction } from '../stack/navigation.js';
import { openContext, requireCurrentBranch, unwrapOrExit } from './context.js';

export async function goCommand(flags: RunFlags, direction: Direction): Promise<void> {
  const ctx = await openContext(flags);
  const current = await requireCurrentBranch(ctx);
  const [target] = unwrapOrExit(await resolveDirection(ctx, direction, current, { pick: true }));
  if (target === undefined || target === current) return;

  const checkout = await ctx.git.checkout(target);
  if (checkout.isErr()) {
    unwrapOrExit(StackErrors.gitError('checkout', checkout.error));
  }
}

export async function showCommand(flags: RunFlags, direction: Direction, branchArg?: string): Promise<void> {
  const ctx = await openContext(flags);
  const branch = branchArg ?? (await requireCurrentBranch(ctx));
  for (const target of unwrapOrExit(await resolveDirection(ctx, direction, branch))) {
    ctx.reporter.info(target);
  }
}
