/**
 * Slide-out command - remove branches from the tree and rebase their children
 */

import type { RunFlags } from '../config/manager.js';
import { slideOutBranches, slideOutRemovedFromRemote, type SlideOutOptions } from '../stack/mutations.js';
import { openContext, requireCurrentBranch, unwrapOrExit } from './context.js';

export interface SlideOutCommandOptions extends SlideOutOptions {
  removedFromRemote?: boolean;
}

export async function slideOutCommand(
  flags: RunFlags,
  branches: string[],
  options: SlideOutCommandOptions = {}
): Promise<void> {
  const ctx = await openContext(flags);

  if (options.removedFromRemote) {
    unwrapOrExit(await slideOutRemovedFromRemote(ctx, { deleteBranches: options.deleteBranches }));
    return;
  }

  const targets = branches.length > 0 ? branches : [await requireCurrentBranch(ctx)];
  unwrapOrExit(await slideOutBranches(ctx, targets, options));
}
