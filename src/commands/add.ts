/**
 * Add command - put a branch into the tree, creating it when needed
 */

import type { RunFlags } from '../config/manager.js';
import { addBranch, type AddOptions } from '../stack/mutations.js';
import { openContext, requireCurrentBranch, unwrapOrExit } from './context.js';

export async function addCommand(
  flags: RunFlags,
  branchArg: string | undefined,
  options: AddOptions = {}
): Promise<void> {
  const ctx = await openContext(flags);
  const branch = branchArg ?? (await requireCurrentBranch(ctx));
  unwrapOrExit(await addBranch(ctx, branch, options));
}
