/**
 * Is-managed command - exit status tells whether a branch is in the tree
 */

import type { RunFlags } from '../config/manager.js';
import { openContext, requireCurrentBranch } from './context.js';

export async function isManagedCommand(flags: RunFlags, branchArg?: string): Promise<void> {
  const ctx = await openContext(flags);
  const branch = branchArg ?? (await requireCurrentBranch(ctx));
  if (!ctx.layout.has(branch)) {
    process.exit(1);
  }
}
