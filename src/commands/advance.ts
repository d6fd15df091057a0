/**
 * Advance command - fast-forward the current branch onto its green child
 */

import type { RunFlags } from '../config/manager.js';
import { advance } from '../stack/mutations.js';
import { openContext, requireCurrentBranch, unwrapOrExit } from './context.js';

export async function advanceCommand(flags: RunFlags): Promise<void> {
  const ctx = await openContext(flags);
  const branch = await requireCurrentBranch(ctx);
  unwrapOrExit(await advance(ctx, branch));
}
