/**
 * List command - print branches of a category, one per line
 */

import type { RunFlags } from '../config/manager.js';
import { listBranches, type ListCategory } from '../stack/listing.js';
import { openContext, unwrapOrExit } from './context.js';

export async function listCommand(flags: RunFlags, category: ListCategory, branch?: string): Promise<void> {
  const ctx = await openContext(flags);
  for (const name of unwrapOrExit(await listBranches(ctx, category, branch))) {
    ctx.reporter.info(name);
  }
}
