/**
 * Delete-unmanaged command - remove local branches that are not in the tree
 */

import type { RunFlags } from '../config/manager.js';
import { deleteUnmanaged } from '../stack/mutations.js';
import { openContext, unwrapOrExit } from './context.js';

export async function deleteUnmanagedCommand(flags: RunFlags): Promise<void> {
  const ctx = await openContext(flags);
  unwrapOrExit(await deleteUnmanaged(ctx));
}
