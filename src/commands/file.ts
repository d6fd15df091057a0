/**
 * File command - print the path of the branch layout file
 */

import type { RunFlags } from '../config/manager.js';
import { openContext } from './context.js';

export async function fileCommand(flags: RunFlags): Promise<void> {
  const ctx = await openContext(flags, { dropMissing: false });
  ctx.reporter.info(ctx.store.path);
}
