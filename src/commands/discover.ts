/**
 * Discover command - infer the branch tree from reflogs
 */

import * as clack from '@clack/prompts';
import type { RunFlags } from '../config/manager.js';
import { discover, type DiscoverOptions } from '../stack/discover.js';
import { openContext, unwrapOrExit } from './context.js';

export async function discoverCommand(flags: RunFlags, options: DiscoverOptions = {}): Promise<void> {
  const ctx = await openContext(flags, { dropMissing: false });
  const saved = unwrapOrExit(await discover(ctx, options));
  if (saved) {
    clack.outro(`Saved ${ctx.store.path}`);
  }
}
