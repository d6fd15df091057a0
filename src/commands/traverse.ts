/**
 * Traverse command - walk the tree syncing every branch with its parent and remote
 */

import type { RunFlags } from '../config/manager.js';
import { StackErrors } from '../stack/errors.js';
import { DEFAULT_TRAVERSE_OPTIONS, TraversalEngine, type TraverseOptions } from '../stack/traverse.js';
import { fail, openContext, requireCurrentBranch, unwrapOrExit } from './context.js';

export type TraverseCommandOptions = Partial<TraverseOptions>;

export async function traverseCommand(flags: RunFlags, options: TraverseCommandOptions = {}): Promise<void> {
  const ctx = await openContext(flags);
  if (ctx.layout.size === 0) {
    unwrapOrExit(StackErrors.noBranches());
  }
  const initial = await requireCurrentBranch(ctx);

  const engine = new TraversalEngine(ctx, initial, {
    ...DEFAULT_TRAVERSE_OPTIONS,
    pushTracked: ctx.config.pushByDefault,
    pushUntracked: ctx.config.pushByDefault,
    ...options,
  });
  const outcome = await engine.run();
  if (outcome.kind === 'failed') {
    fail(outcome.error);
  }
}
