/**
 * Status command - print the branch tree with edge colours and remote state
 */

import type { RunFlags } from '../config/manager.js';
import { StackErrors } from '../stack/errors.js';
import { printStatus } from '../stack/visualizer.js';
import { openContext, unwrapOrExit } from './context.js';

export interface StatusCommandOptions {
  listCommits?: boolean;
  listCommitsWithHashes?: boolean;
}

export async function statusCommand(flags: RunFlags, options: StatusCommandOptions = {}): Promise<void> {
  const ctx = await openContext(flags);
  if (ctx.layout.size === 0) {
    unwrapOrExit(StackErrors.noBranches());
  }

  await printStatus(ctx, {
    listCommits: options.listCommits || options.listCommitsWithHashes,
    listCommitsWithHashes: options.listCommitsWithHashes,
    warnOnYellowEdges: true,
  });
}
