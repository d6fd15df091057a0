/**
 * Fork-point command - show, override or reset where a branch forks off
 */

import type { RunFlags } from '../config/manager.js';
import { StackErrors } from '../stack/errors.js';
import { openContext, requireCurrentBranch, unwrapOrExit } from './context.js';

export type ForkPointAction =
  | { kind: 'show' }
  | { kind: 'inferred' }
  | { kind: 'override-to'; revision: string }
  | { kind: 'override-to-inferred' }
  | { kind: 'override-to-parent' }
  | { kind: 'unset-override' };

export async function forkPointCommand(
  flags: RunFlags,
  branchArg: string | undefined,
  action: ForkPointAction
): Promise<void> {
  const ctx = await openContext(flags);
  const branch = branchArg ?? (await requireCurrentBranch(ctx));
  const { forkPoints, layout, reporter } = ctx;

  if (!(await ctx.git.localBranches()).includes(branch)) {
    unwrapOrExit(StackErrors.branchNotFound(branch));
  }

  switch (action.kind) {
    case 'show': {
      const forkPoint = unwrapOrExit(await forkPoints.effectiveForkPoint(branch));
      reporter.info(forkPoint.hash);
      return;
    }
    case 'inferred': {
      const inferred = await forkPoints.inferForkPoint(branch);
      reporter.info(inferred ?? unwrapOrExit(StackErrors.forkPointNotFound(branch)));
      return;
    }
    case 'override-to': {
      const hash = unwrapOrExit(await forkPoints.overrideTo(branch, action.revision));
      reporter.info(`Fork point for ${branch} is overridden to ${hash}`);
      return;
    }
    case 'override-to-inferred': {
      const inferred = await forkPoints.inferForkPoint(branch);
      const hash = unwrapOrExit(
        await forkPoints.overrideTo(branch, inferred ?? unwrapOrExit(StackErrors.forkPointNotFound(branch)))
      );
      reporter.info(`Fork point for ${branch} is overridden to ${hash}`);
      return;
    }
    case 'override-to-parent': {
      const parent = layout.parentOf(branch);
      if (parent === null) {
        unwrapOrExit(StackErrors.invalidArgument(`Branch ${branch} has no upstream (parent) branch`));
        return;
      }
      const hash = unwrapOrExit(await forkPoints.overrideTo(branch, parent));
      reporter.info(`Fork point for ${branch} is overridden to ${hash}`);
      return;
    }
    case 'unset-override':
      unwrapOrExit(await forkPoints.unsetOverride(branch));
      return;
  }
}
