/**
 * Anno command - show or set a branch annotation
 */

import type { RunFlags } from '../config/manager.js';
import { formatAnnotation, withText } from '../stack/annotation.js';
import { StackErrors } from '../stack/errors.js';
import { openContext, requireCurrentBranch, unwrapOrExit } from './context.js';

export async function annoCommand(
  flags: RunFlags,
  branchArg: string | undefined,
  words: string[]
): Promise<void> {
  const ctx = await openContext(flags);
  const branch = branchArg ?? (await requireCurrentBranch(ctx));
  const { layout } = ctx;
  if (!layout.has(branch)) {
    unwrapOrExit(StackErrors.notManaged(branch));
  }

  const current = layout.annotationOf(branch);
  if (words.length === 0) {
    const text = formatAnnotation(current);
    if (text) ctx.reporter.info(text);
    return;
  }

  layout.setAnnotation(branch, withText(current, words.join(' ')));
  unwrapOrExit(await ctx.store.save(layout));
}
