/**
 * Shared setup for commands: repository, configuration, layout and output
 */

import * as clack from '@clack/prompts';
import { buildRunConfig, ConfigManager, type RunFlags } from '../config/manager.js';
import { GitOperations } from '../git/operations.js';
import { GitRepository } from '../git/repository.js';
import { Palette } from '../stack/colors.js';
import { createEngineContext, type EngineContext } from '../stack/context.js';
import type { StackError, StackResult } from '../stack/errors.js';
import { dropMissingBranches } from '../stack/mutations.js';
import { FileLayoutStore, resolveLayoutPath } from '../stack/store.js';
import { ClackPrompter } from '../ui/prompter.js';
import { ConsoleReporter } from '../ui/reporter.js';

/**
 * Print the error and exit with status 1
 */
export function fail(error: StackError): never {
  clack.cancel(error.format());
  process.exit(1);
}

/**
 * Unwrap a result, exiting on error
 */
export function unwrapOrExit<T>(result: StackResult<T>): T {
  if (result.isErr()) fail(result.error);
  return result.value;
}

export interface OpenOptions {
  /** Slide out (in memory) managed branches that no longer exist locally */
  dropMissing?: boolean;
}

export async function openContext(flags: RunFlags, options: OpenOptions = {}): Promise<EngineContext> {
  const isRepo = await GitOperations.isGitRepository();
  if (!isRepo) {
    clack.cancel('Not a git repository');
    process.exit(1);
  }

  const repoResult = await GitOperations.getRepository();
  if (repoResult.isErr()) {
    clack.cancel(repoResult.error.message);
    process.exit(1);
  }
  const repo = repoResult.value;

  const configResult = await new ConfigManager(new GitRepository(repo), repo.root).load();
  if (configResult.isErr()) fail(configResult.error);

  const config = buildRunConfig(configResult.value, flags, process.env, process.stdout.isTTY === true);
  const palette = new Palette({ colors: config.colors, asciiOnly: config.asciiOnly });
  const reporter = new ConsoleReporter(palette, { debug: config.debug, verbose: config.verbose });
  const git = new GitRepository(repo, undefined, (command, mutating) => reporter.command(command, mutating));

  const store = new FileLayoutStore(
    resolveLayoutPath(repo, {
      override: process.env.ARBOR_LAYOUT_FILE,
      useTopLevelFile: config.useTopLevelLayoutFile,
    })
  );
  const layoutResult = await store.load();
  if (layoutResult.isErr()) fail(layoutResult.error);
  const layout = layoutResult.value;

  if (options.dropMissing !== false) {
    dropMissingBranches(layout, await git.localBranches(), reporter);
  }

  return createEngineContext({
    config,
    git,
    layout,
    store,
    palette,
    reporter,
    prompter: new ClackPrompter(),
  });
}

/**
 * The checked-out branch, or exit when HEAD is detached
 */
export async function requireCurrentBranch(ctx: EngineContext): Promise<string> {
  const branch = await ctx.git.currentBranch();
  if (!branch) {
    clack.cancel('Not currently on any branch');
    process.exit(1);
  }
  return branch;
}
