/**
 * Interactive handlers that bring a branch in line with its remote counterpart
 */

import type { GitResult } from '../git/operations.js';
import { isYes, YES_NO_QUIT, type Answer } from '../ui/prompter.js';
import { ask, type EngineContext } from './context.js';
import { gitFailure } from './errors.js';
import { CANCELLED, CONTINUE, failed, type Outcome, type RemoteSyncState } from './types.js';

export interface PushOptions {
  pushTracked: boolean;
  pushUntracked: boolean;
}

/**
 * Run `action` when the answer says so and map the answer to an outcome
 */
async function perform(
  answer: Answer,
  operation: string,
  action: () => Promise<GitResult<void>>
): Promise<Outcome> {
  if (isYes(answer)) {
    const result = await action();
    if (result.isErr()) return failed(gitFailure(operation, result.error));
    return answer === 'yes-quit' ? CANCELLED : CONTINUE;
  }
  return answer === 'quit' ? CANCELLED : CONTINUE;
}

export async function syncWithRemote(
  ctx: EngineContext,
  branch: string,
  state: RemoteSyncState,
  options: PushOptions
): Promise<Outcome> {
  const { git } = ctx;
  const remote = state.remote ?? '';
  const counterpart = state.counterpart ?? '';

  switch (state.status) {
    case 'no-remotes':
    case 'in-sync':
      return CONTINUE;

    case 'behind': {
      const head = `Branch ${branch} is behind its remote counterpart ${counterpart}.\n`;
      const answer = await ask(ctx, `${head}Pull ${branch} (fast-forward only) from ${remote}?`, {
        yesMessage: `${head}Pulling ${branch} (fast-forward only) from ${remote}...`,
      });
      return perform(answer, 'pull', () => git.pullFastForwardOnly(remote, counterpart));
    }

    case 'ahead': {
      const answer = await ask(ctx, `Push ${branch} to ${remote}?`, {
        yesMessage: `Pushing ${branch} to ${remote}...`,
        override: options.pushTracked ? undefined : 'no',
      });
      return perform(answer, 'push', () => git.push(remote, branch, false));
    }

    case 'diverged-older': {
      const head =
        `Branch ${branch} diverged from (and has older commits than) ` +
        `its remote counterpart ${counterpart}.\n`;
      const target = `branch ${branch} to the commit pointed by ${counterpart}`;
      const answer = await ask(ctx, `${head}Reset ${target}?`, {
        yesMessage: `${head}Resetting ${target}...`,
      });
      return perform(answer, 'reset', () => git.resetKeep(counterpart));
    }

    case 'diverged-newer': {
      const head =
        `Branch ${branch} diverged from (and has newer commits than) ` +
        `its remote counterpart ${counterpart}.\n`;
      const answer = await ask(ctx, `${head}Push ${branch} with force-with-lease to ${remote}?`, {
        yesMessage: `${head}Pushing ${branch} with force-with-lease to ${remote}...`,
        override: options.pushTracked ? undefined : 'no',
      });
      return perform(answer, 'push', () => git.push(remote, branch, true));
    }

    case 'untracked':
      return syncUntracked(ctx, branch, options);
  }
}

async function syncUntracked(ctx: EngineContext, branch: string, options: PushOptions): Promise<Outcome> {
  const remotes = await ctx.git.remotes();
  const [only] = remotes;
  if (remotes.length === 1 && only) {
    return syncUntrackedTo(ctx, only, branch, options);
  }
  if (remotes.includes('origin')) {
    return syncUntrackedTo(ctx, 'origin', branch, options);
  }
  ctx.reporter.info(`Branch ${branch} is untracked and there's no origin remote.`);
  return pickRemote(ctx, branch, options);
}

async function pickRemote(ctx: EngineContext, branch: string, options: PushOptions): Promise<Outcome> {
  const remotes = await ctx.git.remotes();
  const remote = await ctx.prompter.pick(`Which remote should ${branch} be pushed to?`, remotes);
  if (remote === null) return CANCELLED;
  return syncUntrackedTo(ctx, remote, branch, options);
}

async function syncUntrackedTo(
  ctx: EngineContext,
  remote: string,
  branch: string,
  options: PushOptions
): Promise<Outcome> {
  const { git } = ctx;
  const candidate = `${remote}/${branch}`;
  const canPickOther = (await git.remotes()).length > 1;

  if (!(await git.commitHash(candidate))) {
    const answer = await ask(ctx, `Push untracked branch ${branch} to ${remote}?`, {
      yesMessage: `Pushing untracked branch ${branch} to ${remote}...`,
      choices: canPickOther ? [...YES_NO_QUIT, 'other-remote'] : YES_NO_QUIT,
      override: options.pushUntracked ? undefined : 'no',
    });
    if (answer === 'other-remote') return pickRemote(ctx, branch, options);
    return perform(answer, 'push', () => git.push(remote, branch, false));
  }

  const head =
    `Branch ${branch} is untracked, but its remote counterpart candidate ${candidate} already exists`;
  const [ahead, behind] = await git.aheadBehindCounts(branch, candidate);
  const track = (action: () => Promise<GitResult<void>>) => async (): Promise<GitResult<void>> => {
    const result = await action();
    return result.isErr() ? result : git.setUpstream(branch, candidate);
  };

  if (ahead === 0 && behind === 0) {
    const intro = `${head} and both branches point to the same commit.\n`;
    const question = `${intro}Set the remote of ${branch} to ${remote} without pushing or pulling?`;
    const answer = await ask(ctx, question, {
      yesMessage: `${intro}Setting the remote of ${branch} to ${remote}...`,
    });
    return perform(answer, 'branch', () => git.setUpstream(branch, candidate));
  }
  if (ahead === 0) {
    const intro = `${head} and is ahead of ${branch}.\n`;
    const answer = await ask(ctx, `${intro}Pull ${branch} (fast-forward only) from ${remote}?`, {
      yesMessage: `${intro}Pulling ${branch} (fast-forward only) from ${remote}...`,
    });
    return perform(answer, 'pull', track(() => git.pullFastForwardOnly(remote, candidate)));
  }
  if (behind === 0) {
    const answer = await ask(ctx, `${head} and is behind ${branch}.\nPush ${branch} to ${remote}?`, {
      yesMessage: `${head} and is behind ${branch}.\nPushing ${branch} to ${remote}...`,
      override: options.pushTracked ? undefined : 'no',
    });
    return perform(answer, 'push', () => git.push(remote, branch, false));
  }

  const local = await git.committerTimestamp(branch);
  const other = await git.committerTimestamp(candidate);
  if (local < other) {
    const intro = `${head} and has newer commits than ${branch}.\n`;
    const target = `branch ${branch} to the commit pointed by ${candidate}`;
    const answer = await ask(ctx, `${intro}Reset ${target}?`, {
      yesMessage: `${intro}Resetting ${target}...`,
    });
    return perform(answer, 'reset', track(() => git.resetKeep(candidate)));
  }
  const intro = `${head} and has older commits than ${branch}.\n`;
  const answer = await ask(ctx, `${intro}Push ${branch} with force-with-lease to ${remote}?`, {
    yesMessage: `${intro}Pushing ${branch} with force-with-lease to ${remote}...`,
    override: options.pushTracked ? undefined : 'no',
  });
  return perform(answer, 'push', () => git.push(remote, branch, true));
}
