import { beforeEach, describe, expect, test } from 'vitest';
import type { RunConfig } from '../config/schema.js';
import {
  DEFAULT_TRAVERSE_OPTIONS,
  isReturnTo,
  TraversalEngine,
  type TraverseOptions,
} from '../stack/traverse.js';
import type { Outcome } from '../stack/types.js';
import type { Answer } from '../ui/prompter.js';
import { createTestContext, type TestContext } from './support/engine.js';
import { FakeRepo } from './support/fake-repo.js';

async function traverse(
  repo: FakeRepo,
  layout: string,
  options: Partial<TraverseOptions> = {},
  answers: Answer[] = [],
  config: Partial<RunConfig> = {}
): Promise<TestContext & { outcome: Outcome }> {
  const test = createTestContext(repo, layout, { answers, config });
  const initial = (await repo.currentBranch()) ?? '';
  const engine = new TraversalEngine(test.ctx, initial, { ...DEFAULT_TRAVERSE_OPTIONS, ...options });
  const outcome = await engine.run();
  return { ...test, outcome };
}

describe('isReturnTo', () => {
  test('accepts the known values only', () => {
    expect(isReturnTo('nearest-remaining')).toBe(true);
    expect(isReturnTo('elsewhere')).toBe(false);
  });
});

describe('TraversalEngine', () => {
  let repo: FakeRepo;
  let d2: string;

  beforeEach(() => {
    repo = new FakeRepo();
    repo.branch('develop');
    d2 = repo.commit('develop', 'd2');
    repo.branch('feature', 'develop');
    repo.commit('feature', 'f1');
  });

  describe('with an out-of-sync child', () => {
    beforeEach(() => {
      repo.commit('develop', 'd3');
    });

    test('declining every step leaves the tree unmodified', async () => {
      const { outcome, reporter, prompter, store } = await traverse(repo, 'develop\n  feature\n', {}, ['no']);

      expect(outcome).toEqual({ kind: 'continue' });
      expect(prompter.questions).toEqual(['Rebase feature onto develop?']);
      expect(repo.log).toEqual(['checkout feature']);
      expect(store.saves).toBe(0);
      expect(store.text).toBe('develop\n  feature\n');
      expect(reporter.lines).toEqual([
        '',
        '  develop',
        '  |',
        '  x-feature *',
        '',
        '',
        '  develop',
        '  |',
        '  x-feature *',
        '',
        'Reached branch feature which has no successor; nothing left to update',
      ]);
    });

    test('rebases onto the parent from the fork point', async () => {
      const { outcome, ctx } = await traverse(repo, 'develop\n  feature\n', {}, ['yes']);

      expect(outcome.kind).toBe('continue');
      expect(repo.log).toEqual(['checkout feature', `rebase --interactive --onto develop ${d2} feature`]);
      expect(await ctx.classifier.parentSyncStatus('feature')).toBe('in-sync');
    });

    test('rebases without the editor when asked to', async () => {
      await traverse(repo, 'develop\n  feature\n', { noInteractiveRebase: true }, ['yes']);

      expect(repo.log).toContain(`rebase --onto develop ${d2} feature`);
    });

    test('merges the parent in merge mode', async () => {
      const { prompter } = await traverse(repo, 'develop\n  feature\n', { merge: true, noEditMerge: true }, [
        'yes',
      ]);

      expect(prompter.questions).toEqual(['Merge develop into feature?']);
      expect(repo.log).toEqual(['checkout feature', 'merge --no-edit develop into feature']);
    });

    test('update=merge qualifier selects merging per branch', async () => {
      const { prompter } = await traverse(repo, 'develop\n  feature update=merge\n', {}, ['no']);

      expect(prompter.questions).toEqual(['Merge develop into feature?']);
    });

    test('rebase=no qualifier skips the branch', async () => {
      const { prompter, reporter } = await traverse(repo, 'develop\n  feature rebase=no\n');

      expect(prompter.questions).toEqual([]);
      expect(reporter.lines).toContain(
        'No successor of develop needs to be slid out or synced with upstream branch or remote; ' +
          'nothing left to update'
      );
    });

    test('--yes prints the action instead of asking', async () => {
      const { reporter, prompter } = await traverse(repo, 'develop\n  feature\n', {}, [], { yes: true });

      expect(prompter.questions).toEqual([]);
      expect(reporter.lines).toContain('Rebasing feature onto develop...');
      expect(repo.log).toContain(`rebase --interactive --onto develop ${d2} feature`);
    });

    test('quit stops before later branches', async () => {
      repo.branch('hotfix', d2);
      repo.commit('hotfix', 'h1');
      const layout = 'develop\n  feature\n  hotfix\n';
      const { outcome, prompter, reporter } = await traverse(repo, layout, {}, ['quit']);

      expect(outcome).toEqual({ kind: 'cancelled' });
      expect(prompter.questions).toEqual(['Rebase feature onto develop?']);
      expect(reporter.lines.some((line) => line.includes('nothing left to update'))).toBe(false);
    });

    test('yes-quit performs the action then stops', async () => {
      repo.branch('hotfix', d2);
      repo.commit('hotfix', 'h1');
      const { outcome, prompter } = await traverse(repo, 'develop\n  feature\n  hotfix\n', {}, ['yes-quit']);

      expect(outcome).toEqual({ kind: 'cancelled' });
      expect(prompter.questions).toHaveLength(1);
      expect(repo.log).toEqual(['checkout feature', `rebase --interactive --onto develop ${d2} feature`]);
    });

    test('stops when the rebase leaves conflicts, and refuses to start again', async () => {
      repo.conflictOn('feature');
      const first = await traverse(repo, 'develop\n  feature\n', {}, ['yes']);

      expect(first.outcome).toEqual({ kind: 'cancelled' });
      expect(first.reporter.lines).toContain('Rebase of feature in progress; stopping the traversal');

      const second = await traverse(repo, 'develop\n  feature\n');
      expect(second.outcome.kind).toBe('failed');
      if (second.outcome.kind === 'failed') {
        expect(second.outcome.error.code).toBe('OPERATION_IN_PROGRESS');
        expect(second.outcome.error.message).toBe('Rebase of feature in progress');
      }
    });

    test('stop-after ends the walk at the named branch', async () => {
      repo.branch('hotfix', d2);
      repo.commit('hotfix', 'h1');
      const { prompter, reporter } = await traverse(
        repo,
        'develop\n  feature\n  hotfix\n',
        { stopAfter: 'feature' },
        ['no']
      );

      expect(prompter.questions).toEqual(['Rebase feature onto develop?']);
      expect(reporter.lines[reporter.lines.length - 1]).toBe(
        'No successor of feature needs to be slid out or synced with upstream branch or remote; ' +
          'nothing left to update'
      );
    });

    test('an unmanaged stop-after branch fails', async () => {
      const { outcome } = await traverse(repo, 'develop\n  feature\n', { stopAfter: 'nope' });

      expect(outcome.kind).toBe('failed');
    });

    test('start-from first-root checks out the first root', async () => {
      await repo.checkout('feature');
      repo.log.length = 0;
      const { prompter } = await traverse(repo, 'develop\n  feature\n', { startFrom: 'first-root' }, ['no']);

      expect(repo.log[0]).toBe('checkout develop');
      expect(prompter.questions).toEqual(['Rebase feature onto develop?']);
    });

    test('return-to here goes back to the initial branch', async () => {
      const { reporter } = await traverse(repo, 'develop\n  feature\n', { returnTo: 'here' }, ['no']);

      expect(repo.log).toEqual(['checkout feature', 'checkout develop']);
      expect(reporter.lines[reporter.lines.length - 1]).toBe('Returned to the initial branch develop');
    });
  });

  test('slides out a merged branch and returns to the nearest remaining one', async () => {
    repo.squashMerge('develop', 'feature');
    await repo.checkout('feature');
    repo.log.length = 0;

    const { store, reporter, prompter } = await traverse(
      repo,
      'develop\n  feature\n',
      { returnTo: 'nearest-remaining' },
      ['yes']
    );

    expect(prompter.questions).toEqual([
      'Branch feature is merged into develop. Slide feature out of the tree of branch dependencies?',
    ]);
    expect(store.text).toBe('develop\n');
    expect(repo.log).toEqual(['checkout develop']);
    expect(reporter.lines[reporter.lines.length - 1]).toBe(
      'The initial branch feature has been slid out. Returned to nearest remaining managed branch develop'
    );
  });

  test('slide-out=no keeps a merged branch', async () => {
    repo.squashMerge('develop', 'feature');
    const { prompter, store } = await traverse(repo, 'develop\n  feature slide-out=no\n');

    expect(prompter.questions).toEqual([]);
    expect(store.saves).toBe(0);
  });

  test('suggests --whole when nothing needed doing below the current branch', async () => {
    await repo.checkout('feature');
    const { reporter } = await traverse(repo, 'develop\n  feature\n');

    expect(reporter.lines.slice(-2)).toEqual([
      'Reached branch feature which has no successor; nothing left to update',
      'Tip: traverse starts from the current branch by default; use --start-from= or --whole to change this.',
    ]);
  });

  test('start-from root falls back to the first root from an unmanaged branch', async () => {
    repo.branch('stray', 'develop');
    await repo.checkout('stray');
    repo.log.length = 0;

    const { outcome, reporter } = await traverse(repo, 'develop\n  feature\n', { startFrom: 'root' });

    expect(outcome).toEqual({ kind: 'continue' });
    expect(repo.log).toEqual(['checkout develop']);
    expect(reporter.warnings).toEqual([
      'stray is not a managed branch, assuming develop (the first root) instead as root',
    ]);
  });

  describe('remote sync', () => {
    beforeEach(() => {
      repo.addRemote('origin');
      repo.setRemoteBranch('origin', 'develop', d2);
      repo.setRemoteBranch('origin', 'feature', 'feature');
    });

    test('pushes a branch that is ahead of its remote', async () => {
      repo.commit('develop', 'd3');
      const { prompter } = await traverse(repo, 'develop\n', {}, ['yes']);

      expect(prompter.questions).toEqual(['Push develop to origin?']);
      expect(repo.log).toEqual(['push origin develop']);
    });

    test('does not push when pushing is disabled', async () => {
      repo.commit('develop', 'd3');
      const { prompter } = await traverse(repo, 'develop\n', { pushTracked: false });

      expect(prompter.questions).toEqual([]);
      expect(repo.log).toEqual([]);
    });

    test('push=no qualifier disables pushing for the branch', async () => {
      repo.commit('develop', 'd3');
      const { prompter } = await traverse(repo, 'develop push=no\n');

      expect(prompter.questions).toEqual([]);
    });

    test('pulls a branch that is behind its remote', async () => {
      repo.setRemoteBranch('origin', 'develop', 'feature');
      const { prompter } = await traverse(repo, 'develop\n', {}, ['yes']);

      expect(prompter.questions).toEqual([
        'Branch develop is behind its remote counterpart origin/develop.\n' +
          'Pull develop (fast-forward only) from origin?',
      ]);
      expect(repo.log).toEqual(['pull --ff-only origin origin/develop']);
      expect(repo.hashOf('develop')).toBe(repo.hashOf('feature'));
    });

    test('offers to push an untracked branch', async () => {
      repo.branch('topic', 'feature');
      repo.commit('topic', 't1');
      await repo.checkout('topic');
      repo.log.length = 0;
      const { prompter } = await traverse(repo, 'develop\n  feature\n    topic\n', {}, ['yes']);

      expect(prompter.questions).toEqual(['Push untracked branch topic to origin?']);
      expect(repo.log).toEqual(['push origin topic']);
    });

    test('declining the push leaves the repository untouched', async () => {
      repo.commit('feature', 'f2');
      await repo.checkout('feature');
      repo.log.length = 0;

      const { outcome, prompter, reporter, store } = await traverse(repo, 'develop\n  feature\n', {}, ['no']);

      expect(outcome).toEqual({ kind: 'continue' });
      expect(prompter.questions).toEqual(['Push feature to origin?']);
      expect(repo.log).toEqual([]);
      expect(store.saves).toBe(0);
      expect(reporter.lines[reporter.lines.length - 1]).toBe(
        'Reached branch feature which has no successor; nothing left to update'
      );
    });

    test('a declined rebase still offers the push', async () => {
      repo.commit('develop', 'd3');
      repo.setRemoteBranch('origin', 'develop', 'develop');
      repo.commit('feature', 'f2');

      const { prompter } = await traverse(repo, 'develop\n  feature\n', {}, ['no', 'yes']);

      expect(prompter.questions).toEqual(['Rebase feature onto develop?', 'Push feature to origin?']);
      expect(repo.log).toEqual(['checkout feature', 'push origin feature']);
    });

    test('a declined merge still offers the push', async () => {
      repo.commit('develop', 'd3');
      repo.setRemoteBranch('origin', 'develop', 'develop');
      repo.commit('feature', 'f2');

      const { prompter } = await traverse(repo, 'develop\n  feature\n', { merge: true }, ['no', 'no']);

      expect(prompter.questions).toEqual(['Merge develop into feature?', 'Push feature to origin?']);
      expect(repo.log).toEqual(['checkout feature']);
    });

    test('quitting at the rebase skips the remote', async () => {
      repo.commit('develop', 'd3');
      repo.setRemoteBranch('origin', 'develop', 'develop');
      repo.commit('feature', 'f2');

      const { outcome, prompter } = await traverse(repo, 'develop\n  feature\n', {}, ['quit']);

      expect(outcome).toEqual({ kind: 'cancelled' });
      expect(prompter.questions).toEqual(['Rebase feature onto develop?']);
    });

    test('a declined slide-out still offers the pull', async () => {
      repo.squashMerge('develop', 'feature');
      repo.branch('feature-next', 'feature');
      repo.commit('feature-next', 'f2');
      repo.setRemoteBranch('origin', 'feature', 'feature-next');
      await repo.checkout('feature');
      repo.log.length = 0;

      const { prompter, store } = await traverse(repo, 'develop\n  feature\n', {}, ['no', 'yes']);

      expect(prompter.questions).toEqual([
        'Branch feature is merged into develop. Slide feature out of the tree of branch dependencies?',
        'Branch feature is behind its remote counterpart origin/feature.\n' +
          'Pull feature (fast-forward only) from origin?',
      ]);
      expect(store.saves).toBe(0);
      expect(repo.log).toEqual(['pull --ff-only origin origin/feature']);
      expect(repo.hashOf('feature')).toBe(repo.hashOf('feature-next'));
    });

    test('fetches every remote not opted out', async () => {
      repo.addRemote('upstream');
      await traverse(repo, 'develop\n', { fetch: true, pushUntracked: false }, [], {
        fetchRemotes: { upstream: false },
      });

      expect(repo.log).toEqual(['fetch origin']);
    });
  });
});
