import { beforeEach, describe, expect, test } from 'vitest';
import { isExcludedReflogSubject } from '../stack/fork-point.js';
import { createTestContext } from './support/engine.js';
import { FakeRepo } from './support/fake-repo.js';

describe('isExcludedReflogSubject', () => {
  test.each([
    'branch: Created from develop',
    'branch: Reset to feature',
    'reset: moving to HEAD~1',
    'fetch . develop:feature',
    'rebase finished: refs/heads/feature onto abc',
    'update by push',
  ])('excludes %j', (subject) => {
    expect(isExcludedReflogSubject('feature', { hash: 'abc', subject })).toBe(true);
  });

  test.each([
    'commit: add reader',
    'rebase (finish): refs/heads/feature onto abc',
    'merge develop: Fast-forward',
  ])(
    'keeps %j',
    (subject) => {
      expect(isExcludedReflogSubject('feature', { hash: 'abc', subject })).toBe(false);
    }
  );
});

describe('ForkPointResolver', () => {
  let repo: FakeRepo;
  let d2: string;

  beforeEach(() => {
    repo = new FakeRepo();
    repo.branch('develop');
    d2 = repo.commit('develop', 'd2');
  });

  test('filtered reflog drops the creation entry', async () => {
    repo.branch('feature', 'develop');
    const f1 = repo.commit('feature', 'f1');
    const { ctx } = createTestContext(repo, 'develop\n  feature\n');

    expect(await ctx.forkPoints.filteredReflog('feature')).toEqual([f1]);
    expect(await ctx.forkPoints.filteredReflog('develop')).toEqual([d2]);
  });

  test('fork point is the newest commit found in another branch reflog', async () => {
    repo.branch('feature', 'develop');
    repo.commit('feature', 'f1');
    repo.commit('develop', 'd3');
    const { ctx } = createTestContext(repo, 'develop\n  feature\n');

    expect(await ctx.forkPoints.inferForkPoint('feature')).toBe(d2);
    expect(await ctx.forkPoints.inferParent('feature')).toBe('develop');
  });

  test('inference gives the same answer when nothing changed', async () => {
    repo.branch('feature', 'develop');
    repo.commit('feature', 'f1');
    repo.commit('develop', 'd3');
    const { ctx } = createTestContext(repo, 'develop\n  feature\n');

    const first = (await ctx.forkPoints.effectiveForkPoint('feature'))._unsafeUnwrap();
    const second = (await ctx.forkPoints.effectiveForkPoint('feature'))._unsafeUnwrap();
    const again = createTestContext(repo, 'develop\n  feature\n');
    const fresh = (await again.ctx.forkPoints.effectiveForkPoint('feature'))._unsafeUnwrap();

    expect(first.hash).toBe(d2);
    expect(second).toEqual(first);
    expect(fresh).toEqual(first);
  });

  test('inferParent honours the predicate', async () => {
    repo.branch('feature', 'develop');
    repo.commit('feature', 'f1');
    const { ctx } = createTestContext(repo, 'develop\n  feature\n');

    expect(await ctx.forkPoints.inferParent('feature', (candidate) => candidate !== 'develop')).toBeNull();
  });

  test('reports the branches whose reflogs contain the fork point', async () => {
    repo.branch('other', 'develop');
    const o1 = repo.commit('other', 'o1');
    repo.branch('feature', 'other');
    repo.commit('feature', 'f1');
    const { ctx } = createTestContext(repo, 'develop\n  feature\n');

    const forkPoint = (await ctx.forkPoints.effectiveForkPoint('feature'))._unsafeUnwrap();

    expect(forkPoint).toEqual({ hash: o1, containing: [{ branch: 'other', ref: 'other' }] });
  });

  test('falls back to the parent tip when no reflog matches', async () => {
    const repo2 = new FakeRepo();
    const m1 = repo2.branch('main');
    repo2.branch('topic', 'main');
    repo2.commit('topic', 't1');
    const { ctx } = createTestContext(repo2, 'main\n  topic\n');

    expect((await ctx.forkPoints.effectiveForkPoint('topic'))._unsafeUnwrap().hash).toBe(m1);
  });

  test('an override takes precedence and can be unset', async () => {
    repo.branch('other', 'develop');
    const o1 = repo.commit('other', 'o1');
    repo.branch('feature', 'other');
    repo.commit('feature', 'f1');
    const { ctx } = createTestContext(repo, 'develop\n  feature\n');

    expect((await ctx.forkPoints.overrideTo('feature', 'develop'))._unsafeUnwrap()).toBe(d2);
    expect(await repo.configGet('arbor.overrideForkPoint.feature.to')).toBe(d2);
    expect((await ctx.forkPoints.effectiveForkPoint('feature'))._unsafeUnwrap().hash).toBe(d2);
    expect(await ctx.forkPoints.inferForkPoint('feature')).toBe(o1);

    expect((await ctx.forkPoints.unsetOverride('feature')).isOk()).toBe(true);
    expect(await ctx.forkPoints.hasOverride('feature')).toBe(false);
    expect((await ctx.forkPoints.effectiveForkPoint('feature'))._unsafeUnwrap().hash).toBe(o1);
  });

  test('refuses an override that is not an ancestor', async () => {
    repo.branch('feature', 'develop');
    repo.commit('feature', 'f1');
    repo.commit('develop', 'd3');
    const { ctx } = createTestContext(repo, 'develop\n  feature\n');

    const result = await ctx.forkPoints.overrideTo('feature', 'develop');

    expect(result._unsafeUnwrapErr().message).toBe(
      'Cannot override fork point: develop (commit 0000000) is not an ancestor of feature'
    );
  });

  test('warns once about an override that no longer applies', async () => {
    repo.branch('feature', 'develop');
    const f1 = repo.commit('feature', 'f1');
    repo.setConfig('arbor.overrideForkPoint.feature.to', f1);
    const { ctx, reporter } = createTestContext(repo, 'develop\n  feature\n');
    await repo.checkout('feature');
    await repo.resetKeep(d2);

    expect(await ctx.forkPoints.overriddenForkPoint('feature')).toBeNull();
    expect(await ctx.forkPoints.overriddenForkPoint('feature')).toBeNull();
    expect(reporter.warnings).toHaveLength(1);
    expect(reporter.warnings[0]).toContain(`is no longer a descendant of commit ${f1}`);
  });
});
