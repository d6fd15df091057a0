import { beforeEach, describe, expect, test } from 'vitest';
import { discover, discoverLayout } from '../stack/discover.js';
import type { BranchLayout } from '../stack/layout.js';
import { serializeLayout } from '../stack/layout-format.js';
import { createTestContext } from './support/engine.js';
import { FakeRepo } from './support/fake-repo.js';

function text(layout: BranchLayout | null): string {
  return layout ? serializeLayout(layout) : '<none>';
}

describe('discoverLayout', () => {
  let repo: FakeRepo;

  beforeEach(() => {
    repo = new FakeRepo();
    repo.branch('master');
    repo.commit('master', 'm2');
    repo.branch('feature', 'master');
    repo.commit('feature', 'f1');
    repo.branch('sub', 'feature');
    repo.commit('sub', 's1');
  });

  test('infers parents from reflogs', async () => {
    const { ctx } = createTestContext(repo, '');

    const layout = (await discoverLayout(ctx))._unsafeUnwrap();

    expect(text(layout)).toBe('master\n  feature\n    sub\n');
  });

  test('leaves out childless branches already merged into their parent', async () => {
    repo.branch('done', 'master');
    repo.commit('done', 'dn');
    await repo.merge('done', 'master', true);
    const { ctx, reporter } = createTestContext(repo, '');

    const layout = (await discoverLayout(ctx))._unsafeUnwrap();

    expect(text(layout)).toBe('master\n  feature\n    sub\n');
    expect(reporter.warnings).toEqual([
      "skipping done since it's merged to another branch and would not have any downstream branches.",
    ]);
  });

  test('uses the given roots', async () => {
    const { ctx } = createTestContext(repo, '');

    const layout = (await discoverLayout(ctx, { roots: ['feature'] }))._unsafeUnwrap();

    expect(layout?.roots).toEqual(['feature', 'master']);
    expect(layout?.childrenOf('feature')).toEqual(['sub']);
  });

  test('rejects roots that are not local branches', async () => {
    const { ctx } = createTestContext(repo, '');

    expect((await discoverLayout(ctx, { roots: ['nope'] }))._unsafeUnwrapErr().code).toBe('BRANCH_NOT_FOUND');
  });

  test('skips branches checked out before the threshold', async () => {
    repo.setCheckoutTimestamp('feature', 100);
    repo.setCheckoutTimestamp('sub', 300);
    repo.setTimespec('2 weeks ago', 200);
    const { ctx } = createTestContext(repo, '');

    const layout = (await discoverLayout(ctx, { checkedOutSince: '2 weeks ago' }))._unsafeUnwrap();

    expect(text(layout)).toBe('master\n  sub\n');
  });

  test('reports an unparseable threshold', async () => {
    const { ctx } = createTestContext(repo, '');

    const result = await discoverLayout(ctx, { checkedOutSince: 'yesterday-ish' });

    expect(result._unsafeUnwrapErr().message).toBe('Cannot parse date yesterday-ish');
  });

  test('resolves to null when nothing qualifies', async () => {
    repo.setTimespec('tomorrow', 10_000);
    const { ctx, reporter } = createTestContext(repo, '');

    const layout = (await discoverLayout(ctx, { roots: [], checkedOutSince: 'tomorrow' }))._unsafeUnwrap();

    expect(layout).toBeNull();
    expect(reporter.warnings).toEqual([
      'no branches satisfying the criteria. Try moving the value of --checked-out-since further to the past.',
    ]);
  });
});

describe('discoverLayout without a threshold', () => {
  test('keeps only the most recently checked out branches', async () => {
    const repo = new FakeRepo();
    repo.branch('master');
    repo.commit('master', 'm2');
    for (let i = 1; i <= 11; i++) {
      repo.branch(`b${i}`, 'master');
      repo.setCheckoutTimestamp(`b${i}`, i * 86_400);
    }
    const { ctx, reporter } = createTestContext(repo, '');

    const layout = (await discoverLayout(ctx))._unsafeUnwrap();

    expect(layout?.has('b1')).toBe(false);
    expect(layout?.childrenOf('master')).toHaveLength(10);
    expect(reporter.warnings).toEqual([
      'to keep the size of the discovered tree reasonable (ca. 10 branches), ' +
        'only branches checked out at or after ca. 1970-01-03 are included.\n' +
        "Use 'arbor discover --checked-out-since=<date>' " +
        "(where <date> can be e.g. '2 weeks ago' or 2020-06-01) " +
        'to change this threshold so that less or more branches are included.',
    ]);
  });
});

describe('discover', () => {
  let repo: FakeRepo;

  beforeEach(() => {
    repo = new FakeRepo();
    repo.branch('master');
    repo.commit('master', 'm2');
    repo.branch('feature', 'master');
    repo.commit('feature', 'f1');
  });

  test('shows the tree and saves it on confirmation', async () => {
    const { ctx, store, reporter, prompter } = createTestContext(repo, '', { answers: ['yes'] });

    expect((await discover(ctx))._unsafeUnwrap()).toBe(true);

    expect(reporter.lines).toEqual([
      'Discovered tree of branch dependencies:\n',
      '  master *',
      '  |',
      '  o-feature',
      '',
    ]);
    expect(prompter.questions).toEqual(['Save the above tree to /repo/.git/arbor?']);
    expect(store.text).toBe('master\n  feature\n');
    expect(store.backups).toBe(0);
  });

  test('backs up a non-empty layout file first', async () => {
    const { ctx, store, prompter } = createTestContext(repo, 'master\n', { answers: ['yes'] });

    await discover(ctx);

    expect(prompter.questions).toEqual([
      'Save the above tree to /repo/.git/arbor?\n' +
        'The existing branch layout file will be backed up as /repo/.git/arbor~',
    ]);
    expect(store.backups).toBe(1);
    expect(store.text).toBe('master\n  feature\n');
  });

  test('declining keeps the file', async () => {
    const { ctx, store } = createTestContext(repo, 'master\n', { answers: ['no'] });

    expect((await discover(ctx))._unsafeUnwrap()).toBe(false);
    expect(store.text).toBe('master\n');
  });
});
