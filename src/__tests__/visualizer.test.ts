import { beforeEach, describe, expect, test } from 'vitest';
import { printStatus, StatusRenderer } from '../stack/visualizer.js';
import { createTestContext } from './support/engine.js';
import { FakeRepo } from './support/fake-repo.js';

describe('StatusRenderer', () => {
  let repo: FakeRepo;

  beforeEach(() => {
    repo = new FakeRepo();
    repo.branch('develop');
    repo.commit('develop', 'd2');
  });

  test('draws edges coloured by sync state', async () => {
    repo.branch('old', 'develop');
    repo.commit('old', 'o1');
    repo.commit('develop', 'd3');
    repo.branch('fresh', 'develop');
    repo.commit('fresh', 'n1');
    repo.branch('master');
    const { ctx } = createTestContext(repo, 'develop\n  old PR #1\n  fresh\nmaster\n');

    const { lines, warning } = await new StatusRenderer(ctx).render();

    expect(lines).toEqual(['  develop *', '  |', '  x-old  PR #1', '  |', '  o-fresh', '', '  master']);
    expect(warning).toBeNull();
  });

  test('continues the vertical bar of a parent that has more children', async () => {
    repo.branch('a', 'develop');
    repo.commit('a', 'a1');
    repo.branch('a1', 'a');
    repo.commit('a1', 'x');
    repo.branch('b', 'develop');
    repo.commit('b', 'b1');
    const { ctx } = createTestContext(repo, 'develop\n  a\n    a1\n  b\n');

    const { lines } = await new StatusRenderer(ctx).render();

    expect(lines).toEqual(['  develop *', '  |', '  o-a', '  | |', '  | o-a1', '  |', '  o-b']);
  });

  test('extra space before branch names', async () => {
    repo.branch('a', 'develop');
    repo.commit('a', 'a1');
    const { ctx } = createTestContext(repo, 'develop\n  a\n', {
      config: { extraSpaceBeforeBranchName: true },
    });

    const { lines } = await new StatusRenderer(ctx).render();

    expect(lines).toEqual(['   develop *', '   |', '   o- a']);
  });

  describe('yellow edges', () => {
    beforeEach(() => {
      repo.branch('other', 'develop');
      repo.commit('other', 'o1');
      repo.branch('feature', 'other');
      repo.commit('feature', 'f1');
    });

    test('warn and suggest listing commits', async () => {
      const { ctx } = createTestContext(repo, 'develop\n  feature\n');

      const { lines, warning } = await new StatusRenderer(ctx).render({ warnOnYellowEdges: true });

      expect(lines).toEqual(['  develop *', '  |', '  ?-feature']);
      expect(warning).toBe(
        'yellow edge indicates that fork point for feature is probably incorrectly inferred,\n' +
          'or that some extra branch should be between develop and feature.\n\n' +
          'Run `arbor status --list-commits` or `arbor status --list-commits-with-hashes` ' +
          'to see more details.'
      );
    });

    test('list commits from the parent and mark the fork point', async () => {
      const { ctx } = createTestContext(repo, 'develop\n  feature\n');

      const { lines } = await new StatusRenderer(ctx).render({ listCommits: true });

      expect(lines).toEqual([
        '  develop *',
        '  |',
        '  | o1 -> fork point ??? commit 0000000 seems to be a part of the unique history of other',
        '  | f1',
        '  ?-feature',
      ]);
    });
  });

  test('shows the remote state after the branch name', async () => {
    const d1 = repo.parentOf('develop');
    repo.addRemote('origin');
    repo.setRemoteBranch('origin', 'develop', d1);
    const { ctx } = createTestContext(repo, 'develop\n');

    const { lines } = await new StatusRenderer(ctx).render();

    expect(lines).toEqual(['  develop * (ahead of origin)']);
  });

  test('printStatus writes through the reporter', async () => {
    const { ctx, reporter } = createTestContext(repo, 'develop\n');

    await printStatus(ctx);

    expect(reporter.lines).toEqual(['  develop *']);
  });
});
