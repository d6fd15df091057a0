/**
 * Tests for GitRepository
 *
 * Uses a mock git operations interface for testing without real git calls.
 */

import { err, ok } from 'neverthrow';
import { describe, expect, test } from 'vitest';
import type { GitExecOptions, GitExecResult, GitResult, IGitOperations } from '../git/interface.js';
import { GitRepository } from '../git/repository.js';
import { GitError } from '../git/types.js';

const REPO = { root: '/repo', gitDir: '/repo/.git', commonDir: '/repo/.git' };

interface MockGit extends IGitOperations {
  calls: string[];
  inputs: string[];
}

/**
 * Create a mock git operations object answering from a table of command lines
 */
function createMockGit(responses: Record<string, string | number> = {}): MockGit {
  const calls: string[] = [];
  const inputs: string[] = [];

  const run = (args: string[], options?: GitExecOptions): GitExecResult => {
    const command = args.join(' ');
    calls.push(command);
    if (options?.input !== undefined) inputs.push(options.input);
    const response = responses[command];
    if (typeof response === 'number') {
      return { stdout: '', stderr: `failed: ${command}`, exitCode: response };
    }
    return { stdout: response ?? '', stderr: '', exitCode: 0 };
  };

  return {
    calls,
    inputs,
    async exec(args, options) {
      return run(args, options);
    },
    async execResult(args, options): Promise<GitResult<string>> {
      const result = run(args, options);
      if (result.exitCode !== 0) {
        return err(new GitError(result.stderr, `git ${args.join(' ')}`, result.exitCode));
      }
      return ok(result.stdout.trim());
    },
  };
}

describe('GitRepository queries', () => {
  test('currentBranch is null on a detached HEAD', async () => {
    const git = createMockGit({ 'symbolic-ref --quiet --short HEAD': 1 });

    expect(await new GitRepository(REPO, git).currentBranch()).toBeNull();
  });

  test('remoteBranches skips symbolic HEAD refs', async () => {
    const git = createMockGit({
      'for-each-ref --format=%(refname) refs/remotes':
        'refs/remotes/origin/HEAD\nrefs/remotes/origin/main\nrefs/remotes/upstream/feature/x\n',
    });

    expect(await new GitRepository(REPO, git).remoteBranches()).toEqual([
      'origin/main',
      'upstream/feature/x',
    ]);
  });

  test('commitHash caches until a mutation runs', async () => {
    const git = createMockGit({ 'rev-parse --verify --quiet main^{commit}': 'abc123\n' });
    const repo = new GitRepository(REPO, git);

    expect(await repo.commitHash('main')).toBe('abc123');
    expect(await repo.commitHash('main')).toBe('abc123');
    expect(git.calls).toEqual(['rev-parse --verify --quiet main^{commit}']);
    expect(repo.generation).toBe(0);

    await repo.checkout('main');
    await repo.commitHash('main');

    expect(repo.generation).toBe(1);
    expect(git.calls).toEqual([
      'rev-parse --verify --quiet main^{commit}',
      'checkout --quiet main --',
      'rev-parse --verify --quiet main^{commit}',
    ]);
  });

  test('commitHash is null for unknown revisions', async () => {
    const git = createMockGit({ 'rev-parse --verify --quiet nope^{commit}': 1 });

    expect(await new GitRepository(REPO, git).commitHash('nope')).toBeNull();
  });

  test('isAncestor excludes equal commits', async () => {
    const git = createMockGit({
      'rev-parse --verify --quiet a^{commit}': 'h1',
      'rev-parse --verify --quiet b^{commit}': 'h1',
      'rev-parse --verify --quiet c^{commit}': 'h2',
    });
    const repo = new GitRepository(REPO, git);

    expect(await repo.isAncestorOrEqual('a', 'b')).toBe(true);
    expect(await repo.isAncestor('a', 'b')).toBe(false);
    expect(await repo.isAncestor('a', 'c')).toBe(true);
  });

  test('logHashes passes the limit', async () => {
    const git = createMockGit({ 'log --topo-order --format=%H --max-count=2 main --': 'h2\nh1\n' });

    expect(await new GitRepository(REPO, git).logHashes('main', 2)).toEqual(['h2', 'h1']);
  });

  test('patchIdsBetween feeds the patch log to git patch-id', async () => {
    const git = createMockGit({
      'log --patch --no-color feature ^main --': 'diff --git a/x b/x',
      'patch-id --stable': 'p1 c1\np2 c2\n',
    });

    expect(await new GitRepository(REPO, git).patchIdsBetween('main', 'feature')).toEqual(['p1', 'p2']);
    expect(git.inputs).toEqual(['diff --git a/x b/x\n']);
  });

  test('reflog picks the remote ref for remote branches', async () => {
    const git = createMockGit({
      'for-each-ref --format=%(refname:short) refs/heads': 'main\n',
      'reflog show --format=%H%x09%gs refs/heads/main --': 'h1\tcommit: one\n',
      'reflog show --format=%H%x09%gs refs/remotes/origin/main --': 'h0\tupdate by push\n',
    });
    const repo = new GitRepository(REPO, git);

    expect(await repo.reflog('main')).toEqual([{ hash: 'h1', subject: 'commit: one' }]);
    expect(await repo.reflog('origin/main')).toEqual([{ hash: 'h0', subject: 'update by push' }]);
  });

  test('parseTimespec reads the max age', async () => {
    const git = createMockGit({
      'rev-parse --since=2 weeks ago': '--max-age=1699000000',
      'rev-parse --since=gibberish': '',
    });
    const repo = new GitRepository(REPO, git);

    expect(await repo.parseTimespec('2 weeks ago')).toBe(1699000000);
    expect(await repo.parseTimespec('gibberish')).toBeNull();
  });
});

describe('GitRepository counterparts', () => {
  const git = () =>
    createMockGit({
      remote: 'origin\norigin-mirror\n',
      'for-each-ref --format=%(refname) refs/remotes':
        'refs/remotes/origin/main\nrefs/remotes/origin-mirror/feature\nrefs/remotes/origin/topic\n',
      'for-each-ref --format=%(refname:short)%09%(upstream:short) refs/heads':
        'main\torigin/main\nfeature\torigin-mirror/feature\ngone\torigin/gone\ntopic\t\n',
    });

  test('strictCounterpart resolves the remote of the upstream', async () => {
    const repo = new GitRepository(REPO, git());

    expect(await repo.strictCounterpart('main')).toEqual({ remote: 'origin', name: 'origin/main' });
    expect(await repo.strictCounterpart('feature')).toEqual({
      remote: 'origin-mirror',
      name: 'origin-mirror/feature',
    });
    expect(await repo.strictCounterpart('gone')).toBeNull();
  });

  test('isMissingTrackingBranch', async () => {
    const repo = new GitRepository(REPO, git());

    expect(await repo.isMissingTrackingBranch('gone')).toBe(true);
    expect(await repo.isMissingTrackingBranch('main')).toBe(false);
    expect(await repo.isMissingTrackingBranch('topic')).toBe(false);
  });

  test('combinedCounterpart falls back to the inferred remote branch', async () => {
    const repo = new GitRepository(REPO, git());

    expect(await repo.combinedCounterpart('topic')).toEqual({ remote: 'origin', name: 'origin/topic' });
    expect(await repo.combinedCounterpart('elsewhere')).toBeNull();
  });
});

describe('GitRepository mutations', () => {
  test('traces every command', async () => {
    const traced: Array<[string, boolean]> = [];
    const git = createMockGit({ 'rev-parse --verify --quiet main^{commit}': 'h1' });
    const repo = new GitRepository(REPO, git, (command, mutating) => traced.push([command, mutating]));

    await repo.commitHash('main');
    await repo.push('origin', 'main', true);

    expect(traced).toEqual([
      ['git rev-parse --verify --quiet main^{commit}', false],
      ['git push --set-upstream origin main --force-with-lease', true],
    ]);
  });

  test('rebase passes the fork point', async () => {
    const git = createMockGit();

    const result = await new GitRepository(REPO, git).rebase('main', 'h0', 'feature', false);

    expect(result.isOk()).toBe(true);
    expect(git.calls).toEqual(['rebase --onto main h0 feature']);
  });

  test('merge without --no-edit opens the editor', async () => {
    const git = createMockGit();

    await new GitRepository(REPO, git).merge('main', 'feature', false);

    expect(git.calls).toEqual(["merge -m Merge branch 'main' into feature --edit main"]);
  });

  test('pullFastForwardOnly stops when fetching fails', async () => {
    const git = createMockGit({ 'fetch --prune origin': 128 });

    const result = await new GitRepository(REPO, git).pullFastForwardOnly('origin', 'origin/main');

    expect(result._unsafeUnwrapErr().command).toBe('git fetch --prune origin');
    expect(git.calls).toEqual(['fetch --prune origin']);
  });

  test('configUnset tolerates a missing key', async () => {
    const git = createMockGit({
      'config --unset arbor.missing': 5,
      'config --unset arbor.broken': 3,
    });
    const repo = new GitRepository(REPO, git);

    expect((await repo.configUnset('arbor.missing')).isOk()).toBe(true);
    const failed = await repo.configUnset('arbor.broken');
    expect(failed._unsafeUnwrapErr().message).toBe('failed: config --unset arbor.broken');
    expect(failed._unsafeUnwrapErr().exitCode).toBe(3);
  });

  test('failed mutations still flush caches', async () => {
    const git = createMockGit({ 'checkout --quiet nope --': 1 });
    const repo = new GitRepository(REPO, git);

    const result = await repo.checkout('nope');

    expect(result.isErr()).toBe(true);
    expect(repo.generation).toBe(1);
  });
});
