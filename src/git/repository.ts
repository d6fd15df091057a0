/**
 * GitFacade backed by the git executable, with per-invocation query caches
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { err, ok } from 'neverthrow';
import type { GitFacade } from './facade.js';
import { defaultGitOps, type GitExecOptions, type IGitOperations } from './interface.js';
import type { GitResult } from './operations.js';
import { GitParser } from './parser.js';
import {
  GitError,
  type CommitSummary,
  type ReflogEntry,
  type RemoteBranch,
  type Repository,
} from './types.js';

/**
 * Receives every git command line before it runs
 */
export type GitCommandTrace = (command: string, mutating: boolean) => void;

export class GitRepository implements GitFacade {
  private readonly git: IGitOperations;
  private gen = 0;

  private localBranchesCache: string[] | null = null;
  private remoteBranchesCache: string[] | null = null;
  private remotesCache: string[] | null = null;
  private upstreamsCache: Map<string, string> | null = null;
  private readonly hashes = new Map<string, string | null>();
  private readonly trees = new Map<string, string | null>();
  private readonly ancestry = new Map<string, boolean>();
  private readonly mergeBases = new Map<string, string | null>();
  private readonly reflogs = new Map<string, ReflogEntry[]>();

  constructor(
    private readonly repo: Repository,
    gitOps?: IGitOperations,
    private readonly trace?: GitCommandTrace
  ) {
    this.git = gitOps || defaultGitOps;
  }

  get generation(): number {
    return this.gen;
  }

  get root(): string {
    return this.repo.root;
  }

  flushCaches(): void {
    this.localBranchesCache = null;
    this.remoteBranchesCache = null;
    this.remotesCache = null;
    this.upstreamsCache = null;
    this.hashes.clear();
    this.trees.clear();
    this.ancestry.clear();
    this.mergeBases.clear();
    this.reflogs.clear();
    this.gen++;
  }

  // ---- queries ----

  async currentBranch(): Promise<string | null> {
    const result = await this.query(['symbolic-ref', '--quiet', '--short', 'HEAD']);
    return result.isOk() && result.value ? result.value : null;
  }

  async localBranches(): Promise<string[]> {
    if (!this.localBranchesCache) {
      const result = await this.query(['for-each-ref', '--format=%(refname:short)', 'refs/heads']);
      this.localBranchesCache = result.isOk() ? GitParser.lines(result.value) : [];
    }
    return this.localBranchesCache;
  }

  async remotes(): Promise<string[]> {
    if (!this.remotesCache) {
      const result = await this.query(['remote']);
      this.remotesCache = result.isOk() ? GitParser.lines(result.value) : [];
    }
    return this.remotesCache;
  }

  async remoteBranches(): Promise<string[]> {
    if (!this.remoteBranchesCache) {
      const result = await this.query(['for-each-ref', '--format=%(refname)', 'refs/remotes']);
      this.remoteBranchesCache = result.isOk()
        ? GitParser.lines(result.value)
            .filter((ref) => !ref.endsWith('/HEAD'))
            .map((ref) => ref.replace(/^refs\/remotes\//, ''))
        : [];
    }
    return this.remoteBranchesCache;
  }

  async commitHash(revision: string): Promise<string | null> {
    const cached = this.hashes.get(revision);
    if (cached !== undefined) return cached;
    const result = await this.query(['rev-parse', '--verify', '--quiet', `${revision}^{commit}`]);
    const hash = result.isOk() && result.value ? result.value : null;
    this.hashes.set(revision, hash);
    return hash;
  }

  async treeHash(revision: string): Promise<string | null> {
    const cached = this.trees.get(revision);
    if (cached !== undefined) return cached;
    const result = await this.query(['rev-parse', '--verify', '--quiet', `${revision}^{tree}`]);
    const tree = result.isOk() && result.value ? result.value : null;
    this.trees.set(revision, tree);
    return tree;
  }

  async committerTimestamp(revision: string): Promise<number> {
    const result = await this.query(['log', '-1', '--format=%ct', revision, '--']);
    return result.isOk() ? Number.parseInt(result.value, 10) || 0 : 0;
  }

  async isAncestorOrEqual(ancestor: string, descendant: string): Promise<boolean> {
    const key = `${ancestor}\0${descendant}`;
    const cached = this.ancestry.get(key);
    if (cached !== undefined) return cached;
    this.trace?.(`git merge-base --is-ancestor ${ancestor} ${descendant}`, false);
    const result = await this.git.exec(['merge-base', '--is-ancestor', ancestor, descendant], {
      cwd: this.repo.root,
    });
    const answer = result.exitCode === 0;
    this.ancestry.set(key, answer);
    return answer;
  }

  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    if (!(await this.isAncestorOrEqual(ancestor, descendant))) return false;
    return (await this.commitHash(ancestor)) !== (await this.commitHash(descendant));
  }

  async mergeBase(a: string, b: string): Promise<string | null> {
    const key = `${a}\0${b}`;
    const cached = this.mergeBases.get(key);
    if (cached !== undefined) return cached;
    const result = await this.query(['merge-base', a, b]);
    const base = result.isOk() && result.value ? result.value : null;
    this.mergeBases.set(key, base);
    return base;
  }

  async logHashes(revision: string, limit?: number): Promise<string[]> {
    const args = ['log', '--topo-order', '--format=%H'];
    if (limit !== undefined) args.push(`--max-count=${limit}`);
    args.push(revision, '--');
    const result = await this.query(args);
    return result.isOk() ? GitParser.lines(result.value) : [];
  }

  async treeHashesBetween(exclude: string, include: string): Promise<string[]> {
    const result = await this.query(['log', '--format=%T', include, `^${exclude}`, '--']);
    return result.isOk() ? GitParser.lines(result.value) : [];
  }

  async patchIdsBetween(exclude: string, include: string): Promise<string[]> {
    const log = await this.query(['log', '--patch', '--no-color', include, `^${exclude}`, '--']);
    if (log.isErr() || !log.value) return [];
    const ids = await this.query(['patch-id', '--stable'], { input: log.value + '\n' });
    return ids.isOk() ? GitParser.parsePatchIds(ids.value) : [];
  }

  async patchId(from: string, to: string): Promise<string | null> {
    const diff = await this.query(['diff', '--no-color', '--full-index', from, to, '--']);
    if (diff.isErr() || !diff.value) return null;
    const ids = await this.query(['patch-id', '--stable'], { input: diff.value + '\n' });
    if (ids.isErr()) return null;
    return GitParser.parsePatchIds(ids.value)[0] ?? null;
  }

  async commitsBetween(from: string, to: string): Promise<CommitSummary[]> {
    const result = await this.query([
      'log',
      '--reverse',
      '--format=%H%x09%h%x09%s',
      `^${from}`,
      to,
      '--',
    ]);
    return result.isOk() ? GitParser.parseCommits(result.value) : [];
  }

  async aheadBehindCounts(a: string, b: string): Promise<[number, number]> {
    const result = await this.query(['rev-list', '--left-right', '--count', `${a}...${b}`]);
    return result.isOk() ? GitParser.parseAheadBehind(result.value) : [0, 0];
  }

  async reflog(ref: string): Promise<ReflogEntry[]> {
    const cached = this.reflogs.get(ref);
    if (cached) return cached;
    const local = await this.localBranches();
    const fullRef = local.includes(ref) ? `refs/heads/${ref}` : `refs/remotes/${ref}`;
    const result = await this.query(['reflog', 'show', '--format=%H%x09%gs', fullRef, '--']);
    const entries = result.isOk() ? GitParser.parseReflog(result.value) : [];
    this.reflogs.set(ref, entries);
    return entries;
  }

  async latestCheckoutTimestamps(): Promise<Map<string, number>> {
    const result = await this.query(['reflog', 'show', '--format=%gd%x09%gs', '--date=raw', 'HEAD', '--']);
    return result.isOk() ? GitParser.parseCheckoutTimestamps(result.value) : new Map();
  }

  async parseTimespec(timespec: string): Promise<number | null> {
    const result = await this.query(['rev-parse', `--since=${timespec}`]);
    if (result.isErr()) return null;
    const match = result.value.match(/--max-age=(\d+)/);
    return match?.[1] ? Number.parseInt(match[1], 10) : null;
  }

  async strictCounterpart(branch: string): Promise<RemoteBranch | null> {
    const upstream = (await this.upstreams()).get(branch);
    if (!upstream || !(await this.remoteBranches()).includes(upstream)) return null;
    const remote = (await this.remotes())
      .filter((name) => upstream.startsWith(`${name}/`))
      .sort((a, b) => b.length - a.length)[0];
    return remote ? { remote, name: upstream } : null;
  }

  async isMissingTrackingBranch(branch: string): Promise<boolean> {
    const upstream = (await this.upstreams()).get(branch);
    return upstream !== undefined && !(await this.remoteBranches()).includes(upstream);
  }

  async inferredCounterpart(branch: string): Promise<RemoteBranch | null> {
    const remoteBranches = await this.remoteBranches();
    for (const remote of await this.remotes()) {
      const name = `${remote}/${branch}`;
      if (remoteBranches.includes(name)) return { remote, name };
    }
    return null;
  }

  async combinedCounterpart(branch: string): Promise<RemoteBranch | null> {
    return (await this.strictCounterpart(branch)) ?? (await this.inferredCounterpart(branch));
  }

  async rebasedBranch(): Promise<string | null> {
    for (const dir of ['rebase-merge', 'rebase-apply']) {
      const headName = join(this.repo.gitDir, dir, 'head-name');
      if (existsSync(headName)) {
        const content = (await readFile(headName, 'utf8')).trim();
        return content.replace(/^refs\/heads\//, '');
      }
    }
    return null;
  }

  async isMergeInProgress(): Promise<boolean> {
    return existsSync(join(this.repo.gitDir, 'MERGE_HEAD'));
  }

  async configGet(key: string): Promise<string | null> {
    const result = await this.query(['config', '--get', key]);
    return result.isOk() ? result.value : null;
  }

  async configGetRegexp(pattern: string): Promise<Array<[string, string]>> {
    const result = await this.query(['config', '--get-regexp', pattern]);
    return result.isOk() ? GitParser.parseConfigEntries(result.value) : [];
  }

  // ---- mutations ----

  async configSet(key: string, value: string): Promise<GitResult<void>> {
    return this.mutate(['config', key, value]);
  }

  async configUnset(key: string): Promise<GitResult<void>> {
    this.trace?.(`git config --unset ${key}`, true);
    const result = await this.git.exec(['config', '--unset', key], { cwd: this.repo.root });
    this.flushCaches();
    // exit code 5 means the key was not set
    if (result.exitCode === 0 || result.exitCode === 5) return ok(undefined);
    return err(
      new GitError(
        result.stderr.trim() || 'Git command failed',
        `git config --unset ${key}`,
        result.exitCode
      )
    );
  }

  checkout(branch: string): Promise<GitResult<void>> {
    return this.mutate(['checkout', '--quiet', branch, '--']);
  }

  createBranch(branch: string, startPoint: string): Promise<GitResult<void>> {
    return this.mutate(['branch', branch, startPoint]);
  }

  deleteBranch(branch: string, force: boolean): Promise<GitResult<void>> {
    return this.mutate(['branch', force ? '-D' : '-d', branch]);
  }

  rebase(onto: string, forkPoint: string, branch: string, interactive: boolean): Promise<GitResult<void>> {
    const args = ['rebase'];
    if (interactive) args.push('--interactive');
    args.push('--onto', onto, forkPoint, branch);
    return this.mutate(args, { interactive });
  }

  merge(from: string, into: string, noEdit: boolean): Promise<GitResult<void>> {
    return this.mutate(
      ['merge', '-m', `Merge branch '${from}' into ${into}`, noEdit ? '--no-edit' : '--edit', from],
      { interactive: !noEdit }
    );
  }

  mergeFastForwardOnly(revision: string): Promise<GitResult<void>> {
    return this.mutate(['merge', '--ff-only', revision]);
  }

  push(remote: string, branch: string, forceWithLease: boolean): Promise<GitResult<void>> {
    const args = ['push', '--set-upstream', remote, branch];
    if (forceWithLease) args.push('--force-with-lease');
    return this.mutate(args);
  }

  async pullFastForwardOnly(remote: string, remoteBranch: string): Promise<GitResult<void>> {
    const fetched = await this.fetch(remote);
    if (fetched.isErr()) return fetched;
    return this.mutate(['merge', '--ff-only', remoteBranch]);
  }

  resetKeep(revision: string): Promise<GitResult<void>> {
    return this.mutate(['reset', '--keep', revision]);
  }

  fetch(remote: string): Promise<GitResult<void>> {
    return this.mutate(['fetch', '--prune', remote]);
  }

  setUpstream(branch: string, remoteBranch: string): Promise<GitResult<void>> {
    return this.mutate(['branch', `--set-upstream-to=${remoteBranch}`, branch]);
  }

  private query(args: string[], options: Omit<GitExecOptions, 'cwd'> = {}): Promise<GitResult<string>> {
    this.trace?.(`git ${args.join(' ')}`, false);
    return this.git.execResult(args, { ...options, cwd: this.repo.root });
  }

  private async upstreams(): Promise<Map<string, string>> {
    if (!this.upstreamsCache) {
      const result = await this.query([
        'for-each-ref',
        '--format=%(refname:short)%09%(upstream:short)',
        'refs/heads',
      ]);
      this.upstreamsCache = result.isOk() ? GitParser.parseUpstreams(result.value) : new Map();
    }
    return this.upstreamsCache;
  }

  private async mutate(args: string[], options: Omit<GitExecOptions, 'cwd'> = {}): Promise<GitResult<void>> {
    this.trace?.(`git ${args.join(' ')}`, true);
    const result = await this.git.execResult(args, { ...options, cwd: this.repo.root });
    this.flushCaches();
    return result.map(() => undefined);
  }
}
