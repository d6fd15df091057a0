/**
 * Fork point inference from reflogs, with per-branch overrides stored in git config
 */

import { GitConfigKeys } from '../config/manager.js';
import type { GitFacade } from '../git/facade.js';
import type { ReflogEntry } from '../git/types.js';
import type { Reporter } from '../ui/reporter.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';
import type { BranchLayout } from './layout.js';
import type { BranchPair, ForkPoint } from './types.js';

/** Commits fetched before falling back to the branch's whole history */
const INITIAL_LOG_LENGTH = 10;

const FULL_HASH = /^[0-9a-f]{40}([0-9a-f]{24})?$/;

/**
 * Reflog entries that say nothing about where a branch's own history starts
 */
export function isExcludedReflogSubject(ref: string, entry: ReflogEntry): boolean {
  const { hash, subject } = entry;
  return (
    subject.startsWith('branch: Created from') ||
    subject === `branch: Reset to ${ref}` ||
    subject === 'branch: Reset to HEAD' ||
    subject.startsWith('reset: moving to ') ||
    subject.startsWith('fetch . ') ||
    subject === `rebase finished: refs/heads/${ref} onto ${hash}` ||
    subject === `rebase -i (finish): refs/heads/${ref} onto ${hash}` ||
    // pushes are left out: a branch pushed right after creation would pull the fork point too late
    subject === 'update by push'
  );
}

export class ForkPointResolver {
  private generation = -1;
  private index: Map<string, BranchPair[]> | null = null;
  private readonly filtered = new Map<string, string[]>();
  private readonly results = new Map<string, StackResult<ForkPoint>>();
  private readonly staleWarned = new Set<string>();

  constructor(
    private readonly git: GitFacade,
    private readonly layout: BranchLayout,
    private readonly reporter: Reporter
  ) {}

  /**
   * Reflog of `ref` without creation, reset and no-op rebase entries, newest first
   */
  async filteredReflog(ref: string): Promise<string[]> {
    this.syncGeneration();
    const cached = this.filtered.get(ref);
    if (cached) return cached;

    const entries = await this.git.reflog(ref);
    const earliest = entries[entries.length - 1];
    const creationHash = earliest?.subject.startsWith('branch: Created from') ? earliest.hash : null;

    const hashes = entries
      .filter((entry) => entry.hash !== creationHash && !isExcludedReflogSubject(ref, entry))
      .map((entry) => entry.hash);
    this.reporter.debug(`filtered reflog of ${ref}: ${hashes.join(', ') || '<empty>'}`);
    this.filtered.set(ref, hashes);
    return hashes;
  }

  /**
   * Commits of `branch` (tip first) that occur in the filtered reflog of some
   * other local branch or its remote counterpart, with the matching branches
   */
  async *matchLogToReflogs(branch: string): AsyncGenerator<[string, BranchPair[]]> {
    const index = await this.reflogIndex();
    const tip = await this.git.commitHash(branch);
    if (!tip) return;

    for await (const hash of this.walkLog(tip)) {
      const pairs = index.get(hash);
      if (!pairs) continue;
      const containing = pairs
        .filter((pair) => pair.branch !== branch)
        .sort((a, b) => (a.ref < b.ref ? -1 : a.ref > b.ref ? 1 : 0));
      if (containing.length > 0) {
        yield [hash, containing];
      }
    }
  }

  /**
   * Inferred fork point ignoring overrides, or null when there is none
   */
  async inferForkPoint(branch: string): Promise<string | null> {
    const result = await this.effectiveForkPoint(branch, false);
    return result.isOk() ? result.value.hash : null;
  }

  /**
   * The fork point used for rebases and edge colours
   */
  async effectiveForkPoint(branch: string, useOverrides = true): Promise<StackResult<ForkPoint>> {
    this.syncGeneration();
    const parent = this.layout.parentOf(branch);
    const key = `${branch}\0${parent ?? ''}\0${useOverrides}`;
    const cached = this.results.get(key);
    if (cached) return cached;

    const result = await this.computeForkPoint(branch, parent, useOverrides);
    this.results.set(key, result);
    return result;
  }

  /**
   * The raw override commit from git config, valid or not
   */
  async overrideCommit(branch: string): Promise<string | null> {
    const value = await this.git.configGet(GitConfigKeys.overrideForkPointTo(branch));
    return value && FULL_HASH.test(value) ? value : null;
  }

  async hasOverride(branch: string): Promise<boolean> {
    return (await this.git.configGet(GitConfigKeys.overrideForkPointTo(branch))) !== null;
  }

  /**
   * The override commit while it is still an ancestor of (or equal to) the branch tip
   */
  async overriddenForkPoint(branch: string): Promise<string | null> {
    const to = await this.overrideCommit(branch);
    if (!to) return null;

    if (!(await this.git.isAncestorOrEqual(to, branch))) {
      if (!this.staleWarned.has(branch)) {
        this.staleWarned.add(branch);
        this.reporter.warn(
          `since branch ${branch} is no longer a descendant of commit ${to}, ` +
            'the fork point override to this commit no longer applies.\n' +
            `Consider running:\n  arbor fork-point --unset-override ${branch}`
        );
      }
      return null;
    }
    this.reporter.debug(`fork point of ${branch} is overridden to ${to}`);
    return to;
  }

  async overrideTo(branch: string, revision: string): Promise<StackResult<string>> {
    const hash = await this.git.commitHash(revision);
    if (!hash) {
      return StackErrors.invalidArgument(`Cannot find revision ${revision}`);
    }
    if (!(await this.git.isAncestorOrEqual(hash, branch))) {
      return StackErrors.invalidArgument(
        `Cannot override fork point: ${revision} (commit ${hash.slice(0, 7)}) is not an ancestor of ${branch}`
      );
    }

    const set = await this.git.configSet(GitConfigKeys.overrideForkPointTo(branch), hash);
    if (set.isErr()) {
      return StackErrors.gitError('config', set.error);
    }
    this.staleWarned.delete(branch);
    return stackOk(hash);
  }

  async unsetOverride(branch: string): Promise<StackResult<void>> {
    const unset = await this.git.configUnset(GitConfigKeys.overrideForkPointTo(branch));
    if (unset.isErr()) {
      return StackErrors.gitError('config', unset.error);
    }
    return stackOk(undefined);
  }

  /**
   * Guess the parent of `branch`: the first branch whose filtered reflog
   * contains a commit of `branch`'s history and that `accept` agrees to
   */
  async inferParent(
    branch: string,
    accept: (candidate: string) => boolean = () => true
  ): Promise<string | null> {
    for await (const [hash, pairs] of this.matchLogToReflogs(branch)) {
      for (const { branch: candidate, ref } of pairs) {
        if (accept(candidate)) {
          this.reporter.debug(
            `commit ${hash} found in filtered reflog of ${ref}; inferred parent of ${branch} is ${candidate}`
          );
          return candidate;
        }
        this.reporter.debug(`parent candidate ${candidate} of ${branch} rejected`);
      }
    }
    return null;
  }

  private async computeForkPoint(
    branch: string,
    parent: string | null,
    useOverrides: boolean
  ): Promise<StackResult<ForkPoint>> {
    const parentHash = parent ? await this.git.commitHash(parent) : null;
    const parentIsAncestor =
      parent !== null && parentHash !== null && (await this.git.isAncestorOrEqual(parent, branch));

    if (useOverrides) {
      const overridden = await this.overriddenForkPoint(branch);
      if (overridden) {
        if (parent && parentHash && parentIsAncestor) {
          if (!(await this.git.isAncestorOrEqual(parent, overridden))) {
            return stackOk({ hash: parentHash, containing: [] });
          }
        }
        if (parent && (await this.git.isAncestorOrEqual(overridden, parent))) {
          const base = await this.git.mergeBase(parent, branch);
          return stackOk({ hash: base ?? overridden, containing: [] });
        }
        return stackOk({ hash: overridden, containing: [] });
      }
    }

    const first = await this.matchLogToReflogs(branch).next();
    if (first.done) {
      if (parent && parentHash) {
        if (parentIsAncestor) {
          this.reporter.debug(`no fork point found for ${branch}, falling back to its parent ${parent}`);
          return stackOk({ hash: parentHash, containing: [] });
        }
        const base = await this.git.mergeBase(parent, branch);
        if (base) {
          this.reporter.debug(`no fork point found for ${branch}, falling back to merge base with ${parent}`);
          return stackOk({ hash: base, containing: [] });
        }
      }
      return StackErrors.forkPointNotFound(branch);
    }

    const [computed, containing] = first.value;
    if (parent && parentHash && parentIsAncestor && !(await this.git.isAncestorOrEqual(parent, computed))) {
      // the parent's reflog is incomplete; its tip is the better answer
      return stackOk({ hash: parentHash, containing: [] });
    }
    if (parent && !parentIsAncestor && (await this.git.isAncestorOrEqual(computed, parent))) {
      const base = await this.git.mergeBase(parent, branch);
      return stackOk({ hash: base ?? computed, containing: [] });
    }

    let improved: ForkPoint = { hash: computed, containing };
    for (const pair of containing) {
      const base = await this.git.mergeBase(pair.ref, branch);
      if (base && (await this.git.isAncestor(improved.hash, base))) {
        this.reporter.debug(`improving fork point of ${branch} from ${improved.hash} to ${base}`);
        improved = { hash: base, containing: [pair] };
      }
    }
    return stackOk(improved);
  }

  /**
   * Build `commit → branches whose filtered reflog contains it`
   */
  private async reflogIndex(): Promise<Map<string, BranchPair[]>> {
    this.syncGeneration();
    if (this.index) return this.index;

    const index = new Map<string, BranchPair[]>();
    const add = (hash: string, pair: BranchPair): void => {
      const pairs = index.get(hash);
      if (pairs) pairs.push(pair);
      else index.set(hash, [pair]);
    };

    for (const branch of await this.git.localBranches()) {
      const own = new Set(await this.filteredReflog(branch));
      for (const hash of own) {
        add(hash, { branch, ref: branch });
      }
      const counterpart = await this.git.combinedCounterpart(branch);
      if (counterpart) {
        for (const hash of await this.filteredReflog(counterpart.name)) {
          if (!own.has(hash)) add(hash, { branch, ref: counterpart.name });
        }
      }
    }

    this.index = index;
    return index;
  }

  private async *walkLog(tip: string): AsyncGenerator<string> {
    const head = await this.git.logHashes(tip, INITIAL_LOG_LENGTH);
    yield* head;
    if (head.length < INITIAL_LOG_LENGTH) return;
    const all = await this.git.logHashes(tip);
    yield* all.slice(head.length);
  }

  private syncGeneration(): void {
    if (this.generation !== this.git.generation) {
      this.generation = this.git.generation;
      this.index = null;
      this.filtered.clear();
      this.results.clear();
    }
  }
}
