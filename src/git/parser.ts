/**
 * Parse git plumbing output into structured data
 */

import type { CommitSummary, ReflogEntry } from './types.js';

const CHECKOUT_PATTERN = /^HEAD@\{(\d+) [^}]+\}\tcheckout: moving from (.+) to (.+)$/;

export class GitParser {
  /**
   * Split output into its non-empty lines
   */
  static lines(output: string): string[] {
    return output.split('\n').filter((line) => line.trim() !== '');
  }

  /**
   * Parse `git reflog show --format=%H%x09%gs` output
   */
  static parseReflog(output: string): ReflogEntry[] {
    const entries: ReflogEntry[] = [];
    for (const line of this.lines(output)) {
      const tab = line.indexOf('\t');
      if (tab === -1) {
        entries.push({ hash: line.trim(), subject: '' });
      } else {
        entries.push({ hash: line.slice(0, tab), subject: line.slice(tab + 1) });
      }
    }
    return entries;
  }

  /**
   * Parse `git log --format=%H%x09%h%x09%s` output
   */
  static parseCommits(output: string): CommitSummary[] {
    return this.lines(output).map((line) => {
      const [hash = '', shortHash = '', ...subject] = line.split('\t');
      return { hash, shortHash, subject: subject.join('\t') };
    });
  }

  /**
   * Parse `git for-each-ref --format=%(refname:short)%09%(upstream:short)` output
   * into branch → upstream (empty upstream omitted)
   */
  static parseUpstreams(output: string): Map<string, string> {
    const upstreams = new Map<string, string>();
    for (const line of this.lines(output)) {
      const [branch, upstream] = line.split('\t');
      if (branch && upstream) {
        upstreams.set(branch, upstream);
      }
    }
    return upstreams;
  }

  /**
   * Parse `git patch-id` output (`<patch-id> <commit-id>` per line) into patch ids
   */
  static parsePatchIds(output: string): string[] {
    return this.lines(output).map((line) => line.split(' ')[0] ?? '');
  }

  /**
   * Parse `git rev-list --left-right --count a...b` output
   */
  static parseAheadBehind(output: string): [number, number] {
    const [ahead = '0', behind = '0'] = output.trim().split(/\s+/);
    return [Number.parseInt(ahead, 10) || 0, Number.parseInt(behind, 10) || 0];
  }

  /**
   * Parse `git reflog show --format=%gd%x09%gs --date=raw HEAD` output into the
   * latest checkout time of every branch mentioned in a checkout entry
   */
  static parseCheckoutTimestamps(output: string): Map<string, number> {
    const timestamps = new Map<string, number>();
    for (const line of this.lines(output)) {
      const match = line.match(CHECKOUT_PATTERN);
      if (!match) continue;
      const [, rawTimestamp = '0', from = '', to = ''] = match;
      const timestamp = Number.parseInt(rawTimestamp, 10);
      // newest entries come first, so the first occurrence is the latest one
      if (!timestamps.has(from)) timestamps.set(from, timestamp);
      if (!timestamps.has(to)) timestamps.set(to, timestamp);
    }
    return timestamps;
  }

  /**
   * Parse `git config --get-regexp` output into key/value pairs
   */
  static parseConfigEntries(output: string): Array<[string, string]> {
    return this.lines(output).map((line) => {
      const space = line.indexOf(' ');
      return space === -1 ? [line, ''] : [line.slice(0, space), line.slice(space + 1)];
    });
  }
}
