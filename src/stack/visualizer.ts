/**
 * Render the branch tree with edge colours and remote status
 */

import { formatAnnotation } from './annotation.js';
import type { EngineContext } from './context.js';
import {
  EDGE_COLORS,
  type EdgeColor,
  type ForkPoint,
  type ParentSyncStatus,
  type RemoteSyncState,
} from './types.js';

export interface StatusOptions {
  listCommits?: boolean;
  listCommitsWithHashes?: boolean;
  /** Warn about yellow edges below the tree */
  warnOnYellowEdges?: boolean;
}

export interface StatusOutput {
  lines: string[];
  warning: string | null;
}

export class StatusRenderer {
  constructor(private readonly ctx: EngineContext) {}

  async render(options: StatusOptions = {}): Promise<StatusOutput> {
    const { layout, git, classifier, palette } = this.ctx;
    const { c } = palette;
    const space = this.ctx.config.extraSpaceBeforeBranchName ? ' ' : '';
    const branches = layout.branchNames();

    // for every branch, the next sibling of each ancestor level (null when last)
    const nextSiblings = new Map<string, Array<string | null>>();
    const collect = (branch: string, path: Array<string | null>): void => {
      nextSiblings.set(branch, path);
      const children = layout.childrenOf(branch);
      children.forEach((child, i) => collect(child, [...path, children[i + 1] ?? null]));
    };
    layout.roots.forEach((root) => collect(root, []));

    const statuses = new Map<string, ParentSyncStatus>();
    for (const branch of branches) {
      const status = await classifier.parentSyncStatus(branch);
      if (status) statuses.set(branch, status);
    }
    const colorOf = (branch: string): EdgeColor => EDGE_COLORS[statuses.get(branch) ?? 'in-sync'];

    const current = await git.currentBranch();
    const rebased = await git.rebasedBranch();
    const merging = await git.isMergeInProgress();

    const prefix = (branch: string, suffix: string): string => {
      const path = nextSiblings.get(branch) ?? [];
      let out = '  ' + space;
      for (const sibling of path.slice(0, -1)) {
        out += sibling ? palette.edge(colorOf(sibling), `${palette.verticalBar} ${space}`) : '  ' + space;
      }
      return out + palette.edge(colorOf(branch), suffix);
    };

    const lines: string[] = [];
    for (const branch of branches) {
      const label =
        this.branchLabel(branch, current, rebased, merging) +
        this.remoteSuffix(await classifier.classifyRemote(branch), c);
      if (layout.parentOf(branch) !== null) {
        lines.push(prefix(branch, palette.verticalBar));
        if (options.listCommits || options.listCommitsWithHashes) {
          lines.push(...(await this.commitLines(branch, statuses.get(branch), prefix, options)));
        }
        const path = nextSiblings.get(branch) ?? [];
        const next = path[path.length - 1] ?? null;
        const sameColorBelow = next !== null && colorOf(next) === colorOf(branch);
        const junction = palette.junction(colorOf(branch), sameColorBelow);
        lines.push(prefix(branch, junction + space) + label);
      } else {
        if (branch !== layout.roots[0]) lines.push('');
        lines.push('  ' + space + label);
      }
    }

    const yellow = branches.filter((branch) => statuses.get(branch) === 'in-sync-fork-point-off');
    const warning =
      options.warnOnYellowEdges && yellow.length > 0
        ? this.yellowEdgeWarning(yellow, Boolean(options.listCommits || options.listCommitsWithHashes))
        : null;
    return { lines, warning };
  }

  private branchLabel(
    branch: string,
    current: string | null,
    rebased: string | null,
    merging: boolean
  ): string {
    const { palette } = this.ctx;
    let label: string;
    if (branch === current || branch === rebased) {
      const operation = branch === rebased ? 'REBASING ' : merging ? 'MERGING ' : '';
      label = (operation ? palette.c.bold(palette.c.red(operation)) : '') + palette.currentBranch(branch);
    } else {
      label = palette.branch(branch);
    }
    const annotation = formatAnnotation(this.ctx.layout.annotationOf(branch));
    return label + (annotation ? '  ' + palette.c.dim(annotation) : '');
  }

  private remoteSuffix(state: RemoteSyncState, c: EngineContext['palette']['c']): string {
    const remote = c.bold(state.remote ?? '');
    switch (state.status) {
      case 'no-remotes':
      case 'in-sync':
        return '';
      case 'untracked':
        return c.yellow(' (untracked)');
      case 'ahead':
        return c.red(` (ahead of ${remote})`);
      case 'behind':
        return c.red(` (behind ${remote})`);
      case 'diverged-newer':
        return c.red(` (diverged from ${remote})`);
      case 'diverged-older':
        return c.red(` (diverged from & older than ${remote})`);
    }
  }

  private async commitLines(
    branch: string,
    status: ParentSyncStatus | undefined,
    prefix: (branch: string, suffix: string) => string,
    options: StatusOptions
  ): Promise<string[]> {
    const { git, forkPoints, layout, palette } = this.ctx;
    const { c } = palette;
    const forkPointResult = await forkPoints.effectiveForkPoint(branch);
    const forkPoint: ForkPoint | null = forkPointResult.isOk() ? forkPointResult.value : null;
    const parent = layout.parentOf(branch);
    if (!forkPoint || !parent || status === 'merged-into-parent') return [];

    const from = status === 'in-sync-fork-point-off' ? parent : forkPoint.hash;
    const commits = await git.commitsBetween(from, branch);
    return commits.map((commit) => {
      let suffix = '';
      if (commit.hash === forkPoint.hash) {
        const owners = forkPoint.containing.map((pair) => c.underline(pair.ref)).sort().join(' and ');
        suffix =
          ` ${c.red(palette.rightArrow)} ${c.red('fork point ???')} ` +
          (options.listCommitsWithHashes ? 'this commit' : `commit ${commit.shortHash}`) +
          ` seems to be a part of the unique history of ${owners}`;
      }
      const hash = options.listCommitsWithHashes ? `${c.dim(commit.shortHash)}  ` : '';
      return prefix(branch, palette.verticalBar) + ` ${hash}${c.dim(commit.subject)}${suffix}`;
    });
  }

  private yellowEdgeWarning(yellow: string[], listedCommits: boolean): string {
    const { layout } = this.ctx;
    const [first = ''] = yellow;
    const single = yellow.length === 1;

    const what = single
      ? `yellow edge indicates that fork point for ${first} is probably incorrectly inferred,\n` +
        `or that some extra branch should be between ${layout.parentOf(first) ?? ''} and ${first}`
      : `yellow edges indicate that fork points for ${yellow.join(', ')} ` +
        'are probably incorrectly inferred,\n' +
        'or that some extra branch should be added between each of these branches and its parent';

    let hint: string;
    if (!listedCommits) {
      hint =
        'Run `arbor status --list-commits` or `arbor status --list-commits-with-hashes` ' +
        'to see more details';
    } else if (single) {
      hint =
        'Consider using `arbor fork-point ' +
        '--override-to=<revision>|--override-to-inferred|--override-to-parent ' +
        `${first}\`,\nor reattaching ${first} under a different parent branch`;
    } else {
      hint =
        'Consider using `arbor fork-point ' +
        '--override-to=<revision>|--override-to-inferred|--override-to-parent <branch>` ' +
        'for each affected branch,\nor reattaching the affected branches under different parent branches';
    }
    return `${what}.\n\n${hint}.`;
  }
}

/**
 * Render the tree and write it through the reporter
 */
export async function printStatus(ctx: EngineContext, options: StatusOptions = {}): Promise<void> {
  const { lines, warning } = await new StatusRenderer(ctx).render(options);
  for (const line of lines) {
    ctx.reporter.info(line);
  }
  if (warning) {
    ctx.reporter.warn(warning);
  }
}
