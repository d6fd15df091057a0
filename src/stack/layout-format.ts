/**
 * Text format of the branch layout file.
 *
 * One branch per line, nesting by indentation, optional annotation after the
 * first space:
 *
 *   main
 *     feature-a  PR #12 push=no
 *       feature-b
 *   hotfix
 */

import { formatAnnotation, parseAnnotation } from './annotation.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';
import { BranchLayout, DEFAULT_INDENT, isValidBranchName } from './layout.js';

const WHITESPACE_NAMES: Record<string, string> = { ' ': '<SPACE>', '\t': '<TAB>' };

function expandWhitespace(prefix: string): string {
  return [...prefix].map((c) => WHITESPACE_NAMES[c] ?? c).join('');
}

/**
 * Parse layout text. Errors name the 1-based line and never repair the input.
 */
export function parseLayout(text: string, file?: string): StackResult<BranchLayout> {
  const lines = text.split(/\r?\n/);
  let indent: string | null = null;
  let lastDepth = -1;
  const atDepth: string[] = [];
  const layout = new BranchLayout();

  for (let index = 0; index < lines.length; index++) {
    const line = (lines[index] ?? '').trimEnd();
    if (line === '') continue;
    const lineNumber = index + 1;

    const prefix = line.match(/^\s*/)?.[0] ?? '';
    if (prefix && indent === null) {
      indent = prefix;
    }

    const content = line.slice(prefix.length);
    const space = content.indexOf(' ');
    const branch = space === -1 ? content : content.slice(0, space);
    const rawAnnotation = space === -1 ? '' : content.slice(space + 1);

    if (layout.has(branch)) {
      return StackErrors.layoutParse(lineNumber, `branch ${branch} re-appears in the tree definition`, file);
    }
    if (!isValidBranchName(branch)) {
      return StackErrors.layoutParse(lineNumber, `'${branch}' is not a valid branch name`, file);
    }

    let depth = 0;
    if (prefix && indent !== null) {
      depth = Math.floor(prefix.length / indent.length);
      if (prefix !== indent.repeat(depth)) {
        return StackErrors.layoutParse(
          lineNumber,
          `invalid indent ${expandWhitespace(prefix)}, expected a multiple of ${expandWhitespace(indent)}`,
          file
        );
      }
    }

    if (depth > lastDepth + 1) {
      return StackErrors.layoutParse(
        lineNumber,
        `too much indent (level ${depth}, expected at most ${lastDepth + 1}) for the branch ${branch}`,
        file
      );
    }
    lastDepth = depth;
    atDepth[depth] = branch;
    atDepth.length = depth + 1;

    const parent = depth > 0 ? (atDepth[depth - 1] ?? null) : null;
    const added = layout.add(branch, parent, { annotation: parseAnnotation(rawAnnotation) });
    if (added.isErr()) {
      return StackErrors.layoutParse(lineNumber, added.error.message, file);
    }
  }

  layout.indent = indent ?? DEFAULT_INDENT;
  return stackOk(layout);
}

/**
 * Render the layout back to text, one branch per line with a trailing newline
 */
export function serializeLayout(layout: BranchLayout): string {
  const lines: string[] = [];

  const visit = (branch: string, depth: number): void => {
    const annotation = formatAnnotation(layout.annotationOf(branch));
    lines.push(layout.indent.repeat(depth) + branch + (annotation ? ` ${annotation}` : ''));
    for (const child of layout.childrenOf(branch)) {
      visit(child, depth + 1);
    }
  };

  for (const root of layout.roots) {
    visit(root, 0);
  }
  return lines.map((line) => `${line}\n`).join('');
}
