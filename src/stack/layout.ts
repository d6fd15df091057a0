/**
 * In-memory forest of managed branches.
 *
 * Nodes live in a flat map keyed by branch name; parent and children are
 * stored as names so that invariant checking is a plain walk over the map.
 */

import { EMPTY_ANNOTATION } from './annotation.js';
import { StackErrors, stackOk, type StackResult } from './errors.js';
import type { Annotation, BranchNode } from './types.js';

export const DEFAULT_INDENT = '  ';

export type InsertPosition = 'first' | 'last';

/**
 * Subset of `git check-ref-format --branch` rules
 */
export function isValidBranchName(name: string): boolean {
  if (!name || name === '@' || name === 'HEAD') return false;
  if (name.startsWith('-') || name.startsWith('/') || name.endsWith('/')) return false;
  if (name.endsWith('.') || name.endsWith('.lock')) return false;
  if (name.includes('..') || name.includes('@{') || name.includes('//')) return false;
  if (/[\s~^:?*[\\\x00-\x1f\x7f]/.test(name)) return false;
  return name.split('/').every((component) => component !== '' && !component.startsWith('.'));
}

export class BranchLayout {
  private readonly nodes = new Map<string, BranchNode>();
  private readonly rootNames: string[] = [];

  constructor(public indent: string = DEFAULT_INDENT) {}

  get roots(): readonly string[] {
    return this.rootNames;
  }

  get size(): number {
    return this.nodes.size;
  }

  has(branch: string): boolean {
    return this.nodes.has(branch);
  }

  get(branch: string): BranchNode | undefined {
    return this.nodes.get(branch);
  }

  parentOf(branch: string): string | null {
    return this.nodes.get(branch)?.parent ?? null;
  }

  childrenOf(branch: string): readonly string[] {
    return this.nodes.get(branch)?.children ?? [];
  }

  annotationOf(branch: string): Annotation {
    return this.nodes.get(branch)?.annotation ?? EMPTY_ANNOTATION;
  }

  setAnnotation(branch: string, annotation: Annotation): void {
    const node = this.nodes.get(branch);
    if (node) node.annotation = annotation;
  }

  /**
   * All managed branches in pre-order (roots in file order, children in list order)
   */
  branchNames(): string[] {
    const result: string[] = [];
    const stack = [...this.rootNames].reverse();
    while (stack.length > 0) {
      const name = stack.pop();
      if (name === undefined) break;
      result.push(name);
      stack.push(...[...this.childrenOf(name)].reverse());
    }
    return result;
  }

  /**
   * The root of the tree containing `branch`
   */
  rootOf(branch: string): string {
    let current = branch;
    const seen = new Set<string>();
    for (let parent = this.parentOf(current); parent !== null; parent = this.parentOf(current)) {
      if (seen.has(parent)) break;
      seen.add(parent);
      current = parent;
    }
    return current;
  }

  /**
   * Insert a new branch under `parent`, or as a root when `parent` is null
   */
  add(
    branch: string,
    parent: string | null,
    options: { annotation?: Annotation; position?: InsertPosition } = {}
  ): StackResult<void> {
    if (!isValidBranchName(branch)) {
      return StackErrors.invalidArgument(`'${branch}' is not a valid branch name`);
    }
    if (this.nodes.has(branch)) {
      return StackErrors.alreadyManaged(branch);
    }
    const siblings = parent === null ? this.rootNames : this.nodes.get(parent)?.children;
    if (!siblings) {
      return StackErrors.notManaged(parent ?? branch);
    }

    this.nodes.set(branch, {
      name: branch,
      parent,
      children: [],
      annotation: options.annotation ?? { ...EMPTY_ANNOTATION },
    });
    if (options.position === 'first') {
      siblings.unshift(branch);
    } else {
      siblings.push(branch);
    }
    return stackOk(undefined);
  }

  /**
   * Remove `branch`, putting its children in its place in the parent's list
   * (or in the root list). Returns the children that moved.
   */
  slideOut(branch: string): StackResult<string[]> {
    const node = this.nodes.get(branch);
    if (!node) {
      return StackErrors.notManaged(branch);
    }

    const siblings = this.siblingList(node);
    const index = siblings.indexOf(branch);
    if (index === -1) {
      return StackErrors.invariant(`branch ${branch} is missing from its parent's child list`);
    }
    siblings.splice(index, 1, ...node.children);
    for (const child of node.children) {
      const childNode = this.nodes.get(child);
      if (childNode) childNode.parent = node.parent;
    }
    this.nodes.delete(branch);
    return stackOk([...node.children]);
  }

  /**
   * Move `branch` (with its subtree) under `newParent`
   */
  reattach(branch: string, newParent: string | null, position: InsertPosition = 'last'): StackResult<void> {
    const node = this.nodes.get(branch);
    if (!node) {
      return StackErrors.notManaged(branch);
    }
    const target = newParent === null ? this.rootNames : this.nodes.get(newParent)?.children;
    if (!target) {
      return StackErrors.notManaged(newParent ?? branch);
    }
    if (newParent !== null && (newParent === branch || this.isInSubtree(newParent, branch))) {
      return StackErrors.invariant(`moving ${branch} under ${newParent} would create a cycle`);
    }

    const siblings = this.siblingList(node);
    siblings.splice(siblings.indexOf(branch), 1);
    node.parent = newParent;
    if (position === 'first') {
      target.unshift(branch);
    } else {
      target.push(branch);
    }
    return stackOk(undefined);
  }

  /**
   * Remove a leaf branch
   */
  remove(branch: string): StackResult<void> {
    const node = this.nodes.get(branch);
    if (!node) {
      return StackErrors.notManaged(branch);
    }
    if (node.children.length > 0) {
      return StackErrors.invariant(`cannot remove ${branch}, it still has child branches`);
    }
    const siblings = this.siblingList(node);
    siblings.splice(siblings.indexOf(branch), 1);
    this.nodes.delete(branch);
    return stackOk(undefined);
  }

  clone(): BranchLayout {
    const copy = new BranchLayout(this.indent);
    copy.rootNames.push(...this.rootNames);
    for (const [name, node] of this.nodes) {
      copy.nodes.set(name, {
        name,
        parent: node.parent,
        children: [...node.children],
        annotation: { text: node.annotation.text, qualifiers: { ...node.annotation.qualifiers } },
      });
    }
    return copy;
  }

  /**
   * Verify the forest: every node reachable exactly once from the roots,
   * parent links matching child lists, valid names, no cycles.
   */
  checkInvariants(): StackResult<void> {
    const seen = new Set<string>();
    const pending: Array<{ name: string; parent: string | null }> = this.rootNames.map((name) => ({
      name,
      parent: null,
    }));

    while (pending.length > 0) {
      const entry = pending.pop();
      if (!entry) break;
      const { name, parent } = entry;
      if (seen.has(name)) {
        return StackErrors.invariant(`branch ${name} appears more than once`);
      }
      seen.add(name);

      const node = this.nodes.get(name);
      if (!node) {
        return StackErrors.invariant(`branch ${name} is referenced but not defined`);
      }
      if (node.parent !== parent) {
        return StackErrors.invariant(
          `branch ${name} records parent ${node.parent ?? '<none>'} ` +
            `but is listed under ${parent ?? '<roots>'}`
        );
      }
      if (!isValidBranchName(name)) {
        return StackErrors.invariant(`'${name}' is not a valid branch name`);
      }
      for (const child of node.children) {
        pending.push({ name: child, parent: name });
      }
    }

    if (seen.size !== this.nodes.size) {
      const orphans = [...this.nodes.keys()].filter((name) => !seen.has(name));
      return StackErrors.invariant(`branches not reachable from any root: ${orphans.join(', ')}`);
    }
    return stackOk(undefined);
  }

  private siblingList(node: BranchNode): string[] {
    if (node.parent === null) return this.rootNames;
    return this.nodes.get(node.parent)?.children ?? [];
  }

  private isInSubtree(candidate: string, subtreeRoot: string): boolean {
    let current = this.parentOf(candidate);
    const seen = new Set<string>();
    while (current !== null && !seen.has(current)) {
      if (current === subtreeRoot) return true;
      seen.add(current);
      current = this.parentOf(current);
    }
    return false;
  }
}
