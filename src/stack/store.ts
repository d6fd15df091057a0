/**
 * Reads and writes the branch layout file
 */

import { existsSync } from 'node:fs';
import { copyFile, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { err, ResultAsync } from 'neverthrow';
import type { Repository } from '../git/types.js';
import { StackError, stackOk, type StackResult } from './errors.js';
import type { BranchLayout } from './layout.js';
import { parseLayout, serializeLayout } from './layout-format.js';

export const LAYOUT_FILE_NAME = 'arbor';

/**
 * `<git common dir>/arbor`, or the worktree's own git dir when the layout is not shared
 */
export function resolveLayoutPath(
  repo: Repository,
  options: { override?: string; useTopLevelFile: boolean }
): string {
  if (options.override) return options.override;
  return join(options.useTopLevelFile ? repo.commonDir : repo.gitDir, LAYOUT_FILE_NAME);
}

const ioError = (action: string, path: string) => (e: unknown) =>
  new StackError(
    'LAYOUT_IO_ERROR',
    `Failed to ${action} ${path}: ${e instanceof Error ? e.message : String(e)}`,
    { path }
  );

/**
 * Persistence of the branch layout
 */
export interface LayoutStorage {
  readonly path: string;
  readText(): Promise<StackResult<string>>;
  load(): Promise<StackResult<BranchLayout>>;
  save(layout: BranchLayout): Promise<StackResult<void>>;
  backup(): Promise<StackResult<string>>;
}

export class FileLayoutStore implements LayoutStorage {
  constructor(public readonly path: string) {}

  /**
   * Raw file contents; an absent file reads as empty
   */
  async readText(): Promise<StackResult<string>> {
    if (!existsSync(this.path)) {
      return stackOk('');
    }
    return ResultAsync.fromPromise(readFile(this.path, 'utf8'), ioError('read', this.path));
  }

  async load(): Promise<StackResult<BranchLayout>> {
    const text = await this.readText();
    return text.andThen((content) => parseLayout(content, this.path));
  }

  /**
   * Write the layout after checking the forest invariants; replaces the file by rename
   */
  async save(layout: BranchLayout): Promise<StackResult<void>> {
    const valid = layout.checkInvariants();
    if (valid.isErr()) {
      return err(valid.error);
    }
    const tmp = `${this.path}.tmp`;
    return ResultAsync.fromPromise(
      writeFile(tmp, serializeLayout(layout), 'utf8').then(() => rename(tmp, this.path)),
      ioError('write', this.path)
    );
  }

  /**
   * Copy the current file to `<path>~`
   */
  async backup(): Promise<StackResult<string>> {
    const target = `${this.path}~`;
    return ResultAsync.fromPromise(
      copyFile(this.path, target).then(() => target),
      ioError('back up', this.path)
    );
  }
}
