/**
 * Configuration schema and validation
 */

import { err, ok, type Result } from 'neverthrow';
import { SQUASH_MERGE_DETECTION_MODES, type SquashMergeDetection } from '../stack/types.js';

/**
 * Settings read from git config (`arbor.*`) and `.arbor.json`
 */
export interface ArborConfig {
  squashMergeDetection?: SquashMergeDetection;
  traverse?: {
    push?: boolean;
    /** Per-remote opt-out of `traverse --fetch` */
    fetch?: { [remote: string]: boolean };
  };
  status?: {
    extraSpaceBeforeBranchName?: boolean;
  };
  worktree?: {
    useTopLevelLayoutFile?: boolean;
  };
}

/**
 * Everything a single invocation needs to know, fixed at process start
 */
export interface RunConfig {
  readonly debug: boolean;
  readonly verbose: boolean;
  readonly asciiOnly: boolean;
  readonly colors: boolean;
  readonly yes: boolean;
  readonly squashMergeDetection: SquashMergeDetection;
  readonly pushByDefault: boolean;
  readonly extraSpaceBeforeBranchName: boolean;
  readonly useTopLevelLayoutFile: boolean;
  readonly fetchRemotes: Readonly<Record<string, boolean>>;
}

export const DEFAULT_CONFIG: ArborConfig = {
  squashMergeDetection: 'simple',
  traverse: { push: true, fetch: {} },
  status: { extraSpaceBeforeBranchName: false },
  worktree: { useTopLevelLayoutFile: true },
};

export function isSquashMergeDetection(value: unknown): value is SquashMergeDetection {
  return typeof value === 'string' && SQUASH_MERGE_DETECTION_MODES.some((mode) => mode === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkKeys(
  section: Record<string, unknown>,
  path: string,
  allowed: Record<string, (value: unknown) => boolean>,
  problems: string[]
): void {
  for (const [key, value] of Object.entries(section)) {
    const check = allowed[key];
    if (!check) {
      problems.push(`unknown key '${path}${key}'`);
    } else if (!check(value)) {
      problems.push(`invalid value for '${path}${key}'`);
    }
  }
}

const isBoolean = (value: unknown): boolean => typeof value === 'boolean';

/**
 * Validate a configuration object, returning every problem found
 */
export function validateConfig(config: unknown): string[] {
  const problems: string[] = [];
  if (!isRecord(config)) {
    return ['configuration must be a JSON object'];
  }

  checkKeys(
    config,
    '',
    {
      squashMergeDetection: isSquashMergeDetection,
      traverse: isRecord,
      status: isRecord,
      worktree: isRecord,
    },
    problems
  );

  const { traverse, status, worktree } = config;
  if (isRecord(traverse)) {
    checkKeys(
      traverse,
      'traverse.',
      {
        push: isBoolean,
        fetch: (value) => isRecord(value) && Object.values(value).every(isBoolean),
      },
      problems
    );
  }
  if (isRecord(status)) {
    checkKeys(status, 'status.', { extraSpaceBeforeBranchName: isBoolean }, problems);
  }
  if (isRecord(worktree)) {
    checkKeys(worktree, 'worktree.', { useTopLevelLayoutFile: isBoolean }, problems);
  }

  return problems;
}

/**
 * Merge two configurations (right takes precedence)
 */
export function mergeConfigs(base: ArborConfig, override: ArborConfig): ArborConfig {
  return {
    squashMergeDetection: override.squashMergeDetection ?? base.squashMergeDetection,
    traverse: {
      ...base.traverse,
      ...override.traverse,
      fetch: { ...base.traverse?.fetch, ...override.traverse?.fetch },
    },
    status: { ...base.status, ...override.status },
    worktree: { ...base.worktree, ...override.worktree },
  };
}

function booleanRecord(value: Record<string, unknown>): { [key: string]: boolean } {
  const result: { [key: string]: boolean } = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'boolean') result[key] = entry;
  }
  return result;
}

/**
 * Validate and narrow parsed JSON into a configuration
 */
export function parseConfig(raw: unknown): Result<ArborConfig, string[]> {
  const problems = validateConfig(raw);
  if (problems.length > 0 || !isRecord(raw)) {
    return err(problems);
  }

  const config: ArborConfig = {};
  if (isSquashMergeDetection(raw.squashMergeDetection)) {
    config.squashMergeDetection = raw.squashMergeDetection;
  }
  const { traverse, status, worktree } = raw;
  if (isRecord(traverse)) {
    config.traverse = {};
    if (typeof traverse.push === 'boolean') config.traverse.push = traverse.push;
    if (isRecord(traverse.fetch)) config.traverse.fetch = booleanRecord(traverse.fetch);
  }
  if (isRecord(status) && typeof status.extraSpaceBeforeBranchName === 'boolean') {
    config.status = { extraSpaceBeforeBranchName: status.extraSpaceBeforeBranchName };
  }
  if (isRecord(worktree) && typeof worktree.useTopLevelLayoutFile === 'boolean') {
    config.worktree = { useTopLevelLayoutFile: worktree.useTopLevelLayoutFile };
  }
  return ok(config);
}
