/**
 * Configuration management - reads from git config, .arbor.json and the environment
 * Uses neverthrow Result types for error handling
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Result, ResultAsync } from 'neverthrow';
import type { GitQueryFacade } from '../git/facade.js';
import { StackErrors, stackOk, type StackResult } from '../stack/errors.js';
import type { SquashMergeDetection } from '../stack/types.js';
import {
  type ArborConfig,
  type RunConfig,
  DEFAULT_CONFIG,
  isSquashMergeDetection,
  mergeConfigs,
  parseConfig,
} from './schema.js';

export const CONFIG_FILE_NAME = '.arbor.json';

/**
 * Git config keys under the `arbor.` section
 */
export const GitConfigKeys = {
  squashMergeDetection: 'arbor.squashMergeDetection',
  traversePush: 'arbor.traverse.push',
  traverseFetch: (remote: string) => `arbor.traverse.fetch.${remote}`,
  statusExtraSpace: 'arbor.status.extraSpaceBeforeBranchName',
  useTopLevelLayoutFile: 'arbor.worktree.useTopLevelLayoutFile',
  overrideForkPointTo: (branch: string) => `arbor.overrideForkPoint.${branch}.to`,
};

export function parseGitBoolean(value: string): boolean | null {
  switch (value.trim().toLowerCase()) {
    case 'true':
    case 'yes':
    case 'on':
    case '1':
      return true;
    case 'false':
    case 'no':
    case 'off':
    case '0':
    case '':
      return false;
    default:
      return null;
  }
}

/**
 * Command-line flags that feed the run configuration
 */
export interface RunFlags {
  debug?: boolean;
  verbose?: boolean;
  yes?: boolean;
  asciiOnly?: boolean;
  squashMergeDetection?: SquashMergeDetection;
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(
    private readonly git: Pick<GitQueryFacade, 'configGetRegexp'>,
    repoRoot: string
  ) {
    this.configPath = join(repoRoot, CONFIG_FILE_NAME);
  }

  /**
   * Load configuration from both git config and JSON file
   */
  async load(): Promise<StackResult<ArborConfig>> {
    const gitConfig = await this.loadFromGitConfig();
    if (gitConfig.isErr()) return gitConfig;
    const fileConfig = await this.loadFromFile();
    if (fileConfig.isErr()) return fileConfig;

    // file config overrides git config
    return stackOk(mergeConfigs(mergeConfigs(DEFAULT_CONFIG, gitConfig.value), fileConfig.value));
  }

  /**
   * Load configuration from `arbor.*` git config entries
   */
  private async loadFromGitConfig(): Promise<StackResult<ArborConfig>> {
    const config: ArborConfig = {};
    const problems: string[] = [];
    const fetchPrefix = 'arbor.traverse.fetch.';

    // git prints section and variable names lowercased
    for (const [key, value] of await this.git.configGetRegexp('^arbor\\.')) {
      const lower = key.toLowerCase();
      if (lower === GitConfigKeys.squashMergeDetection.toLowerCase()) {
        if (isSquashMergeDetection(value)) {
          config.squashMergeDetection = value;
        } else {
          problems.push(`${key}: expected one of none, simple, exact; got '${value}'`);
        }
        continue;
      }

      const flag = parseGitBoolean(value);
      if (lower === GitConfigKeys.traversePush.toLowerCase()) {
        if (flag === null) problems.push(`${key}: expected a boolean; got '${value}'`);
        else config.traverse = { ...config.traverse, push: flag };
      } else if (lower.startsWith(fetchPrefix)) {
        if (flag === null) problems.push(`${key}: expected a boolean; got '${value}'`);
        else {
          const remote = key.slice(fetchPrefix.length);
          config.traverse = { ...config.traverse, fetch: { ...config.traverse?.fetch, [remote]: flag } };
        }
      } else if (lower === GitConfigKeys.statusExtraSpace.toLowerCase()) {
        if (flag === null) problems.push(`${key}: expected a boolean; got '${value}'`);
        else config.status = { extraSpaceBeforeBranchName: flag };
      } else if (lower === GitConfigKeys.useTopLevelLayoutFile.toLowerCase()) {
        if (flag === null) problems.push(`${key}: expected a boolean; got '${value}'`);
        else config.worktree = { useTopLevelLayoutFile: flag };
      }
    }

    if (problems.length > 0) {
      return StackErrors.configError(problems.join('; '));
    }
    return stackOk(config);
  }

  /**
   * Load configuration from .arbor.json
   */
  private async loadFromFile(): Promise<StackResult<ArborConfig>> {
    if (!existsSync(this.configPath)) {
      return stackOk({});
    }

    const content = await ResultAsync.fromPromise(readFile(this.configPath, 'utf8'), (e) =>
      e instanceof Error ? e.message : String(e)
    );
    if (content.isErr()) {
      return StackErrors.configError(`failed to read ${CONFIG_FILE_NAME}: ${content.error}`);
    }

    const parsed = Result.fromThrowable(
      (text: string): unknown => JSON.parse(text),
      (e) => (e instanceof Error ? e.message : String(e))
    )(content.value);
    if (parsed.isErr()) {
      return StackErrors.configError(`failed to parse ${CONFIG_FILE_NAME}: ${parsed.error}`);
    }

    return parseConfig(parsed.value).match(
      (config) => stackOk(config),
      (problems) => StackErrors.configError(`${CONFIG_FILE_NAME}: ${problems.join('; ')}`)
    );
  }
}

function envFlag(value: string | undefined): boolean {
  return value !== undefined && parseGitBoolean(value) === true;
}

/**
 * Build the run configuration from loaded settings, environment and flags
 * (flags win over environment, environment over settings)
 */
export function buildRunConfig(
  config: ArborConfig,
  flags: RunFlags,
  env: NodeJS.ProcessEnv,
  isTTY: boolean
): RunConfig {
  return {
    debug: flags.debug ?? envFlag(env.ARBOR_DEBUG),
    verbose: flags.verbose ?? false,
    asciiOnly: flags.asciiOnly ?? envFlag(env.ASCII_ONLY),
    colors: isTTY && !env.NO_COLOR,
    yes: flags.yes ?? false,
    squashMergeDetection:
      flags.squashMergeDetection ??
      config.squashMergeDetection ??
      DEFAULT_CONFIG.squashMergeDetection ??
      'simple',
    pushByDefault: config.traverse?.push ?? true,
    extraSpaceBeforeBranchName: config.status?.extraSpaceBeforeBranchName ?? false,
    useTopLevelLayoutFile: config.worktree?.useTopLevelLayoutFile ?? true,
    fetchRemotes: { ...config.traverse?.fetch },
  };
}
