/**
 * Low-level git command wrappers using neverthrow Result types
 */

import { spawn } from 'node:child_process';
import { Result, ok, err } from 'neverthrow';
import { GitError, type Repository } from './types.js';

export type GitResult<T> = Result<T, GitError>;

export interface GitExecOptions {
  cwd?: string;
  /** Written to the process' stdin, which is closed afterwards */
  input?: string;
  /** Hand the terminal over to git (interactive rebase, merge message editor) */
  interactive?: boolean;
}

export class GitOperations {
  /**
   * Execute a git command and collect its output
   */
  static exec(
    args: string[],
    options: GitExecOptions = {}
  ): Promise<{ stdout: string; stderr: string; exitCode: number }> {
    return new Promise((resolve) => {
      const proc = spawn('git', args, {
        cwd: options.cwd || process.cwd(),
        stdio: options.interactive ? 'inherit' : ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      proc.stdout?.setEncoding('utf8');
      proc.stderr?.setEncoding('utf8');
      proc.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      proc.on('error', (error) => {
        resolve({ stdout, stderr: stderr || error.message, exitCode: 127 });
      });
      proc.on('close', (code) => {
        resolve({ stdout, stderr, exitCode: code ?? 1 });
      });

      if (proc.stdin) {
        if (options.input !== undefined) {
          proc.stdin.write(options.input);
        }
        proc.stdin.end();
      }
    });
  }

  /**
   * Execute a git command and return Result
   */
  static async execResult(args: string[], options: GitExecOptions = {}): Promise<GitResult<string>> {
    const result = await this.exec(args, options);
    if (result.exitCode !== 0) {
      return err(
        new GitError(
          result.stderr.trim() || 'Git command failed',
          `git ${args.join(' ')}`,
          result.exitCode
        )
      );
    }
    return ok(result.stdout.trim());
  }

  /**
   * Check if we're in a git repository
   */
  static async isGitRepository(cwd?: string): Promise<boolean> {
    const result = await this.execResult(['rev-parse', '--git-dir'], { cwd });
    return result.isOk();
  }

  /**
   * Get the working tree root plus the worktree-local and shared git directories
   */
  static async getRepository(cwd?: string): Promise<GitResult<Repository>> {
    const result = await this.execResult(
      ['rev-parse', '--path-format=absolute', '--show-toplevel', '--git-dir', '--git-common-dir'],
      { cwd }
    );
    return result.andThen((output) => {
      const [root, gitDir, commonDir] = output.split('\n');
      if (!root || !gitDir || !commonDir) {
        return err(new GitError('Unexpected rev-parse output', 'git rev-parse', 1));
      }
      return ok({ root, gitDir, commonDir });
    });
  }
}
