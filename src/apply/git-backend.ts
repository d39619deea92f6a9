import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { TimeoutError, errorMessage } from '../types';
import { CommitRequest, PatchCheck, VcsBackend } from './vcs-backend';

const execFileAsync = promisify(execFile);

export interface GitBackendOptions {
  /** Per-command timeout; the git process is killed on expiry */
  timeoutMs: number;
}

/**
 * Error from a git command that exited non-zero
 */
export class GitCommandError extends Error {
  constructor(
    readonly args: string[],
    readonly stderr: string
  ) {
    super(`git ${args[0]} failed: ${stderr.trim() || 'unknown error'}`);
    this.name = 'GitCommandError';
  }
}

/**
 * VcsBackend over the git executable. Patches go to `git apply` on stdin.
 */
export class GitBackend implements VcsBackend {
  constructor(
    private readonly repositoryRoot: string,
    private readonly options: GitBackendOptions
  ) {}

  async validatePatch(patch: string): Promise<PatchCheck> {
    try {
      await this.git(['apply', '--check', '-'], patch);
      return { ok: true };
    } catch (error) {
      if (error instanceof GitCommandError) {
        return { ok: false, message: error.stderr.trim() || error.message };
      }
      throw error;
    }
  }

  async applyPatch(patch: string): Promise<void> {
    await this.git(['apply', '-'], patch);
  }

  async commit(request: CommitRequest): Promise<string> {
    if (request.paths.length === 0) {
      throw new Error('Nothing to commit: no paths given');
    }

    await this.git(['add', '--', ...request.paths]);

    // Pathspec keeps anything else already staged out of the commit
    await this.git(['commit', '-m', request.message, '--', ...request.paths]);

    const head = await this.git(['rev-parse', 'HEAD']);
    return head.trim();
  }

  private async git(args: string[], input?: string): Promise<string> {
    const pending = execFileAsync('git', args, {
      cwd: this.repositoryRoot,
      timeout: this.options.timeoutMs,
      maxBuffer: 16 * 1024 * 1024,
    });
    pending.child.stdin?.end(input ?? '');

    try {
      const { stdout } = await pending;
      return stdout;
    } catch (error) {
      if (isKilled(error)) {
        throw new TimeoutError(`git ${args[0]}`, this.options.timeoutMs);
      }
      throw new GitCommandError(args, stderrOf(error));
    }
  }
}

function isKilled(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'killed' in error && error.killed === true;
}

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr || errorMessage(error);
  }
  return errorMessage(error);
}
