import { promises as fsp } from 'fs';
import * as path from 'path';
import { TimeoutError, isErrnoError } from '../types';

export interface RepositoryLockOptions {
  /** How long to wait for another process to release the lock file */
  acquireTimeoutMs?: number;
  /** Lock files older than this are treated as abandoned */
  staleMs?: number;
  retryDelayMs?: number;
}

// One chain per lock file, shared by every RepositoryLock in this process
const queues = new Map<string, Promise<void>>();

/**
 * Serializes apply operations against one working tree.
 *
 * Callers in this process queue on a promise chain; other processes are
 * excluded by an exclusively created lock file.
 */
export class RepositoryLock {
  private readonly lockPath: string;
  private readonly acquireTimeoutMs: number;
  private readonly staleMs: number;
  private readonly retryDelayMs: number;

  constructor(lockPath: string, options: RepositoryLockOptions = {}) {
    this.lockPath = path.resolve(lockPath);
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? 60000;
    this.staleMs = options.staleMs ?? 10 * 60 * 1000;
    this.retryDelayMs = options.retryDelayMs ?? 100;
  }

  /**
   * Lock file used for a repository: `<root>/.governance/apply.lock`
   */
  static forRepository(repositoryRoot: string, options?: RepositoryLockOptions): RepositoryLock {
    return new RepositoryLock(path.join(repositoryRoot, '.governance', 'apply.lock'), options);
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const previous = queues.get(this.lockPath) ?? Promise.resolve();
    const current = previous.then(() => this.withFileLock(fn));
    // The chain only orders callers; each caller sees its own outcome
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    queues.set(this.lockPath, tail);

    try {
      return await current;
    } finally {
      if (queues.get(this.lockPath) === tail) {
        queues.delete(this.lockPath);
      }
    }
  }

  private async withFileLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await fsp.rm(this.lockPath, { force: true });
    }
  }

  private async acquire(): Promise<void> {
    await fsp.mkdir(path.dirname(this.lockPath), { recursive: true });
    const deadline = Date.now() + this.acquireTimeoutMs;

    for (;;) {
      try {
        const handle = await fsp.open(this.lockPath, 'wx');
        await handle.writeFile(`${process.pid} ${new Date().toISOString()}\n`);
        await handle.close();
        return;
      } catch (error) {
        if (!isErrnoError(error, 'EEXIST')) throw error;
      }

      const stat = await fsp.stat(this.lockPath).catch(() => null);
      if (stat && Date.now() - stat.mtimeMs > this.staleMs) {
        console.warn(`[RepositoryLock] Removing stale lock ${this.lockPath}`);
        await fsp.rm(this.lockPath, { force: true });
        continue;
      }

      if (Date.now() >= deadline) {
        throw new TimeoutError(`acquire ${this.lockPath}`, this.acquireTimeoutMs);
      }
      await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
    }
  }
}
