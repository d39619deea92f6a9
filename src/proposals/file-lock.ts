import { promises as fsp } from 'fs';
import { isErrnoError } from '../types';

export interface FileLockOptions {
  /** Locks older than this are considered abandoned and broken */
  staleLockMs?: number;
  /** Attempts made while another writer holds the lock */
  lockRetries?: number;
  lockRetryDelayMs?: number;
}

export type LockOutcome<T> = { acquired: true; value: T } | { acquired: false };

/**
 * Advisory lock on a file created with an exclusive open, shared by
 * writers in this process and in others
 */
export class FileLock {
  private readonly staleLockMs: number;
  private readonly lockRetries: number;
  private readonly lockRetryDelayMs: number;

  constructor(
    private readonly label: string,
    options: FileLockOptions = {}
  ) {
    this.staleLockMs = options.staleLockMs ?? 30000;
    this.lockRetries = options.lockRetries ?? 50;
    this.lockRetryDelayMs = options.lockRetryDelayMs ?? 10;
  }

  /**
   * Run fn holding lockPath, polling up to lockRetries times while another
   * writer has it
   */
  async run<T>(lockPath: string, fn: () => Promise<T>): Promise<LockOutcome<T>> {
    for (let attempt = 0; attempt < this.lockRetries; attempt++) {
      if (await this.tryLock(lockPath)) {
        try {
          return { acquired: true, value: await fn() };
        } finally {
          await fsp.rm(lockPath, { force: true });
        }
      }
      await delay(this.lockRetryDelayMs);
    }

    return { acquired: false };
  }

  private async tryLock(lockPath: string, breakStale = true): Promise<boolean> {
    try {
      const handle = await fsp.open(lockPath, 'wx');
      await handle.writeFile(`${process.pid} ${new Date().toISOString()}\n`);
      await handle.close();
      return true;
    } catch (error) {
      if (!isErrnoError(error, 'EEXIST')) throw error;
    }

    if (!breakStale) return false;

    // Locks left behind by a crashed writer are broken once, then retried
    const stat = await fsp.stat(lockPath).catch(() => null);
    if (stat && Date.now() - stat.mtimeMs > this.staleLockMs) {
      console.warn(`[${this.label}] Breaking stale lock ${lockPath}`);
      await fsp.rm(lockPath, { force: true });
      return this.tryLock(lockPath, false);
    }
    return false;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
