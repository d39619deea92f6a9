import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RepositoryLock } from '../repository-lock';
import { TimeoutError } from '../../types';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('RepositoryLock', () => {
  let root: string;
  let lockPath: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'governance-lock-'));
    lockPath = path.join(root, '.governance', 'apply.lock');
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should place the lock under .governance', async () => {
    let held = false;
    await RepositoryLock.forRepository(root).run(async () => {
      held = fs.existsSync(lockPath);
    });

    expect(held).toBe(true);
    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('should serialize callers across instances', async () => {
    const events: string[] = [];
    const task = (name: string, ms: number) => async () => {
      events.push(`${name} start`);
      await sleep(ms);
      events.push(`${name} end`);
      return name;
    };

    const results = await Promise.all([
      new RepositoryLock(lockPath).run(task('a', 20)),
      new RepositoryLock(lockPath).run(task('b', 0)),
    ]);

    expect(results).toEqual(['a', 'b']);
    expect(events).toEqual(['a start', 'a end', 'b start', 'b end']);
  });

  it('should release the lock when the work throws', async () => {
    const lock = new RepositoryLock(lockPath);

    await expect(
      lock.run(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(fs.existsSync(lockPath)).toBe(false);

    await expect(lock.run(async () => 'next')).resolves.toBe('next');
  });

  it('should time out while another process holds the lock', async () => {
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, '999 elsewhere\n');
    const lock = new RepositoryLock(lockPath, { acquireTimeoutMs: 30, retryDelayMs: 5 });
    const work = jest.fn(async () => undefined);

    const outcome = lock.run(work);

    await expect(outcome).rejects.toThrow(TimeoutError);
    await expect(outcome).rejects.toThrow(`acquire ${path.resolve(lockPath)} timed out after 30ms`);
    expect(work).not.toHaveBeenCalled();
    expect(fs.readFileSync(lockPath, 'utf8')).toBe('999 elsewhere\n');
  });

  it('should remove an abandoned lock file', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    fs.mkdirSync(path.dirname(lockPath), { recursive: true });
    fs.writeFileSync(lockPath, '999 elsewhere\n');
    const anHourAgo = new Date(Date.now() - 60 * 60 * 1000);
    fs.utimesSync(lockPath, anHourAgo, anHourAgo);

    const lock = new RepositoryLock(lockPath, { staleMs: 1000, acquireTimeoutMs: 100 });

    await expect(lock.run(async () => 'done')).resolves.toBe('done');
    expect(warn).toHaveBeenCalledWith(`[RepositoryLock] Removing stale lock ${path.resolve(lockPath)}`);
  });
});
