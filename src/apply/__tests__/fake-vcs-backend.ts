import { applyPatch, checkPatch } from '../../diff/unified-patch';
import { CommitRequest, PatchCheck, VcsBackend } from '../vcs-backend';

type Step = 'validate' | 'apply' | 'commit';

export interface FakeCommit {
  id: string;
  paths: string[];
  message: string;
}

/**
 * In-memory working tree for apply tests. Failures and hangs can be
 * injected per step.
 */
export class FakeVcsBackend implements VcsBackend {
  files: Map<string, string>;
  readonly commits: FakeCommit[] = [];
  readonly calls: Step[] = [];

  private failures = new Map<Step, string[]>();
  private hanging = new Set<Step>();

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files));
  }

  failNext(step: Step, message: string): void {
    const queue = this.failures.get(step) ?? [];
    queue.push(message);
    this.failures.set(step, queue);
  }

  hang(step: Step): void {
    this.hanging.add(step);
  }

  async validatePatch(patch: string): Promise<PatchCheck> {
    await this.enter('validate');
    const injected = this.takeFailure('validate');
    if (injected) return { ok: false, message: injected };

    const result = checkPatch(this.files, patch);
    return result.ok ? { ok: true } : { ok: false, message: result.message };
  }

  async applyPatch(patch: string): Promise<void> {
    await this.enter('apply');
    const injected = this.takeFailure('apply');
    if (injected) throw new Error(injected);

    this.files = applyPatch(this.files, patch);
  }

  async commit(request: CommitRequest): Promise<string> {
    await this.enter('commit');
    const injected = this.takeFailure('commit');
    if (injected) throw new Error(injected);

    const id = `commit-${this.commits.length + 1}`;
    this.commits.push({ id, paths: [...request.paths], message: request.message });
    return id;
  }

  private async enter(step: Step): Promise<void> {
    this.calls.push(step);
    if (this.hanging.has(step)) {
      await new Promise<never>(() => undefined);
    }
  }

  private takeFailure(step: Step): string | undefined {
    return this.failures.get(step)?.shift();
  }
}
