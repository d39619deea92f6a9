import * as path from 'path';
import {
  BatchResult,
  PatchErrorKind,
  PatchFailure,
  PatchResult,
  PatchStage,
  Proposal,
  TimeoutError,
  errorMessage,
} from '../types';
import { ProposalStore } from '../proposals/proposal-store';
import { combineDiffs } from '../proposals/proposal-document';
import { patchPaths } from '../diff/unified-patch';
import { emitPatchResult, emitProposalTransition, recordPatch, recordTransition } from '../observability';
import { RepositoryLock } from './repository-lock';
import { VcsBackend } from './vcs-backend';
import { withTimeout } from './with-timeout';

export interface PatchApplierOptions {
  /** Working tree the backend writes to; proposals for other trees are refused */
  repositoryRoot: string;
  /** Failed attempts after which a proposal moves to failed */
  maxAttempts: number;
  /** Bound on each external step (validate, apply, commit) */
  timeoutMs: number;
  /** Co-Authored-By trailer value */
  coAuthor: string;
  /** Serializes apply against the working tree */
  lock: RepositoryLock;
  /** Actor recorded in audit entries */
  actor?: string;
}

export interface ApplyOptions {
  dryRun?: boolean;
}

const FAILED_ATTEMPT_EVENT = 'apply_failed';

/**
 * Build the commit message for an applied proposal
 */
export function buildCommitMessage(proposal: Proposal, coAuthor: string): string {
  const { metadata } = proposal;
  return [
    metadata.summary,
    '',
    `Proposed by: ${metadata.proposer}`,
    `Proposal ID: ${proposal.id}`,
    `Change type: ${metadata.changeType}`,
    '',
    `Co-Authored-By: ${coAuthor}`,
  ].join('\n');
}

/**
 * Applies committed proposals to the working tree and records the outcome.
 *
 * Pipeline failures are returned as PatchResult, never thrown. Each one is
 * written to the audit trail; the proposal stays committed until the retry
 * budget runs out and then moves to failed. Working-tree edits made before a
 * failed commit are left in place for manual cleanup.
 */
export class PatchApplier {
  private readonly actor: string;
  private readonly repositoryRoot: string;

  constructor(
    private readonly store: ProposalStore,
    private readonly vcs: VcsBackend,
    private readonly options: PatchApplierOptions
  ) {
    this.actor = options.actor ?? 'patch-applier';
    this.repositoryRoot = path.resolve(options.repositoryRoot);
  }

  async apply(proposalOrId: Proposal | string, options: ApplyOptions = {}): Promise<PatchResult> {
    const id = typeof proposalOrId === 'string' ? proposalOrId : proposalOrId.id;
    const started = Date.now();

    const result = await this.options.lock.run(() => this.applyLocked(id, options.dryRun ?? false));

    const durationMs = Date.now() - started;
    emitPatchResult(result, durationMs);
    recordPatch(result, durationMs);
    return result;
  }

  /**
   * Apply every committed proposal for this repository, oldest first.
   * Failures do not stop the batch.
   */
  async applyAll(options: ApplyOptions = {}): Promise<BatchResult> {
    const committed = (await this.store.list('committed')).filter((p) => this.targetsThisRepository(p));
    const batch: BatchResult = { applied: 0, failed: 0, results: [] };

    for (const proposal of committed) {
      const result = await this.apply(proposal.id, options);
      batch.results.push(result);
      if (result.ok) {
        batch.applied++;
      } else {
        batch.failed++;
      }
    }

    if (committed.length > 0) {
      console.log(`[PatchApplier] Batch complete: ${batch.applied} applied, ${batch.failed} failed`);
    }
    return batch;
  }

  private async applyLocked(id: string, dryRun: boolean): Promise<PatchResult> {
    // Re-read under the lock: the caller's copy may be stale
    const proposal = await this.store.get(id);
    if (!proposal) {
      return stateFailure(id, 'ProposalNotFound', `Proposal not found: ${id}`);
    }
    if (proposal.state !== 'committed') {
      return stateFailure(
        id,
        'InvalidTransition',
        `Proposal ${id} is ${proposal.state}; only committed proposals can be applied`
      );
    }
    if (!this.targetsThisRepository(proposal)) {
      return stateFailure(
        id,
        'RepositoryMismatch',
        `Proposal ${id} targets ${proposal.repositoryRoot}, not ${this.repositoryRoot}`
      );
    }

    const patch = combineDiffs(proposal.diffs);
    const { timeoutMs } = this.options;

    try {
      const check = await withTimeout('validate patch', timeoutMs, () => this.vcs.validatePatch(patch));
      if (!check.ok) {
        return this.fail(proposal, 'validation', 'PatchValidationFailed', check.message, false, dryRun);
      }
    } catch (error) {
      return this.failFromError(proposal, 'validation', 'PatchValidationFailed', error, dryRun);
    }

    if (dryRun) {
      console.log(`[PatchApplier] Dry run: ${id} would apply cleanly`);
      return { ok: true, proposalId: id, commitId: null, dryRun: true };
    }

    try {
      await withTimeout('apply patch', timeoutMs, () => this.vcs.applyPatch(patch));
    } catch (error) {
      return this.failFromError(proposal, 'apply', 'PatchApplyFailed', error, false);
    }

    let commitId: string;
    try {
      commitId = await withTimeout('commit', timeoutMs, () =>
        this.vcs.commit({
          paths: patchPaths(patch),
          message: buildCommitMessage(proposal, this.options.coAuthor),
        })
      );
    } catch (error) {
      console.warn(
        `[PatchApplier] Commit failed for ${id} after the patch was applied; the working tree needs manual cleanup`
      );
      return this.failFromError(proposal, 'commit', 'CommitFailed', error, false);
    }

    let moved: boolean;
    try {
      moved = await this.store.transition(id, 'committed', 'applied', {
        event: 'applied',
        actor: this.actor,
        outcome: 'success',
        detail: commitId,
      });
    } catch (error) {
      console.error(`[PatchApplier] ${id} was committed as ${commitId} but its state could not be recorded:`, error);
      return stateFailure(
        id,
        'InvalidTransition',
        `Proposal ${id} was committed as ${commitId} but could not be marked applied: ${errorMessage(error)}`
      );
    }
    if (!moved) {
      console.error(`[PatchApplier] ${id} was committed as ${commitId} but left the committed state meanwhile`);
      return stateFailure(id, 'InvalidTransition', `Proposal ${id} changed state during apply (commit ${commitId})`);
    }

    console.log(`[PatchApplier] Applied ${id} as ${commitId}`);
    emitProposalTransition({ proposalId: id, from: 'committed', to: 'applied', actor: this.actor });
    recordTransition('applied');
    return { ok: true, proposalId: id, commitId, dryRun: false };
  }

  private async failFromError(
    proposal: Proposal,
    stage: PatchStage,
    kind: PatchErrorKind,
    error: unknown,
    dryRun: boolean
  ): Promise<PatchFailure> {
    const message = errorMessage(error);
    return this.fail(proposal, stage, kind, message, error instanceof TimeoutError, dryRun);
  }

  /**
   * Record a failed attempt. Dry runs are reported only; they neither touch
   * the audit trail nor count against the retry budget.
   */
  private async fail(
    proposal: Proposal,
    stage: PatchStage,
    kind: PatchErrorKind,
    message: string,
    timedOut: boolean,
    dryRun: boolean
  ): Promise<PatchFailure> {
    const failure: PatchFailure = {
      ok: false,
      proposalId: proposal.id,
      stage,
      error: kind,
      message,
      retryable: true,
      ...(timedOut ? { timedOut: true } : {}),
    };

    console.warn(`[PatchApplier] ${proposal.id} failed at ${stage}: ${message}`);
    if (dryRun) return failure;

    try {
      return await this.recordFailure(proposal, failure);
    } catch (error) {
      console.error(`[PatchApplier] Could not record failed attempt for ${proposal.id}:`, error);
      return failure;
    }
  }

  /**
   * Audit a failed attempt and move the proposal to failed once the retry
   * budget is used up
   */
  private async recordFailure(proposal: Proposal, failure: PatchFailure): Promise<PatchFailure> {
    const { stage, error: kind, message, timedOut } = failure;

    await this.store.appendAudit(proposal.id, {
      event: FAILED_ATTEMPT_EVENT,
      actor: this.actor,
      outcome: 'failure',
      detail: `${kind} at ${stage}${timedOut ? ' (timed out)' : ''}: ${message}`,
    });

    const attempts =
      proposal.auditTrail.filter((entry) => entry.event === FAILED_ATTEMPT_EVENT).length + 1;
    if (attempts < this.options.maxAttempts) {
      return failure;
    }

    const moved = await this.store.transition(proposal.id, 'committed', 'failed', {
      event: 'retry_budget_exhausted',
      actor: this.actor,
      outcome: 'failure',
      detail: `${attempts} failed attempt(s)`,
    });
    if (!moved) return failure;

    console.error(`[PatchApplier] ${proposal.id} moved to failed after ${attempts} attempt(s)`);
    emitProposalTransition({ proposalId: proposal.id, from: 'committed', to: 'failed', actor: this.actor });
    recordTransition('failed');

    return {
      ...failure,
      error: 'RetryBudgetExhausted',
      message: `${message} (retry budget of ${this.options.maxAttempts} attempt(s) exhausted)`,
      retryable: false,
      exhausted: true,
    };
  }

  private targetsThisRepository(proposal: Proposal): boolean {
    return path.resolve(proposal.repositoryRoot) === this.repositoryRoot;
  }
}

function stateFailure(
  proposalId: string,
  kind: 'ProposalNotFound' | 'InvalidTransition' | 'RepositoryMismatch',
  message: string
): PatchFailure {
  return { ok: false, proposalId, stage: 'state', error: kind, message, retryable: false };
}
