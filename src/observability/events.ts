import { Classification, PatchResult, Proposal, ProposalState } from '../types';
import { emitEvent } from './telemetry';

/**
 * Governance pipeline events, emitted via OpenTelemetry logs
 */

export function emitClassification(classification: Classification): void {
  emitEvent('governance.classification', {
    'file.path': classification.filePath,
    'tier.rank': classification.tier,
    'tier.label': classification.label,
    matched: classification.matchedRule !== null,
  });
}

export function emitProposalCreated(proposal: Proposal): void {
  emitEvent('governance.proposal_created', {
    'proposal.id': proposal.id,
    'tier.rank': proposal.metadata.tier,
    proposer: proposal.metadata.proposer,
    change_type: proposal.metadata.changeType,
    file_count: proposal.diffs.length,
  });
}

export function emitProposalTransition(params: {
  proposalId: string;
  from: ProposalState;
  to: ProposalState;
  actor: string;
}): void {
  emitEvent('governance.proposal_transition', {
    'proposal.id': params.proposalId,
    from_state: params.from,
    to_state: params.to,
    actor: params.actor,
  });
}

/**
 * Emit governance.patch_applied or governance.patch_failed for one apply attempt
 */
export function emitPatchResult(result: PatchResult, durationMs: number): void {
  if (result.ok) {
    emitEvent('governance.patch_applied', {
      'proposal.id': result.proposalId,
      commit_id: result.commitId ?? '',
      dry_run: result.dryRun,
      duration_ms: durationMs,
    });
    return;
  }

  emitEvent('governance.patch_failed', {
    'proposal.id': result.proposalId,
    stage: result.stage,
    error: result.error,
    retryable: result.retryable,
    timed_out: result.timedOut ?? false,
    exhausted: result.exhausted ?? false,
    duration_ms: durationMs,
  });
}
