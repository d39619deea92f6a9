import {
  InvalidTransitionError,
  Proposal,
  ProposalInputError,
  ProposalNotFoundError,
  ProposalState,
  ReviewDecision,
  ReviewRecord,
  tierByRank,
} from '../types';
import { ProposalStore, TransitionAudit } from '../proposals/proposal-store';
import { ReviewGraph } from '../review/review-graph';
import { PrecedentLookup } from './precedent';
import { emitProposalTransition, recordTransition } from '../observability';

export type ApprovalOutcome =
  | { promoted: true; proposal: Proposal }
  | { promoted: false; reason: string };

export interface ReviewOutcome {
  review: ReviewRecord;
  state: ProposalState;
}

/**
 * Tier-appropriate gate between pending and committed.
 *
 * INFORM/ALLOW proposals pass on request, or on creation when they repeat
 * an applied precedent. GOVERN proposals pass only once their attached
 * review is quorate.
 */
export class ApprovalGate {
  constructor(
    private readonly store: ProposalStore,
    private readonly reviews: ReviewGraph,
    private readonly reviewers: string[],
    private readonly precedents?: PrecedentLookup
  ) {}

  async approve(id: string, actor: string): Promise<ApprovalOutcome> {
    const proposal = await this.requirePending(id, 'committed');

    if (tierByRank(proposal.metadata.tier).policy === 'mandatory_approval') {
      if (!proposal.reviewId) {
        return { promoted: false, reason: 'Quorum review has not been requested' };
      }
      if (!(await this.reviews.isQuorated(proposal.reviewId))) {
        return { promoted: false, reason: `Quorum not reached for review ${proposal.reviewId}` };
      }
    }

    return {
      promoted: true,
      proposal: await this.move(proposal, 'committed', { event: 'approved', actor, outcome: 'success' }),
    };
  }

  /**
   * Promote a freshly created proposal whose tier needs no review.
   * Returns false for GOVERN proposals and for anything no longer pending.
   */
  async autoPromote(id: string): Promise<boolean> {
    const proposal = await this.store.get(id);
    if (!proposal || proposal.state !== 'pending') return false;
    if (tierByRank(proposal.metadata.tier).policy === 'mandatory_approval') return false;

    const moved = await this.store.transition(id, 'pending', 'committed', {
      event: 'auto_approved',
      actor: 'system',
      outcome: 'success',
      detail: `tier ${tierByRank(proposal.metadata.tier).label}`,
    });
    if (moved) this.observe(id, 'pending', 'committed', 'system');
    return moved;
  }

  /**
   * Promote a pending INFORM/ALLOW proposal that repeats an applied one.
   * Without a precedent lookup, or without a match, it stays pending.
   */
  async promoteByPrecedent(id: string): Promise<boolean> {
    if (!this.precedents) return false;

    const proposal = await this.store.get(id);
    if (!proposal || proposal.state !== 'pending') return false;
    if (tierByRank(proposal.metadata.tier).policy === 'mandatory_approval') return false;

    const match = await this.precedents.check(proposal);
    if (match.decision !== 'auto_approve') {
      console.log(`[ApprovalGate] ${id} awaits approval: ${match.reason}`);
      return false;
    }

    const moved = await this.store.transition(id, 'pending', 'committed', {
      event: 'precedent_approved',
      actor: 'system',
      outcome: 'success',
      detail: match.reason,
    });
    if (moved) {
      console.log(`[ApprovalGate] ${id}: pending → committed (${match.reason})`);
      this.observe(id, 'pending', 'committed', 'system');
    }
    return moved;
  }

  /**
   * Attach a quorum review to a GOVERN proposal, using the configured
   * reviewer set. Requesting twice returns the existing review.
   */
  async requestReview(id: string, requestingNode: string): Promise<ReviewRecord> {
    const proposal = await this.requirePending(id, 'committed');

    if (tierByRank(proposal.metadata.tier).policy !== 'mandatory_approval') {
      throw new ProposalInputError(`Proposal ${id} is tier ${proposal.metadata.tier} and needs no review`);
    }

    if (proposal.reviewId) {
      const existing = await this.reviews.getReview(proposal.reviewId);
      if (existing) return existing;
    }

    const reviewId = await this.reviews.requestReview(
      requestingNode,
      `apply proposal ${id}: ${proposal.metadata.summary}`,
      this.reviewers
    );
    await this.store.attachReview(id, reviewId);
    await this.store.appendAudit(id, {
      event: 'review_requested',
      actor: requestingNode,
      outcome: 'info',
      detail: reviewId,
    });

    const review = await this.reviews.getReview(reviewId);
    if (!review) {
      throw new Error(`Review ${reviewId} vanished after creation`);
    }
    return review;
  }

  /**
   * Record one reviewer's answer. Quorum promotes the proposal; a review
   * that can no longer reach quorum rejects it.
   */
  async recordReview(id: string, reviewer: string, decision: ReviewDecision): Promise<ReviewOutcome> {
    const proposal = await this.requirePending(id, 'committed');
    if (!proposal.reviewId) {
      throw new ProposalInputError(`Proposal ${id} has no review to answer`);
    }

    const review = await this.reviews.answerReview(proposal.reviewId, reviewer, decision);
    await this.store.appendAudit(id, {
      event: 'review_answered',
      actor: reviewer,
      outcome: 'info',
      detail: decision,
    });

    if (review.status === 'approve') {
      await this.move(proposal, 'committed', {
        event: 'approved',
        actor: reviewer,
        outcome: 'success',
        detail: `quorum reached (${review.requiredApprovals} of ${review.reviewers.length})`,
      });
      return { review, state: 'committed' };
    }

    if (review.status === 'reject') {
      await this.move(proposal, 'rejected', {
        event: 'rejected',
        actor: reviewer,
        outcome: 'info',
        detail: 'quorum can no longer be reached',
      });
      return { review, state: 'rejected' };
    }

    return { review, state: 'pending' };
  }

  async reject(id: string, actor: string, reason: string): Promise<Proposal> {
    const proposal = await this.requirePending(id, 'rejected');
    return this.move(proposal, 'rejected', {
      event: 'rejected',
      actor,
      outcome: 'info',
      detail: reason,
    });
  }

  private async requirePending(id: string, target: ProposalState): Promise<Proposal> {
    const proposal = await this.store.get(id);
    if (!proposal) {
      throw new ProposalNotFoundError(id);
    }
    if (proposal.state !== 'pending') {
      throw new InvalidTransitionError(id, proposal.state, target);
    }
    return proposal;
  }

  private async move(proposal: Proposal, to: ProposalState, audit: TransitionAudit): Promise<Proposal> {
    const moved = await this.store.transition(proposal.id, 'pending', to, audit);
    const current = await this.store.get(proposal.id);
    if (!current) {
      throw new ProposalNotFoundError(proposal.id);
    }
    if (!moved) {
      // Another caller moved it first
      throw new InvalidTransitionError(proposal.id, current.state, to);
    }

    console.log(`[ApprovalGate] ${proposal.id}: pending → ${to} (${audit.event} by ${audit.actor})`);
    this.observe(proposal.id, 'pending', to, audit.actor);
    return current;
  }

  private observe(id: string, from: ProposalState, to: ProposalState, actor: string): void {
    emitProposalTransition({ proposalId: id, from, to, actor });
    recordTransition(to);
  }
}
