import { randomUUID } from 'crypto';
import {
  QuorumUndefinedError,
  ReviewDecision,
  ReviewError,
  ReviewRecord,
  ReviewStatus,
} from '../types';
import { InMemoryReviewStore, ReviewRecordStore } from './review-store';

/**
 * Number of approvals a review needs, given the size of its reviewer group
 */
export type QuorumPolicy = (groupSize: number) => number;

/**
 * Quorum gate for GOVERN-tier proposals. A proposal may only be promoted
 * once isQuorated() is true for its review.
 */
export interface ReviewGraph {
  requestReview(requestingNode: string, action: string, reviewers: string[]): Promise<string>;
  answerReview(reviewId: string, reviewer: string, decision: ReviewDecision): Promise<ReviewRecord>;
  isQuorated(reviewId: string): Promise<boolean>;
  getReview(reviewId: string): Promise<ReviewRecord | null>;
}

/**
 * Build a policy from a `{ groupSize: approvals }` table.
 * Sizes missing from the table throw rather than fall back to a formula.
 */
export function quorumPolicyFromTable(table: Record<number, number>): QuorumPolicy {
  const thresholds = new Map<number, number>();
  for (const [size, required] of Object.entries(table)) {
    thresholds.set(Number(size), required);
  }

  return (groupSize: number) => {
    const required = thresholds.get(groupSize);
    if (required === undefined) {
      throw new QuorumUndefinedError(groupSize);
    }
    return required;
  };
}

/**
 * Derive the overall status: approved at quorum, rejected once the
 * remaining reviewers can no longer reach it.
 */
export function reviewStatus(record: Omit<ReviewRecord, 'status'>): ReviewStatus {
  const answers = Object.values(record.decisions);
  const approvals = answers.filter((d) => d === 'approve').length;
  const rejections = answers.length - approvals;

  if (approvals >= record.requiredApprovals) return 'approve';
  if (record.reviewers.length - rejections < record.requiredApprovals) return 'reject';
  return 'pending';
}

/**
 * Review graph with an explicit reviewer set per review. Records live in
 * the given store; the default keeps them in memory.
 */
export class QuorumReviewGraph implements ReviewGraph {
  constructor(
    private readonly policy: QuorumPolicy,
    private readonly records: ReviewRecordStore = new InMemoryReviewStore()
  ) {}

  async requestReview(requestingNode: string, action: string, reviewers: string[]): Promise<string> {
    const unique = [...new Set(reviewers)];
    if (unique.length === 0) {
      throw new Error('A review needs at least one reviewer');
    }

    const requiredApprovals = this.policy(unique.length);
    if (!Number.isInteger(requiredApprovals) || requiredApprovals < 1 || requiredApprovals > unique.length) {
      throw new Error(
        `Quorum of ${requiredApprovals} is not satisfiable by ${unique.length} reviewer(s)`
      );
    }

    const reviewId = randomUUID();
    await this.records.create({
      reviewId,
      requestingNode,
      action,
      reviewers: unique,
      decisions: {},
      requiredApprovals,
      status: 'pending',
    });

    return reviewId;
  }

  async answerReview(
    reviewId: string,
    reviewer: string,
    decision: ReviewDecision
  ): Promise<ReviewRecord> {
    const updated = await this.records.update(reviewId, (record) => {
      if (!record.reviewers.includes(reviewer)) {
        throw new ReviewError(reviewId, `${reviewer} is not a reviewer`);
      }
      if (record.decisions[reviewer] !== undefined) {
        throw new ReviewError(reviewId, `${reviewer} has already answered`);
      }
      if (record.status !== 'pending') {
        throw new ReviewError(reviewId, `already decided (${record.status})`);
      }

      const decisions = { ...record.decisions, [reviewer]: decision };
      return { ...record, decisions, status: reviewStatus({ ...record, decisions }) };
    });

    if (!updated) {
      throw new ReviewError(reviewId, 'not found');
    }
    return updated;
  }

  async isQuorated(reviewId: string): Promise<boolean> {
    return (await this.records.get(reviewId))?.status === 'approve';
  }

  async getReview(reviewId: string): Promise<ReviewRecord | null> {
    return this.records.get(reviewId);
  }
}
