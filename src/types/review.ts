export type ReviewDecision = 'approve' | 'reject';

export type ReviewStatus = ReviewDecision | 'pending';

export interface ReviewRecord {
  reviewId: string;
  requestingNode: string;
  action: string;
  reviewers: string[];
  decisions: Record<string, ReviewDecision>;
  requiredApprovals: number;
  status: ReviewStatus;
}
