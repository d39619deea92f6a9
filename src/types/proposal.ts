import { TierRank } from './tier';

export type ProposalState =
  | 'pending'
  | 'committed'
  | 'applied'
  | 'failed'
  | 'rejected';

export const PROPOSAL_STATES: readonly ProposalState[] = [
  'pending',
  'committed',
  'applied',
  'failed',
  'rejected',
];

export function isProposalState(value: unknown): value is ProposalState {
  return PROPOSAL_STATES.some((s) => s === value);
}

export interface FileDiff {
  /** Repository-relative path, / separated */
  path: string;
  /** Unified diff for this file only */
  diff: string;
}

export interface ProposalMetadata {
  proposer: string;
  summary: string;
  changeType: string;
  createdAt: string;
  tier: TierRank;
}

export type AuditOutcome = 'success' | 'failure' | 'info';

export interface AuditEntry {
  timestamp: string;
  event: string;
  actor: string;
  outcome: AuditOutcome;
  fromState?: ProposalState;
  toState?: ProposalState;
  detail?: string;
}

export interface Proposal {
  id: string;
  repositoryRoot: string;
  diffs: FileDiff[];
  metadata: ProposalMetadata;
  state: ProposalState;
  reviewId?: string;
  auditTrail: AuditEntry[];
}

export interface NewProposal {
  repositoryRoot: string;
  diffs: FileDiff[];
  proposer: string;
  summary: string;
  changeType: string;
  tier: TierRank;
}
