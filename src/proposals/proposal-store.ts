import { randomBytes } from 'crypto';
import { AuditEntry, NewProposal, Proposal, ProposalState } from '../types';

/**
 * Audit details recorded alongside a transition
 */
export type TransitionAudit = Omit<AuditEntry, 'timestamp' | 'fromState' | 'toState'>;

/**
 * Durable keyed store of proposals and their lifecycle state.
 *
 * transition() is the only way state changes and is an atomic
 * compare-and-set: it succeeds only when the record is currently in `from`.
 * Two callers racing on the same id and `from` state cannot both win, which
 * is what keeps two workers from processing the same proposal. A false
 * result always means the compare failed; a store that cannot get at the
 * record waits a bounded time and then throws.
 */
export interface ProposalStore {
  create(input: NewProposal): Promise<Proposal>;
  get(id: string): Promise<Proposal | null>;
  /** Proposals oldest first, optionally filtered by state */
  list(state?: ProposalState): Promise<Proposal[]>;
  transition(
    id: string,
    from: ProposalState,
    to: ProposalState,
    audit?: TransitionAudit
  ): Promise<boolean>;
  appendAudit(id: string, entry: Omit<AuditEntry, 'timestamp'>): Promise<void>;
  attachReview(id: string, reviewId: string): Promise<void>;
  /** Remove a pending proposal; refuses in any other state */
  delete(id: string): Promise<boolean>;
}

/**
 * Generate a creation-ordered proposal id: a compact UTC timestamp followed
 * by random hex, so lexicographic order matches creation order.
 */
export function generateProposalId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:.]/g, '');
  return `${stamp}-${randomBytes(4).toString('hex')}`;
}

/**
 * Stable ordering for list(): creation time, then id
 */
export function compareProposals(a: Proposal, b: Proposal): number {
  if (a.metadata.createdAt !== b.metadata.createdAt) {
    return a.metadata.createdAt < b.metadata.createdAt ? -1 : 1;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
