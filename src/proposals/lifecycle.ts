import { ProposalState } from '../types';

/**
 * Allowed lifecycle edges. Terminal states have no outgoing edges and no
 * edge leads back to an earlier state.
 */
export const PROPOSAL_TRANSITIONS: Readonly<Record<ProposalState, readonly ProposalState[]>> = {
  pending: ['committed', 'rejected'],
  committed: ['applied', 'failed'],
  applied: [],
  failed: [],
  rejected: [],
};

export function isAllowedTransition(from: ProposalState, to: ProposalState): boolean {
  return PROPOSAL_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: ProposalState): boolean {
  return PROPOSAL_TRANSITIONS[state].length === 0;
}
