import { PROPOSAL_TRANSITIONS, isAllowedTransition, isTerminal } from './lifecycle';
import { PROPOSAL_STATES } from '../types';

describe('proposal lifecycle', () => {
  it.each([
    ['pending', 'committed'],
    ['pending', 'rejected'],
    ['committed', 'applied'],
    ['committed', 'failed'],
  ] as const)('should allow %s -> %s', (from, to) => {
    expect(isAllowedTransition(from, to)).toBe(true);
  });

  it.each([
    ['pending', 'applied'],
    ['committed', 'pending'],
    ['applied', 'committed'],
    ['failed', 'committed'],
    ['rejected', 'pending'],
  ] as const)('should refuse %s -> %s', (from, to) => {
    expect(isAllowedTransition(from, to)).toBe(false);
  });

  it('should treat applied, failed and rejected as terminal', () => {
    expect(PROPOSAL_STATES.filter(isTerminal)).toEqual(['applied', 'failed', 'rejected']);
  });

  it('should define edges for every state', () => {
    expect(Object.keys(PROPOSAL_TRANSITIONS).sort()).toEqual([...PROPOSAL_STATES].sort());
  });
});
