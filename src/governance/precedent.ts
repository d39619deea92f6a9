import { createHash } from 'crypto';
import { Proposal, TierRank } from '../types';
import { ProposalStore } from '../proposals/proposal-store';

/** Share of significant words two summaries must have in common */
export const PATTERN_MATCH_THRESHOLD = 0.6;

const STOP_WORDS = new Set([
  'a', 'an', 'the', 'and', 'or', 'for', 'to', 'of', 'in', 'on',
  'with', 'is', 'are', 'was', 'be', 'by', 'at', 'from', 'this',
  'that', 'new', 'add', 'adds', 'update', 'updates', 'fix', 'fixes',
]);

export interface PrecedentCandidate {
  changeType: string;
  tier: TierRank;
  summary: string;
}

export type PrecedentMatch =
  | { decision: 'auto_approve'; matchedProposal: string; confidence: number; reason: string }
  | { decision: 'halt'; matchedProposal: null; confidence: 0; reason: string };

/**
 * Significant words of a summary: lower-cased alphanumeric runs longer than
 * two characters, stop words removed
 */
export function summaryTokens(text: string): Set<string> {
  const words = text.toLowerCase().replace(/[^a-z0-9]/g, ' ').split(/\s+/);
  return new Set(words.filter((w) => w.length > 2 && !STOP_WORDS.has(w)));
}

/**
 * Shared significant words over the size of the smaller set; 0 when either
 * summary has none
 */
export function wordOverlap(a: string, b: string): number {
  const ta = summaryTokens(a);
  const tb = summaryTokens(b);
  if (ta.size === 0 || tb.size === 0) return 0;

  let shared = 0;
  for (const word of ta) {
    if (tb.has(word)) shared++;
  }
  return shared / Math.min(ta.size, tb.size);
}

export function precedentKey(candidate: PrecedentCandidate): string {
  const key = `${candidate.changeType}|${candidate.tier}|${candidate.summary}`.toLowerCase().trim();
  return createHash('sha256').update(key).digest('hex').slice(0, 16);
}

/**
 * Look for an applied proposal the candidate repeats.
 *
 * An exact key match (type, tier and summary, ignoring case) wins outright.
 * Otherwise the applied proposal of the same type and tier with the highest
 * word overlap is taken when it reaches the threshold.
 */
export function findPrecedent(
  candidate: PrecedentCandidate,
  ledger: Proposal[],
  threshold = PATTERN_MATCH_THRESHOLD
): PrecedentMatch {
  const key = precedentKey(candidate);
  for (const prior of ledger) {
    if (precedentKey(prior.metadata) === key) {
      return {
        decision: 'auto_approve',
        matchedProposal: prior.id,
        confidence: 1,
        reason: `Exact match: ${prior.id} (key ${key})`,
      };
    }
  }

  const changeType = candidate.changeType.trim().toLowerCase();
  let best: { id: string; overlap: number } | null = null;

  for (const prior of ledger) {
    if (prior.metadata.changeType.trim().toLowerCase() !== changeType) continue;
    if (prior.metadata.tier !== candidate.tier) continue;

    const overlap = wordOverlap(candidate.summary, prior.metadata.summary);
    if (!best || overlap > best.overlap) {
      best = { id: prior.id, overlap };
    }
  }

  if (best && best.overlap >= threshold) {
    return {
      decision: 'auto_approve',
      matchedProposal: best.id,
      confidence: Math.round(best.overlap * 1000) / 1000,
      reason:
        `Pattern match: ${best.id} (type=${candidate.changeType}, tier=${candidate.tier}, ` +
        `overlap=${(best.overlap * 100).toFixed(1)}%)`,
    };
  }

  return {
    decision: 'halt',
    matchedProposal: null,
    confidence: 0,
    reason: `No precedent for type '${candidate.changeType}' at tier ${candidate.tier}`,
  };
}

/**
 * Precedent lookup against the applied proposals of the same repository
 */
export class PrecedentLookup {
  constructor(
    private readonly store: ProposalStore,
    private readonly threshold = PATTERN_MATCH_THRESHOLD
  ) {}

  async check(proposal: Proposal): Promise<PrecedentMatch> {
    const applied = await this.store.list('applied');
    const ledger = applied.filter((p) => p.id !== proposal.id && p.repositoryRoot === proposal.repositoryRoot);
    return findPrecedent(proposal.metadata, ledger, this.threshold);
  }
}
