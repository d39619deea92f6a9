export type TierLabel = 'GOVERN' | 'INFORM' | 'ALLOW' | 'FREE';

export type TierRank = 1 | 2 | 3 | 4;

export type TierPolicy =
  | 'mandatory_approval'
  | 'log_and_allow'
  | 'allow'
  | 'immediate';

export interface TierDefinition {
  rank: TierRank;
  label: TierLabel;
  policy: TierPolicy;
  reason: string;
}

/**
 * Tiers in evaluation order, highest scrutiny first
 */
export const TIERS: readonly TierDefinition[] = [
  {
    rank: 1,
    label: 'GOVERN',
    policy: 'mandatory_approval',
    reason: 'Quorum approval required before commit',
  },
  {
    rank: 2,
    label: 'INFORM',
    policy: 'log_and_allow',
    reason: 'Log and allow',
  },
  {
    rank: 3,
    label: 'ALLOW',
    policy: 'allow',
    reason: 'Proceed freely',
  },
  {
    rank: 4,
    label: 'FREE',
    policy: 'immediate',
    reason: 'Proceed immediately',
  },
] as const;

export function tierByLabel(label: TierLabel): TierDefinition {
  const tier = TIERS.find((t) => t.label === label);
  if (!tier) {
    throw new Error(`Unknown tier label: ${label}`);
  }
  return tier;
}

export function tierByRank(rank: TierRank): TierDefinition {
  return TIERS[rank - 1];
}

export function isTierRank(value: unknown): value is TierRank {
  return TIERS.some((t) => t.rank === value);
}

export function isTierLabel(value: unknown): value is TierLabel {
  return TIERS.some((t) => t.label === value);
}

export interface TierRule {
  tier: TierLabel;
  /** Case-insensitive regular expression source, matched against /-normalised paths */
  pattern: string;
  reason?: string;
}

export interface Classification {
  tier: TierRank;
  label: TierLabel;
  policy: TierPolicy;
  reason: string;
  filePath: string;
  /** Pattern that matched, or null when the path fell through to the default */
  matchedRule: string | null;
}
