import { TierRule } from './tier';

export interface GovernanceConfig {
  /** Absolute path of the governed repository */
  repositoryRoot: string;

  /** Ordered tier rules; evaluation order is GOVERN → FREE regardless of file order */
  tiers: TierRule[];

  review: {
    reviewers: string[];
    /** Group size → approvals required. Sizes not listed have no quorum. */
    quorum: Record<number, number>;
  };

  apply: {
    maxAttempts: number;
    timeoutMs: number;
    coAuthor: string;
  };

  proposals: {
    /** Directory for the file store, relative to repositoryRoot unless absolute */
    directory: string;
    /** Promote INFORM/ALLOW proposals to committed on creation */
    autoApprove: boolean;
    /**
     * With autoApprove off, promote INFORM/ALLOW proposals on creation only
     * when they repeat an applied proposal of the same type and tier
     */
    precedent: boolean;
  };
}

export const DEFAULT_APPLY_SETTINGS: GovernanceConfig['apply'] = {
  maxAttempts: 3,
  timeoutMs: 30000,
  coAuthor: 'Governance Bot <governance-bot@localhost>',
};

export const DEFAULT_PROPOSAL_SETTINGS: GovernanceConfig['proposals'] = {
  directory: '.governance/proposals',
  autoApprove: true,
  precedent: false,
};
