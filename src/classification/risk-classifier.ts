import {
  Classification,
  TIERS,
  TierDefinition,
  TierRule,
  tierByLabel,
} from '../types';

interface CompiledRule {
  readonly tier: TierDefinition;
  readonly pattern: string;
  readonly regex: RegExp;
  readonly reason: string;
}

/**
 * Error raised when a tier rule table cannot be compiled
 */
export class RuleCompilationError extends Error {
  constructor(
    readonly pattern: string,
    cause: string
  ) {
    super(`Invalid tier pattern "${pattern}": ${cause}`);
    this.name = 'RuleCompilationError';
  }
}

const DEFAULT_TIER = tierByLabel('INFORM');
const DEFAULT_REASON = 'Unknown path — defaulting to inform-and-allow';

/**
 * Normalise a path for matching: backslashes become forward slashes
 */
export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Risk tier classifier
 *
 * Maps file paths to one of four governance tiers using an ordered rule table.
 * Rules are evaluated GOVERN first through FREE last and the first match wins,
 * so a GOVERN pattern always outranks a lower-tier pattern matching the same
 * path. Paths that match nothing default to INFORM, never FREE.
 *
 * The compiled table is frozen at construction; classify() has no side effects
 * and can be called concurrently without coordination.
 */
export class RiskClassifier {
  private readonly rules: readonly CompiledRule[];

  constructor(rules: TierRule[]) {
    this.rules = Object.freeze(compileRules(rules));
  }

  /**
   * Classify a single path
   *
   * @param filePath - Absolute or repository-relative path
   */
  classify(filePath: string): Classification {
    const normalized = normalizePath(filePath);

    for (const rule of this.rules) {
      if (rule.regex.test(normalized)) {
        return {
          tier: rule.tier.rank,
          label: rule.tier.label,
          policy: rule.tier.policy,
          reason: rule.reason,
          filePath,
          matchedRule: rule.pattern,
        };
      }
    }

    return {
      tier: DEFAULT_TIER.rank,
      label: DEFAULT_TIER.label,
      policy: DEFAULT_TIER.policy,
      reason: DEFAULT_REASON,
      filePath,
      matchedRule: null,
    };
  }

  /**
   * Classify a set of paths and return the highest-scrutiny result.
   * Ties keep the first path in input order.
   */
  classifyMany(filePaths: string[]): Classification {
    if (filePaths.length === 0) {
      throw new Error('classifyMany requires at least one path');
    }

    let strictest = this.classify(filePaths[0]);
    for (const filePath of filePaths.slice(1)) {
      const result = this.classify(filePath);
      if (result.tier < strictest.tier) {
        strictest = result;
      }
    }
    return strictest;
  }

  /**
   * Number of compiled rules (for diagnostics)
   */
  get size(): number {
    return this.rules.length;
  }
}

/**
 * Compile rules into evaluation order: grouped by tier rank, preserving the
 * declared order within each tier.
 */
function compileRules(rules: TierRule[]): CompiledRule[] {
  const compiled: CompiledRule[] = [];

  for (const tier of TIERS) {
    for (const rule of rules) {
      if (rule.tier !== tier.label) continue;

      let regex: RegExp;
      try {
        regex = new RegExp(rule.pattern, 'i');
      } catch (error) {
        throw new RuleCompilationError(
          rule.pattern,
          error instanceof Error ? error.message : String(error)
        );
      }

      compiled.push({
        tier,
        pattern: rule.pattern,
        regex,
        reason: rule.reason || tier.reason,
      });
    }
  }

  return compiled;
}
