import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import {
  ConfigValidationError,
  DEFAULT_APPLY_SETTINGS,
  DEFAULT_PROPOSAL_SETTINGS,
  GovernanceConfig,
  TierRule,
  isTierLabel,
} from '../types';
import { RiskClassifier } from '../classification/risk-classifier';
import { isRecord, validateGovernanceYaml } from './validate-config';

export const DEFAULT_CONFIG_PATH = path.join('.governance', 'governance.yaml');

/**
 * Repository the pipeline governs: GOVERNANCE_REPO_ROOT, else the working directory
 */
export function resolveRepositoryRoot(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env.GOVERNANCE_REPO_ROOT || process.cwd());
}

/**
 * Load and validate governance.yaml for a repository
 *
 * @param repositoryRoot - Governed repository
 * @param configPath - Explicit config file; defaults to GOVERNANCE_CONFIG,
 *   then `.governance/governance.yaml` under the repository
 */
export function loadGovernanceConfig(
  repositoryRoot: string,
  configPath: string | undefined = process.env.GOVERNANCE_CONFIG
): GovernanceConfig {
  const file = path.resolve(repositoryRoot, configPath || DEFAULT_CONFIG_PATH);

  if (!fs.existsSync(file)) {
    throw new Error(`Governance config not found: ${file}`);
  }

  const raw: unknown = yaml.parse(fs.readFileSync(file, 'utf8'));
  return parseGovernanceConfig(raw, repositoryRoot, file);
}

/**
 * Validate a parsed document and fill in defaults
 */
export function parseGovernanceConfig(
  raw: unknown,
  repositoryRoot: string,
  source = 'inline'
): GovernanceConfig {
  const result = validateGovernanceYaml(raw);
  if (!result.valid || !isRecord(raw)) {
    throw new ConfigValidationError(source, result.errors);
  }

  const review = isRecord(raw.review) ? raw.review : {};
  const apply = isRecord(raw.apply) ? raw.apply : {};
  const proposals = isRecord(raw.proposals) ? raw.proposals : {};

  return {
    repositoryRoot: path.resolve(repositoryRoot),
    tiers: parseTierRules(raw.tiers),
    review: {
      reviewers: stringList(review.reviewers),
      quorum: parseQuorum(review.quorum),
    },
    apply: {
      maxAttempts: numberOr(apply.maxAttempts, DEFAULT_APPLY_SETTINGS.maxAttempts),
      timeoutMs: numberOr(apply.timeoutMs, DEFAULT_APPLY_SETTINGS.timeoutMs),
      coAuthor: typeof apply.coAuthor === 'string' ? apply.coAuthor : DEFAULT_APPLY_SETTINGS.coAuthor,
    },
    proposals: {
      directory:
        typeof proposals.directory === 'string' ? proposals.directory : DEFAULT_PROPOSAL_SETTINGS.directory,
      autoApprove:
        typeof proposals.autoApprove === 'boolean'
          ? proposals.autoApprove
          : DEFAULT_PROPOSAL_SETTINGS.autoApprove,
      precedent:
        typeof proposals.precedent === 'boolean' ? proposals.precedent : DEFAULT_PROPOSAL_SETTINGS.precedent,
    },
  };
}

/**
 * Compile the configured rule table once
 */
export function createRiskClassifier(config: GovernanceConfig): RiskClassifier {
  return new RiskClassifier(config.tiers);
}

/**
 * Absolute directory of the file proposal store
 */
export function proposalsDirectory(config: GovernanceConfig): string {
  return path.resolve(config.repositoryRoot, config.proposals.directory);
}

function parseTierRules(tiers: unknown): TierRule[] {
  const rules: TierRule[] = [];
  if (!Array.isArray(tiers)) return rules;

  for (const entry of tiers) {
    if (!isRecord(entry) || !isTierLabel(entry.tier) || !Array.isArray(entry.patterns)) continue;
    const reason = typeof entry.reason === 'string' ? entry.reason : undefined;

    for (const pattern of entry.patterns) {
      if (typeof pattern !== 'string') continue;
      rules.push({ tier: entry.tier, pattern, ...(reason ? { reason } : {}) });
    }
  }
  return rules;
}

function parseQuorum(quorum: unknown): Record<number, number> {
  const table: Record<number, number> = {};
  if (!isRecord(quorum)) return table;

  for (const [size, required] of Object.entries(quorum)) {
    if (typeof required === 'number') table[Number(size)] = required;
  }
  return table;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === 'number' ? value : fallback;
}
