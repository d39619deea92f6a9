/**
 * Validates the parsed .governance/governance.yaml document
 */

import { isTierLabel } from '../types';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate a parsed governance.yaml object
 */
export function validateGovernanceYaml(raw: unknown): ValidationResult {
  const errors: ValidationError[] = [];

  if (!isRecord(raw)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be a YAML mapping' }],
    };
  }

  validateTiers(raw.tiers, errors);
  validateReview(raw.review, errors);
  validateApply(raw.apply, errors);
  validateProposals(raw.proposals, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

function validateTiers(tiers: unknown, errors: ValidationError[]): void {
  if (tiers === undefined) {
    errors.push({ path: 'tiers', message: 'Missing required "tiers" section' });
    return;
  }
  if (!Array.isArray(tiers)) {
    errors.push({ path: 'tiers', message: 'Must be a list of tier rule sets' });
    return;
  }

  tiers.forEach((entry: unknown, i) => {
    const at = `tiers[${i}]`;
    if (!isRecord(entry)) {
      errors.push({ path: at, message: 'Must be a mapping with "tier" and "patterns"' });
      return;
    }

    if (!isTierLabel(entry.tier)) {
      errors.push({
        path: `${at}.tier`,
        message: `Invalid tier "${String(entry.tier)}". Must be one of: GOVERN, INFORM, ALLOW, FREE`,
      });
    }

    if (entry.reason !== undefined && typeof entry.reason !== 'string') {
      errors.push({ path: `${at}.reason`, message: 'Must be a string' });
    }

    if (!Array.isArray(entry.patterns) || entry.patterns.length === 0) {
      errors.push({ path: `${at}.patterns`, message: 'Must be a non-empty list of regular expressions' });
      return;
    }

    entry.patterns.forEach((pattern: unknown, j) => {
      const patternPath = `${at}.patterns[${j}]`;
      if (typeof pattern !== 'string' || pattern === '') {
        errors.push({ path: patternPath, message: 'Must be a non-empty string' });
        return;
      }
      try {
        new RegExp(pattern, 'i');
      } catch (error) {
        errors.push({
          path: patternPath,
          message: `Invalid regular expression: ${error instanceof Error ? error.message : String(error)}`,
        });
      }
    });
  });
}

function validateReview(review: unknown, errors: ValidationError[]): void {
  if (review === undefined) return;
  if (!isRecord(review)) {
    errors.push({ path: 'review', message: 'Must be a mapping' });
    return;
  }

  let reviewerCount: number | null = null;
  if (review.reviewers !== undefined) {
    if (!Array.isArray(review.reviewers) || !review.reviewers.every((r) => typeof r === 'string' && r !== '')) {
      errors.push({ path: 'review.reviewers', message: 'Must be a list of reviewer names' });
    } else if (new Set(review.reviewers).size !== review.reviewers.length) {
      errors.push({ path: 'review.reviewers', message: 'Reviewer names must be unique' });
    } else {
      reviewerCount = review.reviewers.length;
    }
  }

  if (review.quorum === undefined) {
    if (reviewerCount) {
      errors.push({ path: 'review.quorum', message: 'Required when reviewers are configured' });
    }
    return;
  }
  if (!isRecord(review.quorum)) {
    errors.push({ path: 'review.quorum', message: 'Must map group size to required approvals' });
    return;
  }

  for (const [size, required] of Object.entries(review.quorum)) {
    const groupSize = Number(size);
    if (!isPositiveInteger(groupSize)) {
      errors.push({ path: `review.quorum.${size}`, message: 'Group size must be a positive integer' });
      continue;
    }
    if (!isPositiveInteger(required) || required > groupSize) {
      errors.push({
        path: `review.quorum.${size}`,
        message: `Required approvals must be an integer between 1 and ${groupSize}`,
      });
    }
  }

  if (reviewerCount && !(String(reviewerCount) in review.quorum)) {
    errors.push({
      path: 'review.quorum',
      message: `No quorum configured for the ${reviewerCount} configured reviewer(s)`,
    });
  }
}

function validateApply(apply: unknown, errors: ValidationError[]): void {
  if (apply === undefined) return;
  if (!isRecord(apply)) {
    errors.push({ path: 'apply', message: 'Must be a mapping' });
    return;
  }

  for (const key of ['maxAttempts', 'timeoutMs']) {
    if (apply[key] !== undefined && !isPositiveInteger(apply[key])) {
      errors.push({ path: `apply.${key}`, message: 'Must be a positive integer' });
    }
  }
  if (apply.coAuthor !== undefined && (typeof apply.coAuthor !== 'string' || apply.coAuthor === '')) {
    errors.push({ path: 'apply.coAuthor', message: 'Must be a non-empty string' });
  }
}

function validateProposals(proposals: unknown, errors: ValidationError[]): void {
  if (proposals === undefined) return;
  if (!isRecord(proposals)) {
    errors.push({ path: 'proposals', message: 'Must be a mapping' });
    return;
  }

  if (proposals.directory !== undefined && (typeof proposals.directory !== 'string' || proposals.directory === '')) {
    errors.push({ path: 'proposals.directory', message: 'Must be a non-empty string' });
  }
  for (const key of ['autoApprove', 'precedent']) {
    if (proposals[key] !== undefined && typeof proposals[key] !== 'boolean') {
      errors.push({ path: `proposals.${key}`, message: 'Must be a boolean' });
    }
  }
}
