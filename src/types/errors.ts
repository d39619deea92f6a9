import { ProposalState } from './proposal';

export class ProposalNotFoundError extends Error {
  readonly proposalId: string;

  constructor(proposalId: string) {
    super(`Proposal not found: ${proposalId}`);
    this.name = 'ProposalNotFoundError';
    this.proposalId = proposalId;
  }
}

export class InvalidTransitionError extends Error {
  readonly proposalId: string;
  readonly from: ProposalState;
  readonly to: ProposalState;

  constructor(proposalId: string, from: ProposalState, to: ProposalState) {
    super(`Invalid transition for ${proposalId}: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
    this.proposalId = proposalId;
    this.from = from;
    this.to = to;
  }
}

export class PatchParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PatchParseError';
  }
}

export class PatchConflictError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = 'PatchConflictError';
    this.path = path;
  }
}

export class QuorumUndefinedError extends Error {
  readonly groupSize: number;

  constructor(groupSize: number) {
    super(`No quorum threshold configured for a group of ${groupSize} reviewer(s)`);
    this.name = 'QuorumUndefinedError';
    this.groupSize = groupSize;
  }
}

export class TimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class ReviewError extends Error {
  readonly reviewId: string;

  constructor(reviewId: string, message: string) {
    super(`Review ${reviewId}: ${message}`);
    this.name = 'ReviewError';
    this.reviewId = reviewId;
  }
}

export class ConfigValidationError extends Error {
  readonly errors: { path: string; message: string }[];

  constructor(source: string, errors: { path: string; message: string }[]) {
    super(
      `Invalid governance config (${source}):\n` +
        errors.map((e) => `  - ${e.path}: ${e.message}`).join('\n')
    );
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * A proposal request that cannot be turned into a proposal (bad paths,
 * missing summary, unreadable document)
 */
export class ProposalInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProposalInputError';
  }
}

/**
 * Matches Node system errors by code. Errors raised by `fs` inside another
 * realm (Jest's sandbox, for one) fail `instanceof Error`, so this checks
 * the shape instead.
 */
export function isErrnoError(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
