import { promises as fsp } from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import { ReviewDecision, ReviewRecord, ReviewStatus, isErrnoError } from '../types';
import { FileLock, FileLockOptions } from '../proposals/file-lock';

/**
 * Durable home of review records, so reviews outlive the process that
 * opened them
 */
export interface ReviewRecordStore {
  create(record: ReviewRecord): Promise<void>;
  get(reviewId: string): Promise<ReviewRecord | null>;
  /**
   * Read, change and write one record with no other writer in between.
   * Resolves null when the review does not exist; errors thrown by change
   * leave the record as it was.
   */
  update(reviewId: string, change: (record: ReviewRecord) => ReviewRecord): Promise<ReviewRecord | null>;
}

export class InMemoryReviewStore implements ReviewRecordStore {
  private records = new Map<string, ReviewRecord>();

  async create(record: ReviewRecord): Promise<void> {
    this.records.set(record.reviewId, cloneRecord(record));
  }

  async get(reviewId: string): Promise<ReviewRecord | null> {
    const record = this.records.get(reviewId);
    return record ? cloneRecord(record) : null;
  }

  async update(
    reviewId: string,
    change: (record: ReviewRecord) => ReviewRecord
  ): Promise<ReviewRecord | null> {
    const record = this.records.get(reviewId);
    if (!record) return null;

    const next = change(cloneRecord(record));
    this.records.set(reviewId, cloneRecord(next));
    return cloneRecord(next);
  }
}

const REVIEW_ID = /^[A-Za-z0-9-]+$/;

/**
 * One JSON file per review, `<reviewId>.json`, updated under `<reviewId>.lock`
 */
export class FileReviewStore implements ReviewRecordStore {
  private readonly lock: FileLock;

  constructor(
    private readonly directory: string,
    options: FileLockOptions = {}
  ) {
    this.lock = new FileLock('ReviewStore', options);
  }

  async create(record: ReviewRecord): Promise<void> {
    await fsp.mkdir(this.directory, { recursive: true });
    await fsp.writeFile(this.recordPath(record.reviewId), serialize(record), { encoding: 'utf8', flag: 'wx' });
  }

  async get(reviewId: string): Promise<ReviewRecord | null> {
    if (!REVIEW_ID.test(reviewId)) return null;

    let raw: string;
    try {
      raw = await fsp.readFile(this.recordPath(reviewId), 'utf8');
    } catch (error) {
      if (isErrnoError(error, 'ENOENT')) return null;
      throw error;
    }
    return parseReviewRecord(JSON.parse(raw), reviewId);
  }

  async update(
    reviewId: string,
    change: (record: ReviewRecord) => ReviewRecord
  ): Promise<ReviewRecord | null> {
    if (!REVIEW_ID.test(reviewId)) return null;

    const outcome = await this.lock.run(path.join(this.directory, `${reviewId}.lock`), async () => {
      const current = await this.get(reviewId);
      if (!current) return null;

      const next = change(current);
      const target = this.recordPath(reviewId);
      const temp = `${target}.${randomBytes(4).toString('hex')}.tmp`;
      await fsp.writeFile(temp, serialize(next), 'utf8');
      await fsp.rename(temp, target);
      return next;
    });

    if (!outcome.acquired) {
      throw new Error(`Review ${reviewId} is locked by another writer`);
    }
    return outcome.value;
  }

  private recordPath(reviewId: string): string {
    return path.join(this.directory, `${reviewId}.json`);
  }
}

export function cloneRecord(record: ReviewRecord): ReviewRecord {
  return { ...record, reviewers: [...record.reviewers], decisions: { ...record.decisions } };
}

/**
 * Validate a stored review record (a parsed JSON file or a database row
 * mapped to the same shape)
 */
export function parseReviewRecord(value: unknown, reviewId: string): ReviewRecord {
  const corrupt = (field: string) => new Error(`Corrupt review record ${reviewId}: invalid ${field}`);

  if (typeof value !== 'object' || value === null) throw corrupt('record');
  if (!('reviewId' in value) || typeof value.reviewId !== 'string') throw corrupt('reviewId');
  if (!('requestingNode' in value) || typeof value.requestingNode !== 'string') throw corrupt('requestingNode');
  if (!('action' in value) || typeof value.action !== 'string') throw corrupt('action');
  if (!('requiredApprovals' in value) || typeof value.requiredApprovals !== 'number') {
    throw corrupt('requiredApprovals');
  }
  if (!('status' in value) || !isReviewStatus(value.status)) throw corrupt('status');

  if (!('reviewers' in value) || !Array.isArray(value.reviewers)) throw corrupt('reviewers');
  const reviewers: string[] = [];
  for (const reviewer of value.reviewers) {
    if (typeof reviewer !== 'string') throw corrupt('reviewers');
    reviewers.push(reviewer);
  }

  if (!('decisions' in value) || typeof value.decisions !== 'object' || value.decisions === null) {
    throw corrupt('decisions');
  }
  const decisions: Record<string, ReviewDecision> = {};
  for (const [reviewer, decision] of Object.entries(value.decisions)) {
    if (!isReviewDecision(decision)) throw corrupt('decisions');
    decisions[reviewer] = decision;
  }

  return {
    reviewId: value.reviewId,
    requestingNode: value.requestingNode,
    action: value.action,
    reviewers,
    decisions,
    requiredApprovals: value.requiredApprovals,
    status: value.status,
  };
}

function serialize(record: ReviewRecord): string {
  return JSON.stringify(record, null, 2) + '\n';
}

function isReviewDecision(value: unknown): value is ReviewDecision {
  return value === 'approve' || value === 'reject';
}

function isReviewStatus(value: unknown): value is ReviewStatus {
  return isReviewDecision(value) || value === 'pending';
}
