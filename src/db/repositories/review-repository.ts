import { Pool } from 'pg';
import { BaseRepository } from './base-repository';
import { ReviewRecord } from '../../types';
import { ReviewRecordStore, parseReviewRecord } from '../../review/review-store';

type ReviewRow = {
  review_id: string;
  requesting_node: string;
  action: string;
  reviewers: unknown;
  decisions: unknown;
  required_approvals: number;
  status: string;
};

const REVIEW_COLUMNS = 'review_id, requesting_node, action, reviewers, decisions, required_approvals, status';

/**
 * Review records in the `reviews` table. update() reads the row FOR UPDATE
 * inside a transaction, so concurrent answers to one review serialize.
 */
export class PostgresReviewStore extends BaseRepository implements ReviewRecordStore {
  constructor(pool: Pool) {
    super(pool);
  }

  async create(record: ReviewRecord): Promise<void> {
    await this.query(
      `INSERT INTO reviews (${REVIEW_COLUMNS}) VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      toParams(record)
    );
  }

  async get(reviewId: string): Promise<ReviewRecord | null> {
    const result = await this.query<ReviewRow>(
      `SELECT ${REVIEW_COLUMNS} FROM reviews WHERE review_id = $1`,
      [reviewId]
    );
    return result.rows[0] ? rowToRecord(result.rows[0]) : null;
  }

  async update(
    reviewId: string,
    change: (record: ReviewRecord) => ReviewRecord
  ): Promise<ReviewRecord | null> {
    return this.transaction(async (client) => {
      const result = await client.query<ReviewRow>(
        `SELECT ${REVIEW_COLUMNS} FROM reviews WHERE review_id = $1 FOR UPDATE`,
        [reviewId]
      );
      if (!result.rows[0]) return null;

      const next = change(rowToRecord(result.rows[0]));
      await client.query(
        `UPDATE reviews SET decisions = $2, status = $3, updated_at = NOW() WHERE review_id = $1`,
        [reviewId, JSON.stringify(next.decisions), next.status]
      );
      return next;
    });
  }
}

function toParams(record: ReviewRecord): unknown[] {
  return [
    record.reviewId,
    record.requestingNode,
    record.action,
    JSON.stringify(record.reviewers),
    JSON.stringify(record.decisions),
    record.requiredApprovals,
    record.status,
  ];
}

function rowToRecord(row: ReviewRow): ReviewRecord {
  return parseReviewRecord(
    {
      reviewId: row.review_id,
      requestingNode: row.requesting_node,
      action: row.action,
      reviewers: row.reviewers,
      decisions: row.decisions,
      requiredApprovals: row.required_approvals,
      status: row.status,
    },
    row.review_id
  );
}
