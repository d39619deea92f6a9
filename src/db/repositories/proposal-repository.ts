import { Pool } from 'pg';
import { BaseRepository } from './base-repository';
import {
  AuditEntry,
  AuditOutcome,
  FileDiff,
  NewProposal,
  Proposal,
  ProposalState,
  isProposalState,
  isTierRank,
} from '../../types';
import {
  ProposalStore,
  TransitionAudit,
  generateProposalId,
} from '../../proposals/proposal-store';
import { isAllowedTransition } from '../../proposals/lifecycle';

type ProposalRow = {
  id: string;
  repository_root: string;
  proposer: string;
  summary: string;
  change_type: string;
  tier: number;
  state: string;
  review_id: string | null;
  diffs: unknown;
  created_at: Date;
};

type AuditRow = {
  proposal_id: string;
  timestamp: Date;
  event: string;
  actor: string;
  outcome: string;
  from_state: string | null;
  to_state: string | null;
  detail: string | null;
};

const PROPOSAL_COLUMNS =
  'id, repository_root, proposer, summary, change_type, tier, state, review_id, diffs, created_at';

/**
 * Postgres-backed proposal store. Selected when DATABASE_URL is set, so
 * several API instances can share one queue.
 *
 * transition() is a conditional UPDATE ... WHERE state = $from; the row lock
 * taken by the UPDATE makes it the compare-and-set.
 */
export class PostgresProposalStore extends BaseRepository implements ProposalStore {
  constructor(pool: Pool) {
    super(pool);
  }

  async create(input: NewProposal): Promise<Proposal> {
    const now = new Date();
    const proposal: Proposal = {
      id: generateProposalId(now),
      repositoryRoot: input.repositoryRoot,
      diffs: input.diffs.map((d) => ({ ...d })),
      metadata: {
        proposer: input.proposer,
        summary: input.summary,
        changeType: input.changeType,
        createdAt: now.toISOString(),
        tier: input.tier,
      },
      state: 'pending',
      auditTrail: [],
    };
    const created: AuditEntry = {
      timestamp: proposal.metadata.createdAt,
      event: 'created',
      actor: input.proposer,
      outcome: 'success',
      toState: 'pending',
    };

    await this.transaction(async (client) => {
      await client.query(
        `INSERT INTO proposals (${PROPOSAL_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          proposal.id,
          proposal.repositoryRoot,
          proposal.metadata.proposer,
          proposal.metadata.summary,
          proposal.metadata.changeType,
          proposal.metadata.tier,
          proposal.state,
          null,
          JSON.stringify(proposal.diffs),
          now,
        ]
      );
      await client.query(
        `INSERT INTO proposal_audit (proposal_id, timestamp, event, actor, outcome, to_state)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [proposal.id, now, created.event, created.actor, created.outcome, created.toState]
      );
    });

    proposal.auditTrail.push(created);
    return proposal;
  }

  async get(id: string): Promise<Proposal | null> {
    const result = await this.query<ProposalRow>(
      `SELECT ${PROPOSAL_COLUMNS} FROM proposals WHERE id = $1`,
      [id]
    );
    if (!result.rows[0]) return null;

    const audits = await this.loadAudits([id]);
    return this.rowToProposal(result.rows[0], audits.get(id) ?? []);
  }

  async list(state?: ProposalState): Promise<Proposal[]> {
    const result = await this.query<ProposalRow>(
      `SELECT ${PROPOSAL_COLUMNS} FROM proposals
       WHERE ($1::text IS NULL OR state = $1)
       ORDER BY created_at ASC, id ASC`,
      [state ?? null]
    );

    const audits = await this.loadAudits(result.rows.map((row) => row.id));
    return result.rows.map((row) => this.rowToProposal(row, audits.get(row.id) ?? []));
  }

  async transition(
    id: string,
    from: ProposalState,
    to: ProposalState,
    audit?: TransitionAudit
  ): Promise<boolean> {
    if (!isAllowedTransition(from, to)) return false;

    return this.transaction(async (client) => {
      const updated = await client.query(
        `UPDATE proposals SET state = $3, updated_at = NOW()
         WHERE id = $1 AND state = $2
         RETURNING id`,
        [id, from, to]
      );
      if ((updated.rowCount ?? 0) === 0) return false;

      await client.query(
        `INSERT INTO proposal_audit (proposal_id, event, actor, outcome, from_state, to_state, detail)
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          id,
          audit?.event ?? 'transition',
          audit?.actor ?? 'system',
          audit?.outcome ?? 'success',
          from,
          to,
          audit?.detail ?? null,
        ]
      );
      return true;
    });
  }

  async appendAudit(id: string, entry: Omit<AuditEntry, 'timestamp'>): Promise<void> {
    const result = await this.query(
      `INSERT INTO proposal_audit (proposal_id, event, actor, outcome, from_state, to_state, detail)
       SELECT id, $2, $3, $4, $5, $6, $7 FROM proposals WHERE id = $1`,
      [
        id,
        entry.event,
        entry.actor,
        entry.outcome,
        entry.fromState ?? null,
        entry.toState ?? null,
        entry.detail ?? null,
      ]
    );
    if ((result.rowCount ?? 0) === 0) {
      throw new Error(`Proposal not found: ${id}`);
    }
  }

  async attachReview(id: string, reviewId: string): Promise<void> {
    const result = await this.query(
      'UPDATE proposals SET review_id = $2, updated_at = NOW() WHERE id = $1',
      [id, reviewId]
    );
    if ((result.rowCount ?? 0) === 0) {
      throw new Error(`Proposal not found: ${id}`);
    }
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.query(
      `DELETE FROM proposals WHERE id = $1 AND state = 'pending'`,
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async loadAudits(ids: string[]): Promise<Map<string, AuditEntry[]>> {
    const byProposal = new Map<string, AuditEntry[]>();
    if (ids.length === 0) return byProposal;

    const result = await this.query<AuditRow>(
      `SELECT proposal_id, timestamp, event, actor, outcome, from_state, to_state, detail
       FROM proposal_audit
       WHERE proposal_id = ANY($1)
       ORDER BY id ASC`,
      [ids]
    );

    for (const row of result.rows) {
      const entries = byProposal.get(row.proposal_id) ?? [];
      entries.push(this.rowToAudit(row));
      byProposal.set(row.proposal_id, entries);
    }
    return byProposal;
  }

  private rowToProposal(row: ProposalRow, auditTrail: AuditEntry[]): Proposal {
    if (!isProposalState(row.state)) {
      throw new Error(`Proposal ${row.id} has unknown state ${row.state}`);
    }
    if (!isTierRank(row.tier)) {
      throw new Error(`Proposal ${row.id} has unknown tier ${row.tier}`);
    }

    return {
      id: row.id,
      repositoryRoot: row.repository_root,
      diffs: parseDiffs(row.diffs, row.id),
      metadata: {
        proposer: row.proposer,
        summary: row.summary,
        changeType: row.change_type,
        createdAt: row.created_at.toISOString(),
        tier: row.tier,
      },
      state: row.state,
      ...(row.review_id ? { reviewId: row.review_id } : {}),
      auditTrail,
    };
  }

  private rowToAudit(row: AuditRow): AuditEntry {
    const entry: AuditEntry = {
      timestamp: row.timestamp.toISOString(),
      event: row.event,
      actor: row.actor,
      outcome: toOutcome(row.outcome),
    };
    if (row.from_state && isProposalState(row.from_state)) entry.fromState = row.from_state;
    if (row.to_state && isProposalState(row.to_state)) entry.toState = row.to_state;
    if (row.detail) entry.detail = row.detail;
    return entry;
  }
}

function toOutcome(value: string): AuditOutcome {
  return value === 'success' || value === 'failure' ? value : 'info';
}

function parseDiffs(value: unknown, id: string): FileDiff[] {
  if (!Array.isArray(value)) {
    throw new Error(`Proposal ${id} has malformed diffs`);
  }
  return value.map((item: unknown) => {
    if (
      typeof item !== 'object' ||
      item === null ||
      !('path' in item) ||
      !('diff' in item) ||
      typeof item.path !== 'string' ||
      typeof item.diff !== 'string'
    ) {
      throw new Error(`Proposal ${id} has malformed diffs`);
    }
    return { path: item.path, diff: item.diff };
  });
}
