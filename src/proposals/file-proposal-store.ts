import { promises as fsp } from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import {
  AuditEntry,
  AuditOutcome,
  FileDiff,
  NewProposal,
  Proposal,
  ProposalMetadata,
  ProposalState,
  isErrnoError,
  isProposalState,
  isTierRank,
} from '../types';
import {
  ProposalStore,
  TransitionAudit,
  compareProposals,
  generateProposalId,
} from './proposal-store';
import { isAllowedTransition } from './lifecycle';
import { renderProposalDocument } from './proposal-document';
import { FileLock, FileLockOptions, LockOutcome } from './file-lock';

/**
 * Proposal record as stored on disk. The markdown document beside it is
 * written for reviewers and never read back.
 */
interface StateFile {
  id: string;
  repositoryRoot: string;
  diffs: FileDiff[];
  metadata: ProposalMetadata;
  state: ProposalState;
  reviewId?: string;
  auditTrail: AuditEntry[];
}

export type FileProposalStoreOptions = FileLockOptions;

const STATE_SUFFIX = '.state.json';

/**
 * Directory-backed proposal store
 *
 * Each proposal is two files:
 * - `<id>.md`: the proposal document (metadata + diff blocks), written once
 * - `<id>.state.json`: diffs, metadata, lifecycle state, review id and audit trail
 *
 * Every mutation holds `<id>.lock`, created with an exclusive open, so a
 * compare-and-set on the state field cannot interleave with another writer,
 * in this process or another one. State files are replaced by rename.
 */
export class FileProposalStore implements ProposalStore {
  private readonly lock: FileLock;

  constructor(
    private readonly directory: string,
    options: FileProposalStoreOptions = {}
  ) {
    this.lock = new FileLock('ProposalStore', options);
  }

  async create(input: NewProposal): Promise<Proposal> {
    await fsp.mkdir(this.directory, { recursive: true });

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
      auditTrail: [
        {
          timestamp: now.toISOString(),
          event: 'created',
          actor: input.proposer,
          outcome: 'success',
          toState: 'pending',
        },
      ],
    };

    // 'wx' guarantees a single record per id
    await fsp.writeFile(this.documentPath(proposal.id), renderProposalDocument(proposal), {
      encoding: 'utf8',
      flag: 'wx',
    });
    await this.writeState(toStateFile(proposal));

    return proposal;
  }

  async get(id: string): Promise<Proposal | null> {
    const state = await this.readState(id);
    if (!state) return null;

    return {
      id: state.id,
      repositoryRoot: state.repositoryRoot,
      diffs: state.diffs,
      metadata: state.metadata,
      state: state.state,
      reviewId: state.reviewId,
      auditTrail: state.auditTrail,
    };
  }

  async list(state?: ProposalState): Promise<Proposal[]> {
    let entries: string[];
    try {
      entries = await fsp.readdir(this.directory);
    } catch (error) {
      if (isErrnoError(error, 'ENOENT')) return [];
      throw error;
    }

    const proposals: Proposal[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(STATE_SUFFIX)) continue;
      const proposal = await this.get(entry.slice(0, -STATE_SUFFIX.length));
      if (proposal && (!state || proposal.state === state)) {
        proposals.push(proposal);
      }
    }

    return proposals.sort(compareProposals);
  }

  async transition(
    id: string,
    from: ProposalState,
    to: ProposalState,
    audit?: TransitionAudit
  ): Promise<boolean> {
    if (!isAllowedTransition(from, to)) return false;

    const outcome = await this.withLock(id, async () => {
      const current = await this.readState(id);
      if (!current || current.state !== from) return false;

      current.state = to;
      current.auditTrail.push({
        timestamp: new Date().toISOString(),
        event: audit?.event ?? 'transition',
        actor: audit?.actor ?? 'system',
        outcome: audit?.outcome ?? 'success',
        fromState: from,
        toState: to,
        ...(audit?.detail ? { detail: audit.detail } : {}),
      });
      await this.writeState(current);
      return true;
    });

    if (!outcome.acquired) throw lockedError(id);
    return outcome.value;
  }

  async appendAudit(id: string, entry: Omit<AuditEntry, 'timestamp'>): Promise<void> {
    await this.mutate(id, (state) => {
      state.auditTrail.push({ timestamp: new Date().toISOString(), ...entry });
    });
  }

  async attachReview(id: string, reviewId: string): Promise<void> {
    await this.mutate(id, (state) => {
      state.reviewId = reviewId;
    });
  }

  async delete(id: string): Promise<boolean> {
    const outcome = await this.withLock(id, async () => {
      const current = await this.readState(id);
      if (!current || current.state !== 'pending') return false;

      await fsp.unlink(this.statePath(id));
      await fsp.unlink(this.documentPath(id));
      return true;
    });

    if (!outcome.acquired) throw lockedError(id);
    return outcome.value;
  }

  private async mutate(id: string, change: (state: StateFile) => void): Promise<void> {
    const outcome = await this.withLock(id, async () => {
      const current = await this.readState(id);
      if (!current) return false;
      change(current);
      await this.writeState(current);
      return true;
    });

    if (!outcome.acquired) throw lockedError(id);
    if (!outcome.value) {
      throw new Error(`Proposal not found: ${id}`);
    }
  }

  private withLock<T>(id: string, fn: () => Promise<T>): Promise<LockOutcome<T>> {
    return this.lock.run(path.join(this.directory, `${id}.lock`), fn);
  }

  private async readState(id: string): Promise<StateFile | null> {
    let raw: string;
    try {
      raw = await fsp.readFile(this.statePath(id), 'utf8');
    } catch (error) {
      if (isErrnoError(error, 'ENOENT')) return null;
      throw error;
    }
    return parseStateFile(raw, id);
  }

  private async writeState(state: StateFile): Promise<void> {
    const target = this.statePath(state.id);
    const temp = `${target}.${randomBytes(4).toString('hex')}.tmp`;
    await fsp.writeFile(temp, JSON.stringify(state, null, 2) + '\n', 'utf8');
    await fsp.rename(temp, target);
  }

  private documentPath(id: string): string {
    return path.join(this.directory, `${id}.md`);
  }

  private statePath(id: string): string {
    return path.join(this.directory, `${id}${STATE_SUFFIX}`);
  }
}

function toStateFile(proposal: Proposal): StateFile {
  return {
    id: proposal.id,
    repositoryRoot: proposal.repositoryRoot,
    diffs: proposal.diffs,
    metadata: proposal.metadata,
    state: proposal.state,
    reviewId: proposal.reviewId,
    auditTrail: proposal.auditTrail,
  };
}

function parseStateFile(raw: string, id: string): StateFile {
  const parsed: unknown = JSON.parse(raw);
  const corrupt = (field: string) =>
    new Error(`Corrupt state file for proposal ${id}: invalid ${field}`);

  if (!isRecord(parsed)) throw corrupt('document');
  if (typeof parsed.id !== 'string') throw corrupt('id');
  if (typeof parsed.repositoryRoot !== 'string') throw corrupt('repositoryRoot');
  if (!isProposalState(parsed.state)) throw corrupt('state');
  if (parsed.reviewId !== undefined && typeof parsed.reviewId !== 'string') {
    throw corrupt('reviewId');
  }

  if (!Array.isArray(parsed.diffs)) throw corrupt('diffs');
  const diffs: FileDiff[] = [];
  for (const item of parsed.diffs) {
    if (!isRecord(item) || typeof item.path !== 'string' || typeof item.diff !== 'string') {
      throw corrupt('diffs');
    }
    diffs.push({ path: item.path, diff: item.diff });
  }

  const metadata = parsed.metadata;
  if (
    !isRecord(metadata) ||
    typeof metadata.proposer !== 'string' ||
    typeof metadata.summary !== 'string' ||
    typeof metadata.changeType !== 'string' ||
    typeof metadata.createdAt !== 'string' ||
    !isTierRank(metadata.tier)
  ) {
    throw corrupt('metadata');
  }

  if (!Array.isArray(parsed.auditTrail)) throw corrupt('auditTrail');
  const auditTrail: AuditEntry[] = [];
  for (const item of parsed.auditTrail) {
    const entry = parseAuditEntry(item);
    if (!entry) throw corrupt('auditTrail');
    auditTrail.push(entry);
  }

  return {
    id: parsed.id,
    repositoryRoot: parsed.repositoryRoot,
    diffs,
    metadata: {
      proposer: metadata.proposer,
      summary: metadata.summary,
      changeType: metadata.changeType,
      createdAt: metadata.createdAt,
      tier: metadata.tier,
    },
    state: parsed.state,
    reviewId: parsed.reviewId,
    auditTrail,
  };
}

function parseAuditEntry(value: unknown): AuditEntry | null {
  if (
    !isRecord(value) ||
    typeof value.timestamp !== 'string' ||
    typeof value.event !== 'string' ||
    typeof value.actor !== 'string' ||
    !isAuditOutcome(value.outcome)
  ) {
    return null;
  }

  const entry: AuditEntry = {
    timestamp: value.timestamp,
    event: value.event,
    actor: value.actor,
    outcome: value.outcome,
  };
  if (isProposalState(value.fromState)) entry.fromState = value.fromState;
  if (isProposalState(value.toState)) entry.toState = value.toState;
  if (typeof value.detail === 'string') entry.detail = value.detail;
  return entry;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAuditOutcome(value: unknown): value is AuditOutcome {
  return value === 'success' || value === 'failure' || value === 'info';
}

function lockedError(id: string): Error {
  return new Error(`Proposal ${id} is locked by another writer`);
}

