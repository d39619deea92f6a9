import { promises as fsp } from 'fs';
import * as path from 'path';
import {
  Classification,
  FileDiff,
  Proposal,
  ProposalInputError,
  errorMessage,
  isErrnoError,
} from '../types';
import { RiskClassifier } from '../classification/risk-classifier';
import { makeDiff, toPatchPath } from '../diff/diff-generator';
import { ProposalStore } from '../proposals/proposal-store';
import { ParsedProposalDocument, parseProposalDocument } from '../proposals/proposal-document';
import { ApprovalGate } from './approval-gate';
import {
  emitClassification,
  emitProposalCreated,
  recordClassification,
  recordProposal,
} from '../observability';

export interface ProposedChange {
  /** Path relative to the repository root (absolute paths inside it are accepted) */
  path: string;
  newContent: string;
}

export interface ProposeRequest {
  proposer?: string;
  summary: string;
  changeType?: string;
  changes: ProposedChange[];
}

export type ProposeResult =
  | { status: 'not_required'; classification: Classification }
  | { status: 'no_change'; classification: Classification }
  | { status: 'created'; classification: Classification; proposal: Proposal; autoApproved: boolean };

export type CreatedProposal = Extract<ProposeResult, { status: 'created' }>;

export interface ProposalServiceOptions {
  repositoryRoot: string;
  autoApprove: boolean;
}

/**
 * Entry point for agents: classify the target paths, diff them against the
 * working tree and record a pending proposal when governance applies.
 *
 * Paths are classified repository-relative, so rule tables do not depend on
 * where the repository is checked out.
 */
export class ProposalService {
  constructor(
    private readonly store: ProposalStore,
    private readonly classifier: RiskClassifier,
    private readonly gate: ApprovalGate,
    private readonly options: ProposalServiceOptions
  ) {}

  classify(filePath: string): Classification {
    const classification = this.classifier.classify(filePath);
    emitClassification(classification);
    recordClassification(classification.label);
    return classification;
  }

  async propose(request: ProposeRequest): Promise<ProposeResult> {
    if (request.changes.length === 0) {
      throw new ProposalInputError('A proposal needs at least one change');
    }
    if (!request.summary.trim()) {
      throw new ProposalInputError('A proposal needs a summary');
    }

    const changes = request.changes.map((change) => ({
      relPath: this.relativePath(change.path),
      newContent: change.newContent,
    }));

    const overall = this.classifyAll(changes.map((c) => c.relPath));
    if (overall.policy === 'immediate') {
      return { status: 'not_required', classification: overall };
    }

    const diffs: FileDiff[] = [];
    for (const change of changes) {
      const current = await this.readCurrent(change.relPath);
      const diff = makeDiff(current, change.newContent, change.relPath);
      if (diff) diffs.push({ path: change.relPath, diff });
    }

    if (diffs.length === 0) {
      return { status: 'no_change', classification: overall };
    }

    // Unchanged files drop out, so the tier can fall to FREE here
    const classification = this.classifier.classifyMany(diffs.map((d) => d.path));
    if (classification.policy === 'immediate') {
      return { status: 'not_required', classification };
    }
    return this.create(diffs, classification, {
      proposer: request.proposer || 'Unknown',
      summary: firstLine(request.summary),
      changeType: request.changeType || 'change',
    });
  }

  /**
   * Create a proposal from a markdown proposal document, e.g. one an agent
   * wrote by hand. The tier comes from the paths in its diff headers; a
   * document touching only FREE paths creates nothing.
   */
  async importDocument(text: string): Promise<ProposeResult> {
    let document: ParsedProposalDocument;
    try {
      document = parseProposalDocument(text);
    } catch (error) {
      throw new ProposalInputError(errorMessage(error));
    }
    const classification = this.classifier.classifyMany(document.diffs.map((d) => d.path));
    if (classification.policy === 'immediate') {
      return { status: 'not_required', classification };
    }

    return this.create(document.diffs, classification, {
      proposer: document.proposer,
      summary: document.summary,
      changeType: document.changeType,
    });
  }

  private async create(
    diffs: FileDiff[],
    classification: Classification,
    meta: { proposer: string; summary: string; changeType: string }
  ): Promise<CreatedProposal> {
    const proposal = await this.store.create({
      repositoryRoot: this.options.repositoryRoot,
      diffs,
      proposer: meta.proposer,
      summary: meta.summary,
      changeType: meta.changeType,
      tier: classification.tier,
    });

    console.log(
      `[ProposalService] Created ${proposal.id} (${classification.label}, ${diffs.length} file(s)) for ${meta.proposer}`
    );
    emitProposalCreated(proposal);
    recordProposal(classification.label);

    let autoApproved = false;
    if (classification.policy !== 'mandatory_approval') {
      autoApproved = this.options.autoApprove
        ? await this.gate.autoPromote(proposal.id)
        : await this.gate.promoteByPrecedent(proposal.id);
    }

    const current = autoApproved ? await this.store.get(proposal.id) : proposal;
    return { status: 'created', classification, proposal: current ?? proposal, autoApproved };
  }

  private classifyAll(paths: string[]): Classification {
    const results = paths.map((p) => this.classify(p));
    return results.reduce((strictest, r) => (r.tier < strictest.tier ? r : strictest));
  }

  private relativePath(filePath: string): string {
    const absolute = path.resolve(this.options.repositoryRoot, filePath);
    const relative = path.relative(this.options.repositoryRoot, absolute);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ProposalInputError(`Path is outside the repository: ${filePath}`);
    }
    return toPatchPath(relative);
  }

  private async readCurrent(relPath: string): Promise<string | null> {
    try {
      return await fsp.readFile(path.join(this.options.repositoryRoot, relPath), 'utf8');
    } catch (error) {
      if (isErrnoError(error, 'ENOENT')) return null;
      throw error;
    }
  }
}

function firstLine(text: string): string {
  return text.trim().split(/\r?\n/)[0];
}
