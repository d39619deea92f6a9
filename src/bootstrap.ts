import * as path from 'path';
import { GovernanceConfig } from './types';
import { ProposalStore } from './proposals/proposal-store';
import { FileProposalStore } from './proposals/file-proposal-store';
import { PostgresProposalStore, PostgresReviewStore } from './db/repositories';
import { closeDatabase, ensureSchema, initializeDatabase } from './db/connection';
import { RiskClassifier } from './classification/risk-classifier';
import { QuorumReviewGraph, ReviewGraph, quorumPolicyFromTable } from './review/review-graph';
import { FileReviewStore, ReviewRecordStore } from './review/review-store';
import { ApprovalGate } from './governance/approval-gate';
import { PrecedentLookup } from './governance/precedent';
import { ProposalService } from './governance/proposal-service';
import { PatchApplier } from './apply/patch-applier';
import { RepositoryLock } from './apply/repository-lock';
import { GitBackend } from './apply/git-backend';
import { VcsBackend } from './apply/vcs-backend';
import { createRiskClassifier, proposalsDirectory } from './config/load-config';

export interface PipelineOptions {
  /** Selects the Postgres store; the file store is used without it */
  databaseUrl?: string;
  /** Defaults to git in the governed repository */
  vcs?: VcsBackend;
}

export interface Pipeline {
  config: GovernanceConfig;
  store: ProposalStore;
  classifier: RiskClassifier;
  reviews: ReviewGraph;
  gate: ApprovalGate;
  service: ProposalService;
  applier: PatchApplier;
  close(): Promise<void>;
}

/**
 * Wire the pipeline components for one governed repository
 */
export async function createPipeline(
  config: GovernanceConfig,
  options: PipelineOptions = {}
): Promise<Pipeline> {
  let store: ProposalStore;
  let reviewRecords: ReviewRecordStore;

  if (options.databaseUrl) {
    const pool = initializeDatabase(options.databaseUrl);
    await ensureSchema(pool);
    store = new PostgresProposalStore(pool);
    reviewRecords = new PostgresReviewStore(pool);
    console.log('[Pipeline] Using Postgres proposal store');
  } else {
    const directory = proposalsDirectory(config);
    store = new FileProposalStore(directory);
    reviewRecords = new FileReviewStore(path.join(directory, 'reviews'));
    console.log(`[Pipeline] Using file proposal store at ${directory}`);
  }

  const classifier = createRiskClassifier(config);
  const reviews = new QuorumReviewGraph(quorumPolicyFromTable(config.review.quorum), reviewRecords);
  const precedents = config.proposals.precedent ? new PrecedentLookup(store) : undefined;
  const gate = new ApprovalGate(store, reviews, config.review.reviewers, precedents);
  const service = new ProposalService(store, classifier, gate, {
    repositoryRoot: config.repositoryRoot,
    autoApprove: config.proposals.autoApprove,
  });

  const vcs =
    options.vcs ??
    new GitBackend(config.repositoryRoot, {
      timeoutMs: config.apply.timeoutMs,
    });
  const applier = new PatchApplier(store, vcs, {
    maxAttempts: config.apply.maxAttempts,
    timeoutMs: config.apply.timeoutMs,
    coAuthor: config.apply.coAuthor,
    lock: RepositoryLock.forRepository(config.repositoryRoot),
    repositoryRoot: config.repositoryRoot,
  });

  return {
    config,
    store,
    classifier,
    reviews,
    gate,
    service,
    applier,
    close: async () => {
      if (options.databaseUrl) {
        await closeDatabase();
      }
    },
  };
}
