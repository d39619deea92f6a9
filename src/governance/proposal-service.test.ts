import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProposalService } from './proposal-service';
import { ApprovalGate } from './approval-gate';
import { PrecedentLookup } from './precedent';
import { FileProposalStore } from '../proposals/file-proposal-store';
import { RiskClassifier } from '../classification/risk-classifier';
import { QuorumReviewGraph, quorumPolicyFromTable } from '../review/review-graph';
import { ProposalInputError } from '../types';

describe('ProposalService', () => {
  let repo: string;
  let store: FileProposalStore;

  function createService(autoApprove = true, precedents?: PrecedentLookup): ProposalService {
    const gate = new ApprovalGate(
      store,
      new QuorumReviewGraph(quorumPolicyFromTable({ 1: 1 })),
      ['alice'],
      precedents
    );
    const classifier = new RiskClassifier([
      { tier: 'GOVERN', pattern: '(^|/)core/' },
      { tier: 'ALLOW', pattern: '\\.md$' },
      { tier: 'FREE', pattern: '(^|/)scratch/' },
    ]);
    return new ProposalService(store, classifier, gate, { repositoryRoot: repo, autoApprove });
  }

  beforeEach(() => {
    repo = fs.mkdtempSync(path.join(os.tmpdir(), 'proposal-service-'));
    fs.mkdirSync(path.join(repo, 'docs'));
    fs.writeFileSync(path.join(repo, 'docs', 'guide.md'), 'hello\n');
    store = new FileProposalStore(path.join(repo, '.governance', 'proposals'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(repo, { recursive: true, force: true });
  });

  it('should not record proposals for FREE paths', async () => {
    const result = await createService().propose({
      summary: 'Scratch notes',
      changes: [{ path: 'scratch/notes.txt', newContent: 'anything\n' }],
    });

    expect(result.status).toBe('not_required');
    expect(result.classification.label).toBe('FREE');
    expect(await store.list()).toEqual([]);
  });

  it('should report no change when content is identical', async () => {
    const result = await createService().propose({
      summary: 'Nothing really',
      changes: [{ path: 'docs/guide.md', newContent: 'hello\n' }],
    });

    expect(result.status).toBe('no_change');
    expect(await store.list()).toEqual([]);
  });

  it('should not record a proposal when only FREE files actually change', async () => {
    const result = await createService().propose({
      summary: 'Notes plus an untouched guide',
      changes: [
        { path: 'docs/guide.md', newContent: 'hello\n' },
        { path: 'scratch/notes.txt', newContent: 'anything\n' },
      ],
    });

    expect(result.status).toBe('not_required');
    expect(result.classification).toMatchObject({ label: 'FREE', tier: 4 });
    expect(await store.list()).toEqual([]);
  });

  it('should create and auto-approve a lower-tier proposal', async () => {
    const result = await createService().propose({
      proposer: 'agent-7',
      summary: 'Greet louder',
      changeType: 'docs',
      changes: [{ path: 'docs/guide.md', newContent: 'HELLO\n' }],
    });

    if (result.status !== 'created') throw new Error(`unexpected status ${result.status}`);
    expect(result.autoApproved).toBe(true);
    expect(result.classification.label).toBe('ALLOW');
    expect(result.proposal.state).toBe('committed');
    expect(result.proposal.metadata).toMatchObject({
      proposer: 'agent-7',
      summary: 'Greet louder',
      changeType: 'docs',
      tier: 3,
    });
    expect(result.proposal.diffs).toEqual([
      {
        path: 'docs/guide.md',
        diff: '--- a/docs/guide.md\n+++ b/docs/guide.md\n@@ -1 +1 @@\n-hello\n+HELLO\n',
      },
    ]);
  });

  it('should leave proposals pending when auto-approval is off', async () => {
    const result = await createService(false).propose({
      summary: 'Greet louder',
      changes: [{ path: 'docs/guide.md', newContent: 'HELLO\n' }],
    });

    if (result.status !== 'created') throw new Error(`unexpected status ${result.status}`);
    expect(result.autoApproved).toBe(false);
    expect(result.proposal.state).toBe('pending');
    expect(result.proposal.metadata.proposer).toBe('Unknown');
    expect(result.proposal.metadata.changeType).toBe('change');
  });

  it('should commit a repeat of an applied proposal when auto-approval is off', async () => {
    const service = createService(false, new PrecedentLookup(store));
    const request = {
      summary: 'Greet louder',
      changeType: 'docs',
      changes: [{ path: 'docs/guide.md', newContent: 'HELLO\n' }],
    };

    const first = await service.propose(request);
    if (first.status !== 'created') throw new Error(`unexpected status ${first.status}`);
    expect(first.autoApproved).toBe(false);
    await store.transition(first.proposal.id, 'pending', 'committed');
    await store.transition(first.proposal.id, 'committed', 'applied');

    const second = await service.propose(request);
    if (second.status !== 'created') throw new Error(`unexpected status ${second.status}`);
    expect(second.autoApproved).toBe(true);
    expect(second.proposal.state).toBe('committed');
  });

  it('should keep GOVERN proposals pending and use the strictest tier', async () => {
    const result = await createService().propose({
      summary: 'Touch the core\nwith more detail below',
      changes: [
        { path: 'docs/guide.md', newContent: 'HELLO\n' },
        { path: path.join(repo, 'core', 'engine.py'), newContent: 'run()\n' },
      ],
    });

    if (result.status !== 'created') throw new Error(`unexpected status ${result.status}`);
    expect(result.classification.label).toBe('GOVERN');
    expect(result.autoApproved).toBe(false);
    expect(result.proposal.state).toBe('pending');
    expect(result.proposal.metadata.summary).toBe('Touch the core');
    expect(result.proposal.metadata.tier).toBe(1);
    expect(result.proposal.diffs.map((d) => d.path)).toEqual(['docs/guide.md', 'core/engine.py']);
    expect(result.proposal.diffs[1].diff).toBe(
      '--- /dev/null\n+++ b/core/engine.py\n@@ -0,0 +1 @@\n+run()\n'
    );
  });

  it('should default unmatched paths to INFORM', async () => {
    const result = await createService().propose({
      summary: 'New module',
      changes: [{ path: 'src/app.ts', newContent: 'export {};\n' }],
    });

    expect(result.classification).toMatchObject({ label: 'INFORM', matchedRule: null });
  });

  it('should refuse paths outside the repository', async () => {
    await expect(
      createService().propose({
        summary: 'Escape',
        changes: [{ path: '../outside.txt', newContent: 'x\n' }],
      })
    ).rejects.toThrow(ProposalInputError);
  });

  it('should refuse an empty change list', async () => {
    await expect(createService().propose({ summary: 'Nothing', changes: [] })).rejects.toThrow(
      'A proposal needs at least one change'
    );
  });

  describe('importDocument', () => {
    it('should create a proposal from a document', async () => {
      const document = [
        '# Governance Proposal',
        '',
        '**Proposer:** agent-9',
        '**Type:** refactor',
        '',
        '## Summary',
        '',
        'Rename the engine entry point',
        '',
        '```diff',
        '--- a/core/engine.py+++ b/core/engine.py',
        '@@ -1 +1 @@',
        '-start()',
        '+run()',
        '```',
        '',
      ].join('\n');

      const result = await createService().importDocument(document);

      if (result.status !== 'created') throw new Error(`unexpected status ${result.status}`);
      expect(result.classification.label).toBe('GOVERN');
      expect(result.proposal.metadata).toMatchObject({
        proposer: 'agent-9',
        changeType: 'refactor',
        summary: 'Rename the engine entry point',
        tier: 1,
      });
      expect(result.proposal.diffs).toEqual([
        {
          path: 'core/engine.py',
          diff: '--- a/core/engine.py\n+++ b/core/engine.py\n@@ -1 +1 @@\n-start()\n+run()\n',
        },
      ]);
    });

    it('should create nothing for a document touching only FREE paths', async () => {
      const document = ['```diff', '--- /dev/null', '+++ b/scratch/todo.txt', '@@ -0,0 +1 @@', '+later', '```', ''].join('\n');

      const result = await createService().importDocument(document);

      expect(result.status).toBe('not_required');
      expect(result.classification.label).toBe('FREE');
      expect(await store.list()).toEqual([]);
    });

    it('should reject documents without diffs', async () => {
      await expect(createService().importDocument('# Empty\n')).rejects.toThrow(ProposalInputError);
    });
  });
});
