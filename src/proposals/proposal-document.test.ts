import {
  combineDiffs,
  parseProposalDocument,
  renderProposalDocument,
  repairDiff,
  splitFileDiffs,
} from './proposal-document';
import { Proposal } from '../types';

const GUIDE_DIFF = '--- a/docs/guide.md\n+++ b/docs/guide.md\n@@ -1 +1 @@\n-old\n+new\n';
const NOTES_DIFF = '--- /dev/null\n+++ b/notes.txt\n@@ -0,0 +1 @@\n+hello\n';

function makeProposal(overrides: Partial<Proposal> = {}): Proposal {
  return {
    id: '20260101T120000000Z-0a1b2c3d',
    repositoryRoot: '/srv/repo',
    diffs: [
      { path: 'docs/guide.md', diff: GUIDE_DIFF },
      { path: 'notes.txt', diff: NOTES_DIFF },
    ],
    metadata: {
      proposer: 'agent-7',
      summary: 'Clarify the guide',
      changeType: 'docs',
      createdAt: '2026-01-01T12:00:00.000Z',
      tier: 2,
    },
    state: 'pending',
    auditTrail: [],
    ...overrides,
  };
}

describe('renderProposalDocument', () => {
  it('should write metadata fields in order', () => {
    const lines = renderProposalDocument(makeProposal()).split('\n');

    expect(lines.slice(0, 8)).toEqual([
      '# Governance Proposal: Clarify the guide',
      '',
      '**Proposal ID:** 20260101T120000000Z-0a1b2c3d',
      '**Proposer:** agent-7',
      '**Type:** docs',
      '**Tier:** 2 (INFORM)',
      '**Repository:** /srv/repo',
      '**Created:** 2026-01-01T12:00:00.000Z',
    ]);
  });

  it('should emit one fenced diff block per file', () => {
    const text = renderProposalDocument(makeProposal());

    expect(text).toContain('### docs/guide.md\n\n```diff\n--- a/docs/guide.md\n');
    expect(text).toContain('+new\n```\n');
    expect(text).toContain('### notes.txt\n\n```diff\n--- /dev/null\n');
  });

  it('should parse back to the same diffs and metadata', () => {
    const parsed = parseProposalDocument(renderProposalDocument(makeProposal()));

    expect(parsed).toEqual({
      id: '20260101T120000000Z-0a1b2c3d',
      proposer: 'agent-7',
      changeType: 'docs',
      summary: 'Clarify the guide',
      diffs: [
        { path: 'docs/guide.md', diff: GUIDE_DIFF },
        { path: 'notes.txt', diff: NOTES_DIFF },
      ],
    });
  });
});

describe('parseProposalDocument', () => {
  it('should fall back to defaults when metadata is missing', () => {
    const parsed = parseProposalDocument('Some change\n\n```diff\n' + GUIDE_DIFF + '```\n');

    expect(parsed.id).toBeUndefined();
    expect(parsed.proposer).toBe('Unknown');
    expect(parsed.changeType).toBe('change');
    expect(parsed.summary).toBe('Governance change');
    expect(parsed.diffs).toEqual([{ path: 'docs/guide.md', diff: GUIDE_DIFF }]);
  });

  it('should join multiple diff blocks in document order', () => {
    const text = ['```diff', NOTES_DIFF + '```', '', '```diff', GUIDE_DIFF + '```', ''].join('\n');

    expect(parseProposalDocument(text).diffs.map((d) => d.path)).toEqual([
      'notes.txt',
      'docs/guide.md',
    ]);
  });

  it('should keep code fences that appear inside diff lines', () => {
    const readmeDiff =
      '--- a/README.md\n+++ b/README.md\n@@ -1,2 +1,5 @@\n # Title\n-text\n+```ts\n+const x = 1;\n+```\n+text\n';
    const text = renderProposalDocument(makeProposal({ diffs: [{ path: 'README.md', diff: readmeDiff }] }));

    expect(parseProposalDocument(text).diffs).toEqual([{ path: 'README.md', diff: readmeDiff }]);
  });

  it('should reject a document without a diff block', () => {
    expect(() => parseProposalDocument('# Proposal\n\nNothing here\n')).toThrow(
      'Proposal document contains no ```diff block'
    );
  });

  it('should reject diff blocks without file headers', () => {
    expect(() => parseProposalDocument('```diff\n@@ -1 +1 @@\n-a\n+b\n```\n')).toThrow(
      'Proposal document diff blocks contain no file headers'
    );
  });
});

describe('repairDiff', () => {
  it('should split run-together file headers', () => {
    expect(repairDiff('--- a/foo.py+++ b/foo.py\n@@ -1 +1 @@\n-x\n+y')).toBe(
      '--- a/foo.py\n+++ b/foo.py\n@@ -1 +1 @@\n-x\n+y\n'
    );
  });

  it('should leave well-formed headers untouched', () => {
    expect(repairDiff(GUIDE_DIFF)).toBe(GUIDE_DIFF);
  });
});

describe('splitFileDiffs', () => {
  it('should take the old path for deletions', () => {
    const diffs = splitFileDiffs('--- a/gone.txt\n+++ /dev/null\n@@ -1 +0,0 @@\n-bye\n');

    expect(diffs).toEqual([
      { path: 'gone.txt', diff: '--- a/gone.txt\n+++ /dev/null\n@@ -1 +0,0 @@\n-bye\n' },
    ]);
  });

  it('should drop lines before the first header', () => {
    expect(splitFileDiffs('diff --git a/x b/x\n' + GUIDE_DIFF)).toEqual([
      { path: 'docs/guide.md', diff: GUIDE_DIFF },
    ]);
  });
});

describe('combineDiffs', () => {
  it('should terminate each diff before joining', () => {
    expect(
      combineDiffs([
        { path: 'a', diff: 'one' },
        { path: 'b', diff: 'two\n' },
      ])
    ).toBe('one\ntwo\n');
  });
});
