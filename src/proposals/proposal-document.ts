import { FileDiff, Proposal, tierByRank } from '../types';

/**
 * Fields recovered from a proposal document
 */
export interface ParsedProposalDocument {
  id?: string;
  proposer: string;
  changeType: string;
  summary: string;
  diffs: FileDiff[];
}

// Fences count only at the start of a line; diff lines always carry a prefix
const DIFF_BLOCK = /^```diff[ \t]*\r?\n([\s\S]*?)^```[ \t]*\r?$/gm;

/**
 * Render a proposal as the markdown record reviewers read: ordered metadata
 * fields, a one-line summary, then one fenced diff block per file.
 */
export function renderProposalDocument(proposal: Proposal): string {
  const { metadata } = proposal;
  const tier = tierByRank(metadata.tier);

  const sections = [
    `# Governance Proposal: ${metadata.summary}`,
    '',
    `**Proposal ID:** ${proposal.id}`,
    `**Proposer:** ${metadata.proposer}`,
    `**Type:** ${metadata.changeType}`,
    `**Tier:** ${tier.rank} (${tier.label})`,
    `**Repository:** ${proposal.repositoryRoot}`,
    `**Created:** ${metadata.createdAt}`,
    '',
    '## Summary',
    '',
    metadata.summary,
    '',
    '## Changes',
    '',
  ];

  for (const fileDiff of proposal.diffs) {
    sections.push(`### ${fileDiff.path}`, '', '```diff', fileDiff.diff.replace(/\n$/, ''), '```', '');
  }

  return sections.join('\n');
}

/**
 * Parse a proposal document written by an agent or by renderProposalDocument.
 *
 * Diff blocks are kept in document order and split per file. Diff bodies are
 * not validated here; malformed hunks surface later as validation failures.
 */
export function parseProposalDocument(text: string): ParsedProposalDocument {
  const blocks = [...text.matchAll(DIFF_BLOCK)].map((m) => repairDiff(m[1]));
  if (blocks.length === 0) {
    throw new Error('Proposal document contains no ```diff block');
  }

  const diffs = blocks.flatMap(splitFileDiffs);
  if (diffs.length === 0) {
    throw new Error('Proposal document diff blocks contain no file headers');
  }

  return {
    id: matchField(text, /\*\*Proposal ID:\*\* (.+)/),
    proposer: matchField(text, /\*\*Proposer:\*\* (.+)/) ?? 'Unknown',
    changeType: matchField(text, /\*\*Type:\*\* (.+)/) ?? 'change',
    summary: matchField(text, /## Summary\r?\n\r?\n(.+)/) ?? 'Governance change',
    diffs,
  };
}

/**
 * Concatenate per-file diffs, in order, into one newline-terminated patch
 */
export function combineDiffs(diffs: FileDiff[]): string {
  return diffs.map((d) => (d.diff.endsWith('\n') ? d.diff : `${d.diff}\n`)).join('');
}

function matchField(text: string, pattern: RegExp): string | undefined {
  const match = pattern.exec(text);
  return match ? match[1].trim() : undefined;
}

/**
 * Agents sometimes emit "--- a/foo.py+++ b/foo.py" on a single line.
 * Split such headers back onto two lines and terminate the block.
 */
export function repairDiff(block: string): string {
  const repaired = block.replace(/(--- (?:a\/\S+?|\/dev\/null))[ \t]*(\+\+\+ (?:b\/|\/dev\/null))/g, '$1\n$2');
  return repaired.endsWith('\n') ? repaired : `${repaired}\n`;
}

/**
 * Split a diff block into one FileDiff per file header pair.
 * Lines before the first header are dropped.
 */
export function splitFileDiffs(block: string): FileDiff[] {
  const lines = block.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  const diffs: FileDiff[] = [];
  let current: { path: string; lines: string[] } | null = null;

  for (let i = 0; i < lines.length; i++) {
    const isHeader =
      lines[i].startsWith('--- ') && i + 1 < lines.length && lines[i + 1].startsWith('+++ ');

    if (isHeader) {
      if (current) diffs.push({ path: current.path, diff: current.lines.join('\n') + '\n' });
      current = { path: headerPath(lines[i], lines[i + 1]), lines: [lines[i], lines[i + 1]] };
      i++;
      continue;
    }

    current?.lines.push(lines[i]);
  }

  if (current) diffs.push({ path: current.path, diff: current.lines.join('\n') + '\n' });
  return diffs;
}

function headerPath(oldHeader: string, newHeader: string): string {
  const clean = (header: string, prefix: string) => {
    const value = header.slice(4).split('\t')[0].trim();
    return value.startsWith(prefix) ? value.slice(prefix.length) : value;
  };

  const newPath = clean(newHeader, 'b/');
  return newPath === '/dev/null' ? clean(oldHeader, 'a/') : newPath;
}
