import { HunkLine } from '../types';
import { splitLines, hasTerminator, stripTerminator } from './text-lines';

export const DEFAULT_CONTEXT_LINES = 3;

export const NO_NEWLINE_MARKER = '\\ No newline at end of file';

interface EditOp extends HunkLine {
  /** Old lines consumed before this op */
  oldPos: number;
  /** New lines consumed before this op */
  newPos: number;
}

export interface DiffOptions {
  context?: number;
}

/**
 * Compute a minimal line edit script between two line arrays.
 *
 * Common prefix and suffix are matched directly; the remaining middle is
 * aligned with a longest-common-subsequence table. When a line could be
 * either deleted or inserted first, deletions come first.
 */
export function computeEditScript(oldLines: string[], newLines: string[]): HunkLine[] {
  let prefix = 0;
  while (
    prefix < oldLines.length &&
    prefix < newLines.length &&
    oldLines[prefix] === newLines[prefix]
  ) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix++;
  }

  const a = oldLines.slice(prefix, oldLines.length - suffix);
  const b = newLines.slice(prefix, newLines.length - suffix);
  const ops: HunkLine[] = oldLines.slice(0, prefix).map((text) => ({ op: ' ', text }));

  // lcs[i * (m + 1) + j] = LCS length of a[i..] and b[j..]
  const n = a.length;
  const m = b.length;
  const width = m + 1;
  const lcs = new Uint32Array((n + 1) * width);
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lcs[i * width + j] =
        a[i] === b[j]
          ? lcs[(i + 1) * width + j + 1] + 1
          : Math.max(lcs[(i + 1) * width + j], lcs[i * width + j + 1]);
    }
  }

  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    if (i < n && j < m && a[i] === b[j]) {
      ops.push({ op: ' ', text: a[i] });
      i++;
      j++;
    } else if (j >= m || (i < n && lcs[(i + 1) * width + j] >= lcs[i * width + j + 1])) {
      ops.push({ op: '-', text: a[i] });
      i++;
    } else {
      ops.push({ op: '+', text: b[j] });
      j++;
    }
  }

  for (const text of oldLines.slice(oldLines.length - suffix)) {
    ops.push({ op: ' ', text });
  }

  return ops;
}

/**
 * Generate a unified diff for one file.
 *
 * A null original is treated as empty content and rendered with a /dev/null
 * old-file header so the patch creates the file. Returns '' when the contents
 * are identical: there is nothing to propose.
 *
 * @param oldContent - Current content, or null when the file does not exist
 * @param newContent - Proposed content
 * @param filePath - Repository-relative path used in the a/ and b/ headers
 */
export function makeDiff(
  oldContent: string | null,
  newContent: string,
  filePath: string,
  options: DiffOptions = {}
): string {
  const context = options.context ?? DEFAULT_CONTEXT_LINES;
  const oldLines = splitLines(oldContent ?? '');
  const newLines = splitLines(newContent);
  const script = computeEditScript(oldLines, newLines);

  if (script.every((line) => line.op === ' ')) {
    return '';
  }

  const relPath = toPatchPath(filePath);
  const out: string[] = [
    oldContent === null ? '--- /dev/null' : `--- a/${relPath}`,
    `+++ b/${relPath}`,
  ];

  for (const hunk of groupHunks(positionOps(script), context)) {
    out.push(formatHunkHeader(hunk));
    for (const line of hunk) {
      out.push(line.op + stripTerminator(line.text));
      if (!hasTerminator(line.text)) {
        out.push(NO_NEWLINE_MARKER);
      }
    }
  }

  return out.join('\n') + '\n';
}

/**
 * Canonical relative path for patch headers: / separators, no leading ./ or /
 */
export function toPatchPath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

function positionOps(script: HunkLine[]): EditOp[] {
  let oldPos = 0;
  let newPos = 0;
  return script.map((line) => {
    const op: EditOp = { ...line, oldPos, newPos };
    if (line.op !== '+') oldPos++;
    if (line.op !== '-') newPos++;
    return op;
  });
}

/**
 * Group changed lines into hunks with `context` lines around them. Changes
 * separated by at most 2 * context unchanged lines share a hunk.
 */
function groupHunks(ops: EditOp[], context: number): EditOp[][] {
  const changes: number[] = [];
  ops.forEach((op, index) => {
    if (op.op !== ' ') changes.push(index);
  });

  const hunks: EditOp[][] = [];
  let groupStart = 0;
  for (let k = 1; k <= changes.length; k++) {
    const endOfGroup =
      k === changes.length || changes[k] - changes[k - 1] - 1 > 2 * context;
    if (!endOfGroup) continue;

    const from = Math.max(0, changes[groupStart] - context);
    const to = Math.min(ops.length - 1, changes[k - 1] + context);
    hunks.push(ops.slice(from, to + 1));
    groupStart = k;
  }

  return hunks;
}

function formatHunkHeader(hunk: EditOp[]): string {
  const first = hunk[0];
  const oldCount = hunk.filter((l) => l.op !== '+').length;
  const newCount = hunk.filter((l) => l.op !== '-').length;
  return `@@ -${formatRange(first.oldPos, oldCount)} +${formatRange(first.newPos, newCount)} @@`;
}

/**
 * Unified range: a zero-length range starts at the line before it
 */
function formatRange(position: number, count: number): string {
  const start = count === 0 ? position : position + 1;
  return count === 1 ? `${start}` : `${start},${count}`;
}
