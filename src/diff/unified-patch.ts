import { FilePatch, Hunk, HunkLine, PatchConflictError, PatchParseError } from '../types';
import { splitLines } from './text-lines';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

/**
 * Parse unified diff text into per-file patches.
 *
 * Parsing is strict: every hunk body must contain exactly the number of old
 * and new lines its header declares. Preamble lines (diff --git, index, ...)
 * before a file header are ignored.
 */
export function parsePatch(text: string): FilePatch[] {
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  const files: FilePatch[] = [];
  let i = 0;

  while (i < lines.length) {
    if (!isFileHeader(lines, i)) {
      if (lines[i].startsWith('@@')) {
        throw new PatchParseError(`Hunk without file header at line ${i + 1}`);
      }
      i++;
      continue;
    }

    const file: FilePatch = {
      oldPath: parseHeaderPath(lines[i].slice(4), 'a/'),
      newPath: parseHeaderPath(lines[i + 1].slice(4), 'b/'),
      hunks: [],
    };
    i += 2;

    while (i < lines.length && lines[i].startsWith('@@')) {
      const [hunk, next] = parseHunk(lines, i);
      file.hunks.push(hunk);
      i = next;
    }

    if (file.hunks.length === 0) {
      throw new PatchParseError(`No hunks for ${describePath(file)}`);
    }
    files.push(file);
  }

  return files;
}

function isFileHeader(lines: string[], i: number): boolean {
  return (
    lines[i].startsWith('--- ') &&
    i + 1 < lines.length &&
    lines[i + 1].startsWith('+++ ')
  );
}

function parseHeaderPath(raw: string, prefix: string): string | null {
  // Drop trailing timestamps separated by a tab
  const value = raw.split('\t')[0].trim();
  if (value === '/dev/null') return null;
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

function parseHunk(lines: string[], start: number): [Hunk, number] {
  const match = HUNK_HEADER.exec(lines[start]);
  if (!match) {
    throw new PatchParseError(`Malformed hunk header at line ${start + 1}: ${lines[start]}`);
  }

  const hunk: Hunk = {
    oldStart: Number(match[1]),
    oldLines: match[2] === undefined ? 1 : Number(match[2]),
    newStart: Number(match[3]),
    newLines: match[4] === undefined ? 1 : Number(match[4]),
    lines: [],
  };

  let oldRemaining = hunk.oldLines;
  let newRemaining = hunk.newLines;
  let i = start + 1;

  while (oldRemaining > 0 || newRemaining > 0) {
    if (i >= lines.length) {
      throw new PatchParseError(
        `Hunk at line ${start + 1} ends early: ${oldRemaining} old and ${newRemaining} new line(s) missing`
      );
    }

    const line = lines[i];
    if (line.startsWith('\\')) {
      markNoNewline(hunk.lines, i);
      i++;
      continue;
    }

    // Some tools drop the leading space of empty context lines
    const op = line === '' ? ' ' : line[0];
    const body: HunkLine = { op: ' ', text: line.slice(1) + '\n' };
    if (op === ' ') {
      oldRemaining--;
      newRemaining--;
    } else if (op === '-') {
      body.op = '-';
      oldRemaining--;
    } else if (op === '+') {
      body.op = '+';
      newRemaining--;
    } else {
      throw new PatchParseError(`Unexpected line in hunk at line ${i + 1}: ${line}`);
    }

    if (oldRemaining < 0 || newRemaining < 0) {
      throw new PatchParseError(
        `Hunk at line ${start + 1} has more lines than its header declares`
      );
    }
    hunk.lines.push(body);
    i++;
  }

  if (i < lines.length && lines[i].startsWith('\\')) {
    markNoNewline(hunk.lines, i);
    i++;
  }

  if (
    i < lines.length &&
    !lines[i].startsWith('@@') &&
    !isFileHeader(lines, i) &&
    /^[ +-]/.test(lines[i])
  ) {
    throw new PatchParseError(
      `Hunk at line ${start + 1} has more lines than its header declares`
    );
  }

  return [hunk, i];
}

function markNoNewline(hunkLines: HunkLine[], lineIndex: number): void {
  const previous = hunkLines[hunkLines.length - 1];
  if (!previous) {
    throw new PatchParseError(`No-newline marker without a preceding line at line ${lineIndex + 1}`);
  }
  previous.text = previous.text.slice(0, -1);
}

function describePath(file: FilePatch): string {
  return file.newPath ?? file.oldPath ?? '(unknown)';
}

/**
 * Path a file patch writes to (its old path for deletions)
 */
export function targetPath(file: FilePatch): string {
  return describePath(file);
}

/**
 * Apply one file patch to content.
 *
 * Hunks must apply in order. Each hunk is tried at its declared position and
 * then at increasing offsets, but its context and removed lines must match
 * exactly. Returns null when the patch deletes the file.
 *
 * @param content - Current content, or null when the file does not exist
 */
export function applyFilePatch(content: string | null, file: FilePatch): string | null {
  const path = describePath(file);

  if (file.oldPath === null && content !== null) {
    throw new PatchConflictError(path, 'already exists in working tree');
  }
  if (file.oldPath !== null && content === null) {
    throw new PatchConflictError(path, 'does not exist in working tree');
  }

  const source = splitLines(content ?? '');
  const out: string[] = [];
  let cursor = 0;

  for (const hunk of file.hunks) {
    const expected = hunk.lines.filter((l) => l.op !== '+').map((l) => l.text);
    const replacement = hunk.lines.filter((l) => l.op !== '-').map((l) => l.text);
    const desired = hunk.oldLines === 0 ? hunk.oldStart : hunk.oldStart - 1;

    const position = locateHunk(source, expected, desired, cursor);
    if (position === -1) {
      throw new PatchConflictError(
        path,
        `hunk @@ -${hunk.oldStart},${hunk.oldLines} @@ does not match current content`
      );
    }

    out.push(...source.slice(cursor, position), ...replacement);
    cursor = position + expected.length;
  }
  out.push(...source.slice(cursor));

  if (file.newPath === null) {
    if (out.length > 0) {
      throw new PatchConflictError(path, 'deletion leaves content behind');
    }
    return null;
  }

  return out.join('');
}

function locateHunk(source: string[], expected: string[], desired: number, floor: number): number {
  const last = source.length - expected.length;
  const maxOffset = Math.max(desired - floor, last - desired);

  for (let offset = 0; offset <= maxOffset; offset++) {
    for (const candidate of offset === 0 ? [desired] : [desired - offset, desired + offset]) {
      if (candidate >= floor && candidate <= last && matchesAt(source, expected, candidate)) {
        return candidate;
      }
    }
  }

  return -1;
}

function matchesAt(source: string[], expected: string[], position: number): boolean {
  return expected.every((line, k) => source[position + k] === line);
}

export type PatchCheckResult = { ok: true; paths: string[] } | { ok: false; message: string };

/**
 * Dry-run a patch against a file map without mutating it.
 * All files must apply for the check to pass.
 */
export function checkPatch(files: ReadonlyMap<string, string>, patchText: string): PatchCheckResult {
  try {
    const next = applyPatch(files, patchText);
    return { ok: true, paths: changedPaths(files, next) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Apply a multi-file patch to a file map, returning a new map.
 * Either every file patch applies or an error is thrown and nothing changes.
 */
export function applyPatch(
  files: ReadonlyMap<string, string>,
  patchText: string
): Map<string, string> {
  const patches = parsePatch(patchText);
  if (patches.length === 0) {
    throw new PatchParseError('Patch contains no file changes');
  }

  const next = new Map(files);
  for (const file of patches) {
    const path = describePath(file);
    const current = file.oldPath === null ? next.get(path) ?? null : next.get(file.oldPath) ?? null;
    const result = applyFilePatch(current, file);

    if (file.oldPath !== null && file.oldPath !== file.newPath) {
      next.delete(file.oldPath);
    }
    if (result === null) {
      next.delete(path);
    } else {
      next.set(path, result);
    }
  }

  return next;
}

/**
 * Paths touched by a patch, in patch order, without duplicates
 */
export function patchPaths(patchText: string): string[] {
  const paths: string[] = [];
  for (const file of parsePatch(patchText)) {
    for (const p of [file.oldPath, file.newPath]) {
      if (p !== null && !paths.includes(p)) paths.push(p);
    }
  }
  return paths;
}

function changedPaths(
  before: ReadonlyMap<string, string>,
  after: ReadonlyMap<string, string>
): string[] {
  const keys = new Set([...before.keys(), ...after.keys()]);
  return [...keys].filter((k) => before.get(k) !== after.get(k)).sort();
}
