import {
  applyFilePatch,
  applyPatch,
  checkPatch,
  parsePatch,
  patchPaths,
} from './unified-patch';
import { makeDiff } from './diff-generator';
import { PatchConflictError, PatchParseError } from '../types';

describe('parsePatch', () => {
  it('should parse file headers and hunks', () => {
    const [file] = parsePatch(
      ['diff --git a/f b/f', '--- a/f', '+++ b/f', '@@ -1,2 +1,2 @@', ' a', '-b', '+c', ''].join('\n')
    );

    expect(file.oldPath).toBe('f');
    expect(file.newPath).toBe('f');
    expect(file.hunks).toHaveLength(1);
    expect(file.hunks[0]).toEqual({
      oldStart: 1,
      oldLines: 2,
      newStart: 1,
      newLines: 2,
      lines: [
        { op: ' ', text: 'a\n' },
        { op: '-', text: 'b\n' },
        { op: '+', text: 'c\n' },
      ],
    });
  });

  it('should default omitted counts to one and strip timestamps', () => {
    const [file] = parsePatch('--- a/f\t2026-01-01\n+++ b/f\t2026-01-02\n@@ -3 +3 @@\n-x\n+y\n');
    expect(file.oldPath).toBe('f');
    expect(file.hunks[0].oldLines).toBe(1);
    expect(file.hunks[0].newLines).toBe(1);
  });

  it('should read /dev/null as a missing side', () => {
    const [file] = parsePatch('--- /dev/null\n+++ b/new.txt\n@@ -0,0 +1 @@\n+hi\n');
    expect(file.oldPath).toBeNull();
    expect(file.newPath).toBe('new.txt');
  });

  it('should reject a hunk shorter than its header', () => {
    const text = '--- a/f\n+++ b/f\n@@ -1,3 +1,3 @@\n a\n-b\n+x\n';
    expect(() => parsePatch(text)).toThrow(PatchParseError);
    expect(() => parsePatch(text)).toThrow('ends early');
  });

  it('should reject a hunk longer than its header', () => {
    const text = '--- a/f\n+++ b/f\n@@ -1,2 +1,2 @@\n a\n-b\n+x\n c\n';
    expect(() => parsePatch(text)).toThrow('more lines than its header declares');
  });

  it('should reject a file header without hunks', () => {
    expect(() => parsePatch('--- a/f\n+++ b/f\n')).toThrow('No hunks for f');
  });

  it('should parse several files in order', () => {
    const text = makeDiff('1\n', '2\n', 'one.txt') + makeDiff(null, 'new\n', 'two.txt');
    expect(parsePatch(text).map((f) => f.newPath)).toEqual(['one.txt', 'two.txt']);
    expect(patchPaths(text)).toEqual(['one.txt', 'two.txt']);
  });
});

describe('applyFilePatch', () => {
  it('should apply a hunk at an offset when lines were inserted above', () => {
    const [file] = parsePatch(makeDiff('a\nb\nc\n', 'a\nB\nc\n', 'f'));
    expect(applyFilePatch('header\nextra\na\nb\nc\n', file)).toBe('header\nextra\na\nB\nc\n');
  });

  it('should refuse when context does not match', () => {
    const [file] = parsePatch(makeDiff('a\nb\nc\n', 'a\nB\nc\n', 'f'));
    expect(() => applyFilePatch('a\nzzz\nc\n', file)).toThrow(PatchConflictError);
  });

  it('should refuse to create a file that already exists', () => {
    const [file] = parsePatch(makeDiff(null, 'x\n', 'f'));
    expect(() => applyFilePatch('x\n', file)).toThrow('already exists');
  });

  it('should refuse to modify a file that does not exist', () => {
    const [file] = parsePatch(makeDiff('x\n', 'y\n', 'f'));
    expect(() => applyFilePatch(null, file)).toThrow('does not exist');
  });

  it('should return null for a deletion', () => {
    const [file] = parsePatch('--- a/f\n+++ /dev/null\n@@ -1,2 +0,0 @@\n-a\n-b\n');
    expect(applyFilePatch('a\nb\n', file)).toBeNull();
  });
});

describe('applyPatch / checkPatch', () => {
  const files = new Map([
    ['one.txt', 'alpha\nbeta\n'],
    ['two.txt', 'gamma\n'],
  ]);

  it('should apply every file in a multi-file patch', () => {
    const patch = makeDiff('alpha\nbeta\n', 'alpha\nBETA\n', 'one.txt') + makeDiff('gamma\n', 'GAMMA\n', 'two.txt');
    const next = applyPatch(files, patch);

    expect(next.get('one.txt')).toBe('alpha\nBETA\n');
    expect(next.get('two.txt')).toBe('GAMMA\n');
    expect(files.get('one.txt')).toBe('alpha\nbeta\n');
  });

  it('should fail the whole patch when one file conflicts', () => {
    const patch = makeDiff('alpha\nbeta\n', 'alpha\nBETA\n', 'one.txt') + makeDiff('stale\n', 'GAMMA\n', 'two.txt');

    const result = checkPatch(files, patch);
    expect(result.ok).toBe(false);
    expect(() => applyPatch(files, patch)).toThrow(PatchConflictError);
    expect(files.get('one.txt')).toBe('alpha\nbeta\n');
  });

  it('should report changed paths on a successful check', () => {
    const patch = makeDiff(null, 'hi\n', 'three.txt');
    expect(checkPatch(files, patch)).toEqual({ ok: true, paths: ['three.txt'] });
  });

  it('should reject an empty patch', () => {
    expect(checkPatch(files, '')).toEqual({ ok: false, message: 'Patch contains no file changes' });
  });
});
