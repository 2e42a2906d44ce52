import { describe, it, expect } from 'vitest';
import { extractFilePath, parseGitDiff, parseHunkHeader } from '../../../src/engine/diff-parser.js';

const USER_DIFF = [
  'diff --git a/lib/user.ex b/lib/user.ex',
  'index 1111111..2222222 100644',
  '--- a/lib/user.ex',
  '+++ b/lib/user.ex',
  '@@ -1,3 +1,4 @@',
  ' defmodule User do',
  '+  def f(n), do: %User{name: String.to_atom(n)}',
  '   defstruct [:name]',
  ' end',
  '',
].join('\n');

describe('parseGitDiff', () => {
  it('numbers added lines from the new-side hunk start', () => {
    const diff = parseGitDiff(USER_DIFF);

    expect(diff.files).toHaveLength(1);
    const [file] = diff.files;
    expect(file.path).toBe('lib/user.ex');
    expect(file.removedLines).toEqual([]);
    expect(file.addedLines).toEqual([{
      lineNumber: 2,
      content: '  def f(n), do: %User{name: String.to_atom(n)}',
      changeType: 'added',
      contextBefore: ['defmodule User do'],
      contextAfter: [],
    }]);
  });

  it('advances past context lines before an addition', () => {
    const diff = parseGitDiff([
      'diff --git a/app.js b/app.js',
      '@@ -10,7 +10,8 @@ function main() {',
      ' const a = 1;',
      '+const b = 2;',
    ].join('\n'));

    expect(diff.files[0].addedLines[0].lineNumber).toBe(11);
  });

  it('gives consecutive added lines consecutive numbers', () => {
    const diff = parseGitDiff([
      'diff --git a/a.py b/a.py',
      '@@ -0,0 +5,3 @@',
      '+one',
      '+two',
      '+three',
    ].join('\n'));

    expect(diff.files[0].addedLines.map((l) => l.lineNumber)).toEqual([5, 6, 7]);
  });

  it('does not advance the cursor on removed lines', () => {
    const diff = parseGitDiff([
      'diff --git a/a.js b/a.js',
      '@@ -3,2 +3,2 @@',
      '-old line',
      '+new line',
    ].join('\n'));

    const [file] = diff.files;
    expect(file.removedLines).toEqual([{
      lineNumber: 3,
      content: 'old line',
      changeType: 'removed',
      contextBefore: [],
      contextAfter: [],
    }]);
    expect(file.addedLines[0].lineNumber).toBe(3);
  });

  it('keeps at most three lines of context, most recent last', () => {
    const diff = parseGitDiff([
      'diff --git a/a.js b/a.js',
      '@@ -1,5 +1,6 @@',
      ' c1',
      ' c2',
      ' c3',
      ' c4',
      '+added',
    ].join('\n'));

    const [line] = diff.files[0].addedLines;
    expect(line.lineNumber).toBe(5);
    expect(line.contextBefore).toEqual(['c2', 'c3', 'c4']);
  });

  it('resets context at each hunk', () => {
    const diff = parseGitDiff([
      'diff --git a/a.js b/a.js',
      '@@ -1,2 +1,3 @@',
      ' first',
      '+a',
      '@@ -20,2 +21,3 @@',
      '+b',
    ].join('\n'));

    const [a, b] = diff.files[0].addedLines;
    expect(a.contextBefore).toEqual(['first']);
    expect(b).toMatchObject({ lineNumber: 21, contextBefore: [] });
  });

  it('separates files and keeps their order', () => {
    const diff = parseGitDiff([
      'diff --git a/one.js b/one.js',
      '@@ -1,0 +1,1 @@',
      '+x',
      'diff --git a/two.py b/two.py',
      '@@ -1,0 +1,1 @@',
      '+y',
    ].join('\n'));

    expect(diff.files.map((f) => f.path)).toEqual(['one.js', 'two.py']);
    expect(diff.files[1].addedLines[0].content).toBe('y');
  });

  it('captures binary files with no lines', () => {
    const diff = parseGitDiff([
      'diff --git a/logo.png b/logo.png',
      'index 3333333..4444444 100644',
      'Binary files a/logo.png and b/logo.png differ',
    ].join('\n'));

    expect(diff.files).toEqual([{ path: 'logo.png', addedLines: [], removedLines: [] }]);
  });

  it('returns no files for empty input', () => {
    expect(parseGitDiff('')).toEqual({ files: [] });
  });

  it('drops lines under a malformed file header', () => {
    const diff = parseGitDiff([
      'diff --git broken',
      '@@ -1,0 +1,1 @@',
      '+lost',
      'diff --git a/kept.js b/kept.js',
      '@@ -1,0 +1,1 @@',
      '+kept',
    ].join('\n'));

    expect(diff.files).toHaveLength(1);
    expect(diff.files[0].path).toBe('kept.js');
    expect(diff.files[0].addedLines.map((l) => l.content)).toEqual(['kept']);
  });

  it('starts a hunk at 0 when the header has no usable number', () => {
    const diff = parseGitDiff([
      'diff --git a/a.js b/a.js',
      '@@ -1 +x,2 @@',
      '+a',
    ].join('\n'));

    expect(diff.files[0].addedLines[0].lineNumber).toBe(0);
  });

  it('ignores headers and no-newline markers', () => {
    const diff = parseGitDiff([
      'diff --git a/a.js b/a.js',
      '--- a/a.js',
      '+++ b/a.js',
      '@@ -1,1 +1,1 @@',
      '-a',
      '\\ No newline at end of file',
      '+b',
    ].join('\n'));

    const [file] = diff.files;
    expect(file.addedLines.map((l) => l.content)).toEqual(['b']);
    expect(file.removedLines.map((l) => l.content)).toEqual(['a']);
  });

  it('strips carriage returns', () => {
    const diff = parseGitDiff('diff --git a/a.js b/a.js\r\n@@ -1,0 +1,1 @@\r\n+x = 1\r\n');

    expect(diff.files[0].addedLines[0].content).toBe('x = 1');
  });

  it('keeps both entries when a path repeats', () => {
    const diff = parseGitDiff([
      'diff --git a/a.js b/a.js',
      '@@ -1,0 +1,1 @@',
      '+first',
      'diff --git a/a.js b/a.js',
      '@@ -9,0 +9,1 @@',
      '+second',
    ].join('\n'));

    expect(diff.files.map((f) => f.path)).toEqual(['a.js', 'a.js']);
  });

  it('reports every added line of a multi-file diff exactly once', () => {
    const text = [
      'diff --git a/lib/a.ex b/lib/a.ex',
      'index 1111111..2222222 100644',
      '--- a/lib/a.ex',
      '+++ b/lib/a.ex',
      '@@ -1,3 +1,4 @@',
      ' defmodule A do',
      '-  old()',
      '+  new()',
      '+  ++counter',
      ' end',
      '@@ -20,2 +21,3 @@',
      ' x',
      '+++y',
      'diff --git a/src/b.py b/src/b.py',
      'new file mode 100644',
      '--- /dev/null',
      '+++ b/src/b.py',
      '@@ -0,0 +1,2 @@',
      '+import os',
      '+',
      'diff --git a/db/c.sql b/db/c.sql',
      '--- a/db/c.sql',
      '+++ b/db/c.sql',
      '@@ -5,1 +5,1 @@',
      '-SELECT 1;',
      '+SELECT 2;',
    ].join('\n');

    const expected = text.split('\n').filter((line) => line.startsWith('+') && !line.startsWith('+++')).length;
    const diff = parseGitDiff(text);
    const added = diff.files.reduce((sum, file) => sum + file.addedLines.length, 0);

    expect(expected).toBe(5);
    expect(added).toBe(expected);
    expect(diff.files.map((f) => f.addedLines.length)).toEqual([2, 2, 1]);
  });

  it('is stateless across calls', () => {
    expect(parseGitDiff(USER_DIFF)).toEqual(parseGitDiff(USER_DIFF));
  });
});

describe('extractFilePath', () => {
  it('strips the a/ prefix of the third token', () => {
    expect(extractFilePath('diff --git a/src/lib/x.ts b/src/lib/x.ts')).toBe('src/lib/x.ts');
  });

  it('rejects headers with too few tokens or no a/ prefix', () => {
    expect(extractFilePath('diff --git a/x.ts')).toBeUndefined();
    expect(extractFilePath('diff --git x.ts b/x.ts')).toBeUndefined();
  });
});

describe('parseHunkHeader', () => {
  it('reads the new-side start', () => {
    expect(parseHunkHeader('@@ -15,6 +15,9 @@ def run')).toBe(15);
    expect(parseHunkHeader('@@ -1 +7 @@')).toBe(7);
  });

  it('returns undefined for malformed headers', () => {
    expect(parseHunkHeader('@@ -1,2 @@')).toBeUndefined();
    expect(parseHunkHeader('@@ -1 +abc,2 @@')).toBeUndefined();
  });
});
