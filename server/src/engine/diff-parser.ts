import type { ChangedLine, FileDiff, GitDiff } from '../types.js';

const FILE_HEADER = 'diff --git';
const HUNK_PREFIX = '@@';
const MAX_CONTEXT_LINES = 3;

/**
 * Parse `git diff` output into per-file added/removed lines.
 *
 * Never throws: lines it cannot interpret are skipped. Line numbers refer to the
 * new side of each hunk, so removed lines carry the number of the next new line.
 */
export function parseGitDiff(diffText: string): GitDiff {
  const files: FileDiff[] = [];
  let currentFile: FileDiff | null = null;
  let lineNumber = 0;
  let context: string[] = [];

  for (const line of splitLines(diffText)) {
    if (line.startsWith(FILE_HEADER)) {
      if (currentFile) {
        files.push(currentFile);
      }
      const filePath = extractFilePath(line);
      currentFile = filePath === undefined
        ? null
        : { path: filePath, addedLines: [], removedLines: [] };
      continue;
    }

    if (line.startsWith(HUNK_PREFIX)) {
      lineNumber = parseHunkHeader(line) ?? 0;
      context = [];
      continue;
    }

    if (line.startsWith('+') && !line.startsWith('+++')) {
      currentFile?.addedLines.push(changedLine(lineNumber, line.slice(1), 'added', context));
      lineNumber++;
      continue;
    }

    if (line.startsWith('-') && !line.startsWith('---')) {
      currentFile?.removedLines.push(changedLine(lineNumber, line.slice(1), 'removed', context));
      continue;
    }

    if (line.startsWith(' ')) {
      context.push(line.slice(1));
      if (context.length > MAX_CONTEXT_LINES) {
        context.shift();
      }
      lineNumber++;
    }
    // index, ---/+++ headers, binary markers and "\ No newline" fall through
  }

  if (currentFile) {
    files.push(currentFile);
  }

  return { files };
}

/**
 * `diff --git a/lib/user.ex b/lib/user.ex` → `lib/user.ex`
 */
export function extractFilePath(headerLine: string): string | undefined {
  const parts = headerLine.trim().split(/\s+/);
  if (parts.length < 4) {
    return undefined;
  }
  const aPath = parts[2];
  if (!aPath.startsWith('a/')) {
    return undefined;
  }
  return aPath.slice(2);
}

/**
 * `@@ -15,6 +15,9 @@ ...` → 15. Returns undefined when the new-side start is missing or not a number.
 */
export function parseHunkHeader(hunkLine: string): number | undefined {
  const plusPos = hunkLine.indexOf(' +');
  if (plusPos === -1) {
    return undefined;
  }

  const afterPlus = hunkLine.slice(plusPos + 2);
  const commaPos = afterPlus.indexOf(',');
  const spacePos = afterPlus.indexOf(' ');
  let end: number;
  if (commaPos !== -1) {
    end = commaPos;
  } else if (spacePos !== -1) {
    end = spacePos;
  } else {
    return undefined;
  }

  const digits = afterPlus.slice(0, end);
  if (!/^\d+$/.test(digits)) {
    return undefined;
  }
  return Number.parseInt(digits, 10);
}

function changedLine(
  lineNumber: number,
  content: string,
  changeType: 'added' | 'removed',
  context: string[],
): ChangedLine {
  return {
    lineNumber,
    content,
    changeType,
    contextBefore: [...context],
    contextAfter: [],
  };
}

function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}
