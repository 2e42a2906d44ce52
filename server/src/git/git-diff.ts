import { execFile } from 'node:child_process';
import type { GitDiff, Language } from '../types.js';
import { detectLanguageFromPath } from '../engine/languages.js';

const MAX_DIFF_BUFFER = 64 * 1024 * 1024;

export type DiffScope =
  | { kind: 'unstaged' }
  | { kind: 'staged' }
  | { kind: 'since'; ref: string };

export class GitDiffError extends Error {
  constructor(
    message: string,
    public readonly exitCode?: number,
    public readonly stderr = '',
  ) {
    super(message);
    this.name = 'GitDiffError';
  }
}

export interface ScopeFlags {
  staged?: boolean;
  uncommitted?: boolean;
  since?: string;
}

/**
 * staged > uncommitted > since; nothing given means everything changed since HEAD.
 */
export function determineDiffScope(flags: ScopeFlags, defaultRef = 'HEAD'): DiffScope {
  if (flags.staged) return { kind: 'staged' };
  if (flags.uncommitted) return { kind: 'unstaged' };
  if (flags.since) return { kind: 'since', ref: flags.since };
  return { kind: 'since', ref: defaultRef };
}

export function gitDiffArgs(scope: DiffScope): string[] {
  switch (scope.kind) {
    case 'unstaged':
      return ['diff'];
    case 'staged':
      return ['diff', '--cached'];
    case 'since':
      return ['diff', scope.ref];
  }
}

export function buildGitCommand(scope: DiffScope): string {
  return ['git', ...gitDiffArgs(scope)].join(' ');
}

export function describeScope(scope: DiffScope): string {
  switch (scope.kind) {
    case 'unstaged':
      return 'unstaged changes';
    case 'staged':
      return 'staged changes';
    case 'since':
      return `changes since ${scope.ref}`;
  }
}

export function executeGitDiff(scope: DiffScope, cwd: string = process.cwd()): Promise<string> {
  const args = gitDiffArgs(scope);
  return new Promise((resolve, reject) => {
    execFile('git', args, { cwd, maxBuffer: MAX_DIFF_BUFFER }, (err, stdout, stderr) => {
      if (err) {
        const exitCode = typeof err.code === 'number' ? err.code : undefined;
        const detail = String(stderr).trim() || err.message;
        console.error(`[git] ${buildGitCommand(scope)} failed: ${detail}`);
        reject(new GitDiffError(`git diff failed: ${detail}`, exitCode, String(stderr)));
        return;
      }
      resolve(String(stdout));
    });
  });
}

/**
 * Keep only files whose detected language is the given one (or one of the given ones).
 */
export function filterDiffByLanguage(diff: GitDiff, language: Language | readonly Language[]): GitDiff {
  const wanted: readonly Language[] = typeof language === 'string' ? [language] : language;
  return {
    files: diff.files.filter((file) => {
      const detected = detectLanguageFromPath(file.path);
      return detected !== undefined && wanted.includes(detected);
    }),
  };
}
