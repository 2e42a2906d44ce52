import path from 'node:path';
import type { Language } from '../types.js';

// Extensions a rule of each language applies to
const RULE_EXTENSIONS: Record<Language, readonly string[]> = {
  elixir: ['ex', 'exs'],
  javascript: ['js', 'jsx', 'mjs'],
  typescript: ['ts', 'tsx'],
  python: ['py'],
  rust: ['rs'],
  zig: ['zig'],
  sql: ['sql'],
};

// Wider table used to label a violation with the language of its file
const LANGUAGE_BY_EXTENSION: Record<string, Language> = {
  ex: 'elixir',
  exs: 'elixir',
  js: 'javascript',
  jsx: 'javascript',
  mjs: 'javascript',
  cjs: 'javascript',
  ts: 'typescript',
  tsx: 'typescript',
  py: 'python',
  pyw: 'python',
  pyi: 'python',
  rs: 'rust',
  zig: 'zig',
  sql: 'sql',
  psql: 'sql',
  mysql: 'sql',
};

/**
 * Extension without the dot, as written in the path. `Makefile` and `.env` have none.
 */
export function fileExtension(filePath: string): string {
  return path.extname(filePath).slice(1);
}

export function matchesFileExtension(language: Language, extension: string): boolean {
  return RULE_EXTENSIONS[language].includes(extension);
}

export function detectLanguageFromPath(filePath: string): Language | undefined {
  const extension = fileExtension(filePath).toLowerCase();
  if (!Object.hasOwn(LANGUAGE_BY_EXTENSION, extension)) {
    return undefined;
  }
  return LANGUAGE_BY_EXTENSION[extension];
}
