import { existsSync, readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import type { Language } from '../types.js';
import { detectLanguageFromPath } from './languages.js';

export type ProjectType =
  | 'git'
  | 'elixir'
  | 'javascript'
  | 'typescript'
  | 'python'
  | 'rust'
  | 'zig'
  | 'generic';

export interface ProjectInfo {
  name: string;
  rootPath: string;
  languages: Language[];
  projectType: ProjectType;
  packageFiles: string[];
}

const ROOT_MARKERS = ['mix.exs', 'package.json', 'pyproject.toml', 'requirements.txt', 'Cargo.toml', 'build.zig'];

const PACKAGE_FILES: ReadonlyArray<{ file: string; language: Language; type: ProjectType }> = [
  { file: 'mix.exs', language: 'elixir', type: 'elixir' },
  { file: 'package.json', language: 'javascript', type: 'javascript' },
  { file: 'tsconfig.json', language: 'typescript', type: 'typescript' },
  { file: 'pyproject.toml', language: 'python', type: 'python' },
  { file: 'requirements.txt', language: 'python', type: 'python' },
  { file: 'Cargo.toml', language: 'rust', type: 'rust' },
  { file: 'build.zig', language: 'zig', type: 'zig' },
];

function findUpwards(start: string, matches: (dir: string) => boolean): string | undefined {
  let current = path.resolve(start);
  for (;;) {
    if (matches(current)) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

function readIfExists(filePath: string): string | undefined {
  return existsSync(filePath) ? readFileSync(filePath, 'utf-8') : undefined;
}

function nameFromPackageJson(root: string): string | undefined {
  const raw = readIfExists(path.join(root, 'package.json'));
  if (raw === undefined) return undefined;
  try {
    const data: unknown = JSON.parse(raw);
    if (typeof data === 'object' && data !== null && 'name' in data && typeof data.name === 'string') {
      return data.name;
    }
  } catch (err) {
    console.warn(`[project] Could not parse package.json in ${root}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return undefined;
}

function nameFromMixExs(root: string): string | undefined {
  const raw = readIfExists(path.join(root, 'mix.exs'));
  return raw?.match(/app:\s*:(\w+)/)?.[1];
}

function nameFromCargoToml(root: string): string | undefined {
  const raw = readIfExists(path.join(root, 'Cargo.toml'));
  if (raw === undefined) return undefined;
  let inPackage = false;
  for (const line of raw.split('\n')) {
    const header = line.match(/^\s*\[([^\]]+)\]\s*$/);
    if (header) {
      inPackage = header[1].trim() === 'package';
      continue;
    }
    const name = inPackage ? line.match(/^\s*name\s*=\s*"([^"]+)"/)?.[1] : undefined;
    if (name) return name;
  }
  return undefined;
}

function projectName(root: string): string {
  return nameFromPackageJson(root)
    ?? nameFromMixExs(root)
    ?? nameFromCargoToml(root)
    ?? (path.basename(root) || 'unknown');
}

function languagesFromFiles(root: string): Language[] {
  const languages: Language[] = [];
  for (const entry of readdirSync(root, { withFileTypes: true })) {
    if (!entry.isFile()) continue;
    const language = detectLanguageFromPath(entry.name);
    if (language && !languages.includes(language)) {
      languages.push(language);
    }
  }
  return languages;
}

export function analyzeProject(root: string): ProjectInfo {
  const languages: Language[] = [];
  const packageFiles: string[] = [];
  let projectType: ProjectType = 'generic';

  for (const { file, language, type } of PACKAGE_FILES) {
    if (!existsSync(path.join(root, file))) continue;
    if (!languages.includes(language)) languages.push(language);
    packageFiles.push(file);
    if (projectType === 'generic') projectType = type;
  }

  if (projectType === 'generic' && existsSync(path.join(root, '.git'))) {
    projectType = 'git';
  }

  return {
    name: projectName(root),
    rootPath: root,
    languages: languages.length > 0 ? languages : languagesFromFiles(root),
    projectType,
    packageFiles,
  };
}

/**
 * Resolve the project a directory belongs to: the enclosing git root, else the nearest
 * directory holding a package file, else the directory itself.
 */
export function detectProject(start: string = process.cwd()): ProjectInfo {
  const root = findUpwards(start, (dir) => existsSync(path.join(dir, '.git')))
    ?? findUpwards(start, (dir) => ROOT_MARKERS.some((file) => existsSync(path.join(dir, file))))
    ?? path.resolve(start);
  return analyzeProject(root);
}

export function describeProject(info: ProjectInfo): string {
  const languages = info.languages.length > 0 ? info.languages.join(', ') : 'unknown';
  return `${info.name} (${info.projectType} project with ${languages})`;
}
