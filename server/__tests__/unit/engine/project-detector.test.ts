import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { analyzeProject, describeProject, detectProject } from '../../../src/engine/project-detector.js';

describe('project detection', () => {
  let root: string;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(path.join(os.tmpdir(), 'diffwarden-project-')));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function write(relative: string, content = ''): void {
    const file = path.join(root, relative);
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, content);
  }

  it('reads the name from package.json and lists package languages', () => {
    write('package.json', JSON.stringify({ name: 'storefront' }));
    write('tsconfig.json', '{}');

    expect(analyzeProject(root)).toEqual({
      name: 'storefront',
      rootPath: root,
      languages: ['javascript', 'typescript'],
      projectType: 'javascript',
      packageFiles: ['package.json', 'tsconfig.json'],
    });
  });

  it('reads the app name from mix.exs', () => {
    write('mix.exs', 'def project do\n  [app: :ledger, version: "0.1.0"]\nend\n');

    const info = analyzeProject(root);
    expect(info.name).toBe('ledger');
    expect(info.projectType).toBe('elixir');
  });

  it('reads the package name from Cargo.toml, ignoring other sections', () => {
    write('Cargo.toml', '[workspace]\nname = "not-this"\n\n[package]\nname = "engine"\nversion = "0.1.0"\n');

    expect(analyzeProject(root).name).toBe('engine');
  });

  it('falls back to the directory name and the languages of files in the root', () => {
    write('main.zig');
    write('schema.sql');
    write('README.md');
    write('.git/HEAD', 'ref: refs/heads/main\n');

    const info = analyzeProject(root);
    expect(info.name).toBe(path.basename(root));
    expect(info.projectType).toBe('git');
    expect([...info.languages].sort()).toEqual(['sql', 'zig']);
    expect(info.packageFiles).toEqual([]);
  });

  it('prefers the enclosing git root when detecting from a subdirectory', () => {
    write('.git/HEAD', 'ref: refs/heads/main\n');
    write('services/api/package.json', JSON.stringify({ name: 'api' }));

    expect(detectProject(path.join(root, 'services', 'api')).rootPath).toBe(root);
  });

  it('uses the nearest package directory when there is no git root', () => {
    write('services/api/pyproject.toml', '[project]\nname = "api"\n');
    write('services/api/src/app/.keep');

    const info = detectProject(path.join(root, 'services', 'api', 'src', 'app'));
    expect(info.rootPath).toBe(path.join(root, 'services', 'api'));
    expect(info.languages).toEqual(['python']);
  });

  it('describes a project in one line', () => {
    expect(describeProject({
      name: 'storefront',
      rootPath: '/work/storefront',
      languages: ['javascript', 'typescript'],
      projectType: 'javascript',
      packageFiles: ['package.json'],
    })).toBe('storefront (javascript project with javascript, typescript)');
    expect(describeProject({
      name: 'empty',
      rootPath: '/work/empty',
      languages: [],
      projectType: 'generic',
      packageFiles: [],
    })).toBe('empty (generic project with unknown)');
  });
});
