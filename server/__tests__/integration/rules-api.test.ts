import { describe, it, expect, vi } from 'vitest';

vi.mock('../../src/config.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/config.js')>();
  return {
    ...actual,
    getFixProviderConfig: () => ({ configured: 'off', effective: 'off', geminiConfigured: false }),
  };
});

import { createApp } from '../../src/app.js';
import { buildRegistry } from '../../src/engine/pattern-registry.js';
import { makeRule } from '../helpers/fixtures.js';

const registry = buildRegistry({
  customRules: [makeRule({ id: 'custom_no_eval', name: 'No eval in this project', tags: ['custom'] })],
});
const app = createApp({ registry, requestLogging: false });

describe('GET /api/rules', () => {
  it('lists every rule', async () => {
    const res = await app.request('/api/rules');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      total: 52,
      rules: Array(52).fill(expect.objectContaining({ enabled: true })),
    });
  });

  it('filters by language', async () => {
    const res = await app.request('/api/rules?language=elixir');
    expect(await res.json()).toEqual({
      total: 13,
      rules: Array(13).fill(expect.objectContaining({ language: 'elixir' })),
    });
  });

  it('searches names, descriptions and ids', async () => {
    const res = await app.request('/api/rules?q=in%20this%20project');
    expect(await res.json()).toEqual({
      total: 1,
      rules: [{
        id: 'custom_no_eval',
        name: 'No eval in this project',
        language: 'javascript',
        severity: 'critical',
        description: 'eval runs arbitrary code',
        autoFixable: true,
        enabled: true,
        tags: ['custom'],
      }],
    });
  });

  it('rejects an unsupported language', async () => {
    const res = await app.request('/api/rules?language=cobol');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'unsupported language "cobol"' });
  });
});

describe('GET /api/rules/:id', () => {
  it('returns the full rule', async () => {
    const res = await app.request('/api/rules/dynamic_atom_creation');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      id: 'dynamic_atom_creation',
      language: 'elixir',
      severity: 'critical',
      detectionMethod: { type: 'regex' },
    });
  });

  it('returns 404 for an unknown id', async () => {
    const res = await app.request('/api/rules/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'rule not found: nope' });
  });
});

describe('GET /health', () => {
  it('reports the rule count and fix provider', async () => {
    const res = await app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'ok',
      version: '0.1.0',
      timestamp: expect.any(String),
      rules: 52,
      fixProvider: 'off',
    });
  });
});
