import { Hono } from 'hono';
import type { AntiPattern } from '../types.js';
import { isLanguage } from '../types.js';
import type { PatternRegistry } from '../engine/pattern-registry.js';

function summarize(rule: AntiPattern) {
  return {
    id: rule.id,
    name: rule.name,
    language: rule.language,
    severity: rule.severity,
    description: rule.description,
    autoFixable: rule.claudeCodeFixable,
    enabled: rule.enabled,
    tags: rule.tags,
  };
}

export function createRulesRoutes(registry: PatternRegistry): Hono {
  const rules = new Hono();

  rules.get('/api/rules', (c) => {
    const language = c.req.query('language');
    const query = c.req.query('q');

    if (language !== undefined && !isLanguage(language)) {
      return c.json({ error: `unsupported language "${language}"` }, 400);
    }

    let found = query ? registry.searchPatterns(query) : registry.listPatterns();
    if (language !== undefined) {
      found = found.filter((rule) => rule.language === language);
    }

    return c.json({ total: found.length, rules: found.map(summarize) });
  });

  rules.get('/api/rules/:id', (c) => {
    const rule = registry.getPattern(c.req.param('id'));
    if (!rule) {
      return c.json({ error: `rule not found: ${c.req.param('id')}` }, 404);
    }
    return c.json(rule);
  });

  return rules;
}
