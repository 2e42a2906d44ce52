import { describe, it, expect, vi, afterEach } from 'vitest';
import { RuleSetError, parseRuleSet, readBuiltinRuleSources } from '../../../src/engine/rule-loader.js';

afterEach(() => {
  vi.restoreAllMocks();
});

const VALID_RULE = `
- id: "no_print"
  name: "Print statement"
  language: "python"
  severity: "warning"
  description: "print left in code"
  detection_method:
    type: "regex"
    pattern: "\\\\bprint\\\\("
  fix_suggestion: "Use logging"
  source_url: "https://example.com/print"
  claude_code_fixable: true
  examples:
    - bad: "print(x)"
      good: "log.info(x)"
      explanation: "logs are configurable"
  tags: ["style"]
`;

describe('parseRuleSet', () => {
  it('maps snake_case fields onto the rule model', () => {
    const { rules, skipped } = parseRuleSet(VALID_RULE, 'python');

    expect(skipped).toEqual([]);
    expect(rules).toEqual([{
      id: 'no_print',
      name: 'Print statement',
      language: 'python',
      severity: 'warning',
      description: 'print left in code',
      detectionMethod: { type: 'regex', pattern: '\\bprint\\(' },
      fixSuggestion: 'Use logging',
      sourceUrl: 'https://example.com/print',
      claudeCodeFixable: true,
      examples: [{ bad: 'print(x)', good: 'log.info(x)', explanation: 'logs are configurable' }],
      tags: ['style'],
      enabled: true,
    }]);
  });

  it('applies defaults for optional fields and thresholds', () => {
    const { rules } = parseRuleSet(`
- id: "dense"
  name: "Dense"
  language: "zig"
  severity: "major"
  description: "d"
  detection_method: { type: "ratio", pattern: ";" }
  fix_suggestion: "f"
- id: "long"
  name: "Long"
  language: "zig"
  severity: "major"
  description: "d"
  detection_method: { type: "line_count", pattern: "fn", threshold: 12.9 }
  fix_suggestion: "f"
  enabled: false
`);

    expect(rules[0]).toMatchObject({
      detectionMethod: { type: 'ratio', pattern: ';', threshold: 0.3 },
      claudeCodeFixable: false,
      examples: [],
      tags: [],
      enabled: true,
      sourceUrl: undefined,
    });
    expect(rules[1]).toMatchObject({
      detectionMethod: { type: 'line_count', pattern: 'fn', threshold: 12 },
      enabled: false,
    });
  });

  it('skips entries with unknown language, severity or detection type', () => {
    const entry = (id: string, language: string, severity: string, type: string) => `
- id: "${id}"
  name: "n"
  language: "${language}"
  severity: "${severity}"
  description: "d"
  detection_method: { type: "${type}", pattern: "x" }
  fix_suggestion: "f"`;
    const text = [
      entry('bad_lang', 'cobol', 'major', 'regex'),
      entry('bad_sev', 'sql', 'blocker', 'regex'),
      entry('bad_type', 'sql', 'major', 'semantic'),
      entry('good', 'sql', 'major', 'regex'),
    ].join('\n');

    const { rules, skipped } = parseRuleSet(text, 'sql');

    expect(rules.map((r) => r.id)).toEqual(['good']);
    expect(skipped).toEqual([
      { id: 'bad_lang', reason: 'unknown language "cobol"' },
      { id: 'bad_sev', reason: 'unknown severity "blocker"' },
      { id: 'bad_type', reason: 'unknown detection method type' },
    ]);
  });

  it('skips rules declaring the ast method', () => {
    const { rules, skipped } = parseRuleSet(`
- id: "tree"
  name: "n"
  language: "rust"
  severity: "warning"
  description: "d"
  detection_method: { type: "ast", pattern: "(call)" }
  fix_suggestion: "f"
`);
    expect(rules).toEqual([]);
    expect(skipped).toEqual([{ id: 'tree', reason: 'unknown detection method type' }]);
  });

  it('warns when a rule declares another language than its rule set', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const { rules } = parseRuleSet(VALID_RULE, 'rust');

    expect(rules).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith('[rule-loader] Rule no_print declares language "python" in a rust rule set');
  });

  it('returns nothing for an empty document', () => {
    expect(parseRuleSet('')).toEqual({ rules: [], skipped: [] });
  });

  it('rejects documents that are not a list', () => {
    expect(() => parseRuleSet('id: lonely')).toThrow(RuleSetError);
    expect(() => parseRuleSet('id: lonely')).toThrow('Rule-set document must be a list of rules');
  });

  it('rejects malformed YAML', () => {
    expect(() => parseRuleSet('- id: [unclosed')).toThrow(RuleSetError);
  });

  it('skips entries with wrongly typed fields and keeps the rest', () => {
    const { rules, skipped } = parseRuleSet(`
- id: "bad_name"
  name: 42
  language: "python"
  severity: "major"
  description: "d"
  detection_method: { type: "regex", pattern: "x" }
  fix_suggestion: "f"
- id: 7
  language: "python"
${VALID_RULE.trimStart()}`, 'python');

    expect(rules.map((r) => r.id)).toEqual(['no_print']);
    expect(skipped).toEqual([
      { id: 'bad_name', reason: 'Rule #1: "name" must be a string' },
      { id: '#2', reason: 'Rule #2: "id" must be a string' },
    ]);
  });

  it('skips entries that are not mappings', () => {
    const { rules, skipped } = parseRuleSet(`- just a string\n${VALID_RULE.trimStart()}`, 'python');

    expect(rules.map((r) => r.id)).toEqual(['no_print']);
    expect(skipped).toEqual([{ id: '#1', reason: 'Rule #1: must be a mapping' }]);
  });
});

describe('readBuiltinRuleSources', () => {
  it('reads one rule set per language', () => {
    const sources = readBuiltinRuleSources();

    expect(sources.map((s) => s.language)).toEqual([
      'elixir', 'javascript', 'typescript', 'python', 'rust', 'zig', 'sql',
    ]);
    for (const source of sources) {
      expect(source.source.endsWith(`${source.language}.yml`)).toBe(true);
    }
  });
});
