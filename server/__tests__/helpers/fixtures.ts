import type { AntiPattern, ChangedLine, ReviewViolation } from '../../src/types.js';

export function makeRule(overrides: Partial<AntiPattern> = {}): AntiPattern {
  return {
    id: 'no_eval',
    name: 'Avoid eval',
    language: 'javascript',
    severity: 'critical',
    description: 'eval runs arbitrary code',
    detectionMethod: { type: 'regex', pattern: '\\beval\\(' },
    fixSuggestion: 'Parse the input instead of evaluating it',
    claudeCodeFixable: true,
    examples: [],
    tags: ['security'],
    enabled: true,
    ...overrides,
  };
}

export function makeLine(lineNumber: number, content: string, contextBefore: string[] = []): ChangedLine {
  return { lineNumber, content, changeType: 'added', contextBefore, contextAfter: [] };
}

export function makeViolation(overrides: Partial<ReviewViolation> = {}): ReviewViolation {
  const rule = overrides.rule ?? makeRule();
  return {
    rule,
    filePath: 'src/app.js',
    lineNumber: 10,
    content: 'const value = eval(input);',
    severity: rule.severity,
    language: rule.language,
    fixSuggestion: rule.fixSuggestion,
    autoFixable: rule.claudeCodeFixable,
    contextBefore: [],
    contextAfter: [],
    confidence: 0.85,
    ...overrides,
  };
}
