import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import type { AntiPattern, CodeExample, DetectionMethod, Language } from '../types.js';
import { LANGUAGES, isLanguage, isSeverity } from '../types.js';

const DEFAULT_RATIO_THRESHOLD = 0.3;
const DEFAULT_LINE_COUNT_THRESHOLD = 10;

export class RuleSetError extends Error {
  constructor(message: string, public readonly source?: string) {
    super(message);
    this.name = 'RuleSetError';
  }
}

export interface SkippedRule {
  id: string;
  reason: string;
}

export interface RuleSetParseResult {
  rules: AntiPattern[];
  skipped: SkippedRule[];
}

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(entry: RawRecord, field: string, index: number): string {
  const value = entry[field];
  if (typeof value !== 'string') {
    throw new RuleSetError(`Rule #${index + 1}: "${field}" must be a string`);
  }
  return value;
}

function optionalString(entry: RawRecord, field: string, index: number): string | undefined {
  const value = entry[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new RuleSetError(`Rule #${index + 1}: "${field}" must be a string`);
  }
  return value;
}

function optionalNumber(value: unknown, index: number): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new RuleSetError(`Rule #${index + 1}: "detection_method.threshold" must be a number`);
  }
  return value;
}

function optionalBoolean(entry: RawRecord, field: string, index: number): boolean | undefined {
  const value = entry[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new RuleSetError(`Rule #${index + 1}: "${field}" must be a boolean`);
  }
  return value;
}

function parseStringList(value: unknown, field: string, index: number): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((v) => typeof v === 'string')) {
    throw new RuleSetError(`Rule #${index + 1}: "${field}" must be a list of strings`);
  }
  return value;
}

function parseExamples(value: unknown, index: number): CodeExample[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new RuleSetError(`Rule #${index + 1}: "examples" must be a list`);
  }
  return value.map((raw) => {
    if (!isRecord(raw)) {
      throw new RuleSetError(`Rule #${index + 1}: each example must be a mapping`);
    }
    return {
      bad: requireString(raw, 'bad', index),
      good: requireString(raw, 'good', index),
      explanation: requireString(raw, 'explanation', index),
    };
  });
}

/**
 * Maps `{type, pattern, threshold?}` to a detection method. Unknown types yield undefined
 * so the caller can skip the rule.
 */
function parseDetectionMethod(value: unknown, index: number): DetectionMethod | undefined {
  if (!isRecord(value)) {
    throw new RuleSetError(`Rule #${index + 1}: "detection_method" must be a mapping`);
  }
  const type = requireString(value, 'type', index);
  const pattern = requireString(value, 'pattern', index);
  const threshold = optionalNumber(value.threshold, index);

  switch (type) {
    case 'regex':
      return { type: 'regex', pattern };
    case 'ratio':
      return { type: 'ratio', pattern, threshold: threshold ?? DEFAULT_RATIO_THRESHOLD };
    case 'line_count':
      return { type: 'line_count', pattern, threshold: Math.trunc(threshold ?? DEFAULT_LINE_COUNT_THRESHOLD) };
    case 'custom':
      return { type: 'custom', pattern };
    // ast is reserved for rules built in code; rule sets cannot declare it
    default:
      return undefined;
  }
}

function parseYamlDocument(text: string, source?: string): unknown {
  try {
    return parseYaml(text);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new RuleSetError(`Invalid rule-set YAML: ${err.message}`, source);
    }
    throw err;
  }
}

function entryId(entry: unknown, index: number): string {
  return isRecord(entry) && typeof entry.id === 'string' ? entry.id : `#${index + 1}`;
}

function parseEntry(entry: unknown, index: number, expectedLanguage?: Language): AntiPattern | SkippedRule {
  if (!isRecord(entry)) {
    throw new RuleSetError(`Rule #${index + 1}: must be a mapping`);
  }

  const id = requireString(entry, 'id', index);
  const language = requireString(entry, 'language', index);
  const severity = requireString(entry, 'severity', index);

  if (!isLanguage(language)) {
    return { id, reason: `unknown language "${language}"` };
  }
  if (!isSeverity(severity)) {
    return { id, reason: `unknown severity "${severity}"` };
  }

  const detectionMethod = parseDetectionMethod(entry.detection_method, index);
  if (!detectionMethod) {
    return { id, reason: 'unknown detection method type' };
  }

  if (expectedLanguage && language !== expectedLanguage) {
    console.warn(`[rule-loader] Rule ${id} declares language "${language}" in a ${expectedLanguage} rule set`);
  }

  return {
    id,
    name: requireString(entry, 'name', index),
    language,
    severity,
    description: requireString(entry, 'description', index),
    detectionMethod,
    fixSuggestion: requireString(entry, 'fix_suggestion', index),
    sourceUrl: optionalString(entry, 'source_url', index),
    claudeCodeFixable: optionalBoolean(entry, 'claude_code_fixable', index) ?? false,
    examples: parseExamples(entry.examples, index),
    tags: parseStringList(entry.tags, 'tags', index),
    enabled: optionalBoolean(entry, 'enabled', index) ?? true,
  };
}

/**
 * Parse one rule-set document (a YAML list of rules).
 *
 * Entries that are malformed, or name an unknown language, severity or detection type,
 * are skipped and reported in `skipped`. Only a document that is not valid YAML or not
 * a list raises RuleSetError.
 */
export function parseRuleSet(text: string, expectedLanguage?: Language, source?: string): RuleSetParseResult {
  const doc = parseYamlDocument(text, source);
  if (doc === null || doc === undefined) {
    return { rules: [], skipped: [] };
  }
  if (!Array.isArray(doc)) {
    throw new RuleSetError('Rule-set document must be a list of rules', source);
  }

  const rules: AntiPattern[] = [];
  const skipped: SkippedRule[] = [];

  doc.forEach((entry: unknown, index) => {
    let parsed: AntiPattern | SkippedRule;
    try {
      parsed = parseEntry(entry, index, expectedLanguage);
    } catch (err) {
      if (!(err instanceof RuleSetError)) throw err;
      skipped.push({ id: entryId(entry, index), reason: err.message });
      return;
    }
    if ('reason' in parsed) {
      skipped.push(parsed);
    } else {
      rules.push(parsed);
    }
  });

  return { rules, skipped };
}

// Rule data sits in server/rules; from dist/ it is reached through the package root
const BUILTIN_DIR_CANDIDATES = [
  new URL('../../rules/builtin/', import.meta.url),
  new URL('../../../../server/rules/builtin/', import.meta.url),
];

export function builtinRulesDir(): string {
  for (const candidate of BUILTIN_DIR_CANDIDATES) {
    const dir = fileURLToPath(candidate);
    if (existsSync(dir)) {
      return dir;
    }
  }
  throw new RuleSetError('Built-in rule directory not found');
}

/**
 * Raw YAML of the embedded rule set for each language, in declaration order.
 */
export function readBuiltinRuleSources(): Array<{ language: Language; text: string; source: string }> {
  const dir = builtinRulesDir();
  return LANGUAGES.map((language) => {
    const source = path.join(dir, `${language}.yml`);
    return { language, text: readFileSync(source, 'utf-8'), source };
  });
}
