import type { Language, Severity } from '../types.js';
import { LANGUAGES, SEVERITIES, isLanguage, isSeverity } from '../types.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ReviewArgs {
  staged: boolean;
  uncommitted: boolean;
  since?: string;
  diffFile?: string;
  pr?: number;
  comment: boolean;
  severity?: Severity;
  language?: Language;
  json: boolean;
  suggest: boolean;
  fix: boolean;
  help: boolean;
}

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new UsageError(`${flag} needs a value`);
  }
  return value;
}

export function parseSeverity(value: string): Severity {
  const normalized = value.toLowerCase();
  if (!isSeverity(normalized)) {
    throw new UsageError(`Unknown severity "${value}" (expected ${SEVERITIES.join(', ')})`);
  }
  return normalized;
}

export function parseLanguage(value: string): Language {
  const normalized = value.toLowerCase();
  if (!isLanguage(normalized)) {
    throw new UsageError(`Unknown language "${value}" (expected ${LANGUAGES.join(', ')})`);
  }
  return normalized;
}

export function parseReviewArgs(args: string[]): ReviewArgs {
  const parsed: ReviewArgs = {
    staged: false,
    uncommitted: false,
    comment: false,
    json: false,
    suggest: false,
    fix: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--staged':
        parsed.staged = true;
        break;
      case '--uncommitted':
        parsed.uncommitted = true;
        break;
      case '--since':
        parsed.since = takeValue(args, i++, arg);
        break;
      case '--diff-file':
        parsed.diffFile = takeValue(args, i++, arg);
        break;
      case '--pr': {
        const pr = Number(takeValue(args, i++, arg));
        if (!Number.isInteger(pr) || pr <= 0) {
          throw new UsageError('--pr needs a pull request number');
        }
        parsed.pr = pr;
        break;
      }
      case '--comment':
        parsed.comment = true;
        break;
      case '--severity':
        parsed.severity = parseSeverity(takeValue(args, i++, arg));
        break;
      case '--language':
        parsed.language = parseLanguage(takeValue(args, i++, arg));
        break;
      case '--json':
        parsed.json = true;
        break;
      case '--suggest':
        parsed.suggest = true;
        break;
      case '--fix':
        parsed.fix = true;
        break;
      case '-h':
      case '--help':
        parsed.help = true;
        break;
      default:
        throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (parsed.diffFile && parsed.pr !== undefined) {
    throw new UsageError('--diff-file and --pr cannot be combined');
  }
  if (parsed.comment && parsed.pr === undefined) {
    throw new UsageError('--comment requires --pr');
  }
  return parsed;
}

export type RulesCommand =
  | { kind: 'list'; language?: Language }
  | { kind: 'search'; query: string }
  | { kind: 'show'; id: string }
  | {
    kind: 'add';
    language: Language;
    id: string;
    pattern: string;
    severity: Severity;
    fix: string;
    description: string;
  }
  | { kind: 'remove'; id: string }
  | { kind: 'help' };

function options(args: string[]): Map<string, string> {
  const values = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
    values.set(arg.slice(2), takeValue(args, i++, arg));
  }
  return values;
}

function required(values: Map<string, string>, name: string): string {
  const value = values.get(name);
  if (value === undefined) {
    throw new UsageError(`--${name} is required`);
  }
  return value;
}

function positional(args: string[], what: string): string {
  const value = args.join(' ').trim();
  if (!value) {
    throw new UsageError(`Missing ${what}`);
  }
  return value;
}

export function parseRulesArgs(args: string[]): RulesCommand {
  const [command = 'list', ...rest] = args;

  switch (command) {
    case 'list': {
      const values = options(rest);
      const language = values.get('language');
      return { kind: 'list', language: language === undefined ? undefined : parseLanguage(language) };
    }
    case 'search':
      return { kind: 'search', query: positional(rest, 'search query') };
    case 'show':
      return { kind: 'show', id: positional(rest, 'rule id') };
    case 'remove':
      return { kind: 'remove', id: positional(rest, 'rule id') };
    case 'add': {
      const values = options(rest);
      const pattern = required(values, 'pattern');
      try {
        new RegExp(pattern);
      } catch (err) {
        throw new UsageError(`Invalid --pattern: ${err instanceof Error ? err.message : String(err)}`);
      }
      return {
        kind: 'add',
        language: parseLanguage(required(values, 'language')),
        id: required(values, 'id'),
        pattern,
        severity: parseSeverity(values.get('severity') ?? 'warning'),
        fix: required(values, 'fix'),
        description: required(values, 'description'),
      };
    }
    case '-h':
    case '--help':
    case 'help':
      return { kind: 'help' };
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}
