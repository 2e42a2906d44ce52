import type {
  AntiPattern,
  ChangedLine,
  DetectionMethodType,
  GitDiff,
  Language,
  ReviewResult,
  ReviewSummary,
  ReviewViolation,
  Severity,
} from '../types.js';
import { SEVERITIES } from '../types.js';
import type { PatternRegistry } from './pattern-registry.js';
import { detectLanguageFromPath } from './languages.js';
import { parseGitDiff } from './diff-parser.js';
import { filterDiffByLanguage } from '../git/git-diff.js';

export const DEFAULT_CONFIDENCE = 0.85;
const FALLBACK_LANGUAGE: Language = 'javascript';

export type MatchOutcome =
  | { kind: 'match' }
  | { kind: 'no-match' }
  | { kind: 'unsupported'; method: DetectionMethodType };

const NO_MATCH: MatchOutcome = { kind: 'no-match' };
const MATCH: MatchOutcome = { kind: 'match' };

function compileOrUndefined(pattern: string, flags?: string): RegExp | undefined {
  try {
    return new RegExp(pattern, flags);
  } catch {
    return undefined;
  }
}

/**
 * Number of non-overlapping matches divided by the line length in characters.
 * An empty line has ratio 0.
 */
export function matchRatio(regex: RegExp, content: string): number {
  const length = Array.from(content).length;
  if (length === 0) {
    return 0;
  }
  const global = regex.global ? regex : new RegExp(regex.source, `${regex.flags}g`);
  let count = 0;
  for (const _match of content.matchAll(global)) {
    count++;
  }
  return count / length;
}

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export class ReviewEngine {
  constructor(private readonly registry: PatternRegistry) {}

  detectLanguageFromPath(filePath: string): Language | undefined {
    return detectLanguageFromPath(filePath);
  }

  /**
   * Evaluate one rule against one line. Detection methods that need more than a single
   * line report `unsupported` rather than a silent miss.
   */
  evaluateRule(rule: AntiPattern, content: string): MatchOutcome {
    const method = rule.detectionMethod;
    switch (method.type) {
      case 'regex': {
        const regex = this.registry.getCompiledPattern(rule.id) ?? compileOrUndefined(method.pattern);
        return regex?.test(content) ? MATCH : NO_MATCH;
      }
      case 'ratio': {
        const regex = compileOrUndefined(method.pattern, 'g');
        if (!regex) return NO_MATCH;
        return matchRatio(regex, content) >= method.threshold ? MATCH : NO_MATCH;
      }
      case 'line_count':
      case 'custom':
      case 'ast':
        return { kind: 'unsupported', method: method.type };
      default: {
        const exhaustive: never = method;
        return exhaustive;
      }
    }
  }

  reviewChangedLines(filePath: string, changedLines: ChangedLine[]): ReviewViolation[] {
    const candidates = this.registry.getPatternsForFile(filePath);
    if (candidates.length === 0) {
      return [];
    }

    // Labelling only: rule selection above went by extension
    const language = this.detectLanguageFromPath(filePath) ?? FALLBACK_LANGUAGE;
    const violations: ReviewViolation[] = [];

    for (const line of changedLines) {
      for (const rule of candidates) {
        if (!rule.enabled) continue;
        if (this.evaluateRule(rule, line.content).kind !== 'match') continue;

        violations.push({
          rule: structuredClone(rule),
          filePath,
          lineNumber: line.lineNumber,
          content: line.content,
          severity: rule.severity,
          language,
          fixSuggestion: rule.fixSuggestion,
          autoFixable: rule.claudeCodeFixable,
          contextBefore: [...line.contextBefore],
          contextAfter: [...line.contextAfter],
          confidence: DEFAULT_CONFIDENCE,
        });
      }
    }

    return violations;
  }

  reviewGitDiff(diff: GitDiff): ReviewResult {
    const violations: ReviewViolation[] = [];
    const filesWithViolations = new Map<string, ReviewViolation[]>();

    for (const file of diff.files) {
      const fileViolations = this.reviewChangedLines(file.path, file.addedLines);
      if (fileViolations.length === 0) continue;

      const existing = filesWithViolations.get(file.path);
      if (existing) {
        existing.push(...fileViolations);
      } else {
        filesWithViolations.set(file.path, [...fileViolations]);
      }
      violations.push(...fileViolations);
    }

    return {
      violations,
      filesWithViolations,
      summary: this.createReviewSummary(violations),
    };
  }

  /**
   * Keeps violations whose severity ranks at or after `minSeverity` in declaration order
   * (critical, major, warning). Asking for `major` therefore keeps major and warning and
   * drops critical; see DESIGN.md before changing this.
   */
  filterViolationsBySeverity(violations: ReviewViolation[], minSeverity: Severity): ReviewViolation[] {
    const threshold = severityRank(minSeverity);
    return violations.filter((v) => severityRank(v.severity) >= threshold);
  }

  createReviewSummary(violations: ReviewViolation[]): ReviewSummary {
    const filesAffected = [...new Set(violations.map((v) => v.filePath))].sort();
    return {
      totalViolations: violations.length,
      criticalCount: violations.filter((v) => v.severity === 'critical').length,
      majorCount: violations.filter((v) => v.severity === 'major').length,
      warningCount: violations.filter((v) => v.severity === 'warning').length,
      filesAffected,
      autoFixableCount: violations.filter((v) => v.autoFixable).length,
    };
  }
}

export interface DiffReviewOptions {
  minSeverity?: Severity;
  /** Review only files of these languages; empty or absent reviews everything. */
  languages?: readonly Language[];
}

export interface DiffReviewOutcome {
  diff: GitDiff;
  result: ReviewResult;
  violations: ReviewViolation[];
}

/**
 * Parse, optionally narrow to one language, review, then apply the severity filter to the
 * flat list. The summary in `result` always covers the unfiltered review.
 */
export function runDiffReview(engine: ReviewEngine, diffText: string, opts: DiffReviewOptions = {}): DiffReviewOutcome {
  const parsed = parseGitDiff(diffText);
  const diff = opts.languages && opts.languages.length > 0 ? filterDiffByLanguage(parsed, opts.languages) : parsed;
  const result = engine.reviewGitDiff(diff);
  const violations = opts.minSeverity
    ? engine.filterViolationsBySeverity(result.violations, opts.minSeverity)
    : result.violations;
  return { diff, result, violations };
}
