import type { ReviewResult, ReviewViolation, Severity } from '../types.js';
import { SEVERITIES } from '../types.js';
import { diffwardenConfig } from '../config.js';

export interface JsonViolation {
  file_path: string;
  line_number: number;
  rule_id: string;
  rule_name: string;
  severity: Severity;
  language: string;
  description: string;
  fix_suggestion: string;
  auto_fixable: boolean;
}

export interface JsonSummary {
  total_violations: number;
  critical_count: number;
  major_count: number;
  warning_count: number;
  files_affected: number;
  auto_fixable_count: number;
}

export interface JsonOutput {
  violations: JsonViolation[];
  summary: JsonSummary;
}

const SEVERITY_LABEL: Record<Severity, string> = {
  critical: 'CRITICAL',
  major: 'MAJOR',
  warning: 'WARNING',
};

/**
 * External JSON shape. `violations` is the (possibly filtered) list; the summary always
 * describes the full review.
 */
export function toJsonOutput(result: ReviewResult, violations: ReviewViolation[]): JsonOutput {
  return {
    violations: violations.map((v) => ({
      file_path: v.filePath,
      line_number: v.lineNumber,
      rule_id: v.rule.id,
      rule_name: v.rule.name,
      severity: v.severity,
      language: v.language,
      description: v.rule.description,
      fix_suggestion: v.fixSuggestion,
      auto_fixable: v.autoFixable,
    })),
    summary: {
      total_violations: result.summary.totalViolations,
      critical_count: result.summary.criticalCount,
      major_count: result.summary.majorCount,
      warning_count: result.summary.warningCount,
      files_affected: result.summary.filesAffected.length,
      auto_fixable_count: result.summary.autoFixableCount,
    },
  };
}

export function groupByFile(violations: ReviewViolation[]): Map<string, ReviewViolation[]> {
  const groups = new Map<string, ReviewViolation[]>();
  for (const v of violations) {
    const group = groups.get(v.filePath);
    if (group) {
      group.push(v);
    } else {
      groups.set(v.filePath, [v]);
    }
  }
  return groups;
}

function countBySeverity(violations: ReviewViolation[], severity: Severity): number {
  return violations.filter((v) => v.severity === severity).length;
}

export interface HumanReadableOptions {
  showFixHints?: boolean;
}

export function formatHumanReadable(
  violations: ReviewViolation[],
  scopeDescription: string,
  opts: HumanReadableOptions = {},
): string {
  const lines: string[] = [`Code review: ${scopeDescription}`];

  if (violations.length === 0) {
    lines.push('No anti-pattern violations found.');
    return lines.join('\n');
  }

  const byFile = groupByFile(violations);
  lines.push(`Found ${violations.length} violation(s) in ${byFile.size} file(s)`, '');

  for (const [filePath, fileViolations] of byFile) {
    lines.push(filePath);
    for (const v of fileViolations) {
      lines.push(`  [${SEVERITY_LABEL[v.severity]}] ${v.rule.name} (${v.rule.id})`);
      lines.push(`    Line ${v.lineNumber}: ${v.content}`);
      lines.push(`    Fix: ${v.fixSuggestion}`);
      if (v.autoFixable && opts.showFixHints) {
        lines.push('    Auto-fixable');
      }
      lines.push('');
    }
  }

  lines.push(`Summary: ${violations.length} violation(s)`);
  for (const severity of SEVERITIES) {
    const count = countBySeverity(violations, severity);
    if (count > 0) {
      lines.push(`  ${SEVERITY_LABEL[severity]}: ${count}`);
    }
  }

  const autoFixable = violations.filter((v) => v.autoFixable).length;
  if (autoFixable > 0) {
    lines.push(`  Auto-fixable: ${autoFixable}`);
    if (!opts.showFixHints) {
      lines.push('', 'Use --suggest to see suggested fixes, or --fix to request fix proposals.');
    }
  }

  return lines.join('\n');
}

export function formatFixSuggestions(violations: ReviewViolation[]): string {
  const fixable = violations.filter((v) => v.autoFixable);
  if (fixable.length === 0) {
    return 'No auto-fixable violations found.';
  }

  const lines = ['Suggested fixes:', ''];
  for (const v of fixable) {
    lines.push(`${v.filePath}:${v.lineNumber}`);
    lines.push(`   Issue: ${v.rule.name}`);
    lines.push(`   Current: ${v.content}`);
    lines.push(`   Suggestion: ${v.fixSuggestion}`);
    lines.push('');
  }
  return lines.join('\n').trimEnd();
}

function escapeTableCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

export function generateMarkdownReport(result: ReviewResult, violations: ReviewViolation[] = result.violations): string {
  const { summary } = result;
  const lines: string[] = [
    diffwardenConfig.comment.marker,
    '## diffwarden review',
    '',
  ];

  if (violations.length === 0) {
    lines.push('No anti-pattern violations found in the added lines.');
    return lines.join('\n');
  }

  lines.push('| Severity | Count |');
  lines.push('|----------|-------|');
  lines.push(`| critical | ${summary.criticalCount} |`);
  lines.push(`| major | ${summary.majorCount} |`);
  lines.push(`| warning | ${summary.warningCount} |`);
  lines.push('');
  lines.push(`Files affected: ${summary.filesAffected.length} | Auto-fixable: ${summary.autoFixableCount}`);
  lines.push('');

  for (const severity of SEVERITIES) {
    const group = violations.filter((v) => v.severity === severity);
    if (group.length === 0) continue;

    lines.push(`### ${severity.charAt(0).toUpperCase() + severity.slice(1)} (${group.length})`);
    lines.push('');
    lines.push('| File | Line | Rule | Fix |');
    lines.push('|------|------|------|-----|');
    for (const v of group) {
      lines.push(`| \`${v.filePath}\` | ${v.lineNumber} | ${escapeTableCell(v.rule.name)} | ${escapeTableCell(v.fixSuggestion)} |`);
    }
    lines.push('');
  }

  return lines.join('\n').trimEnd();
}
