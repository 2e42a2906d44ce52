// === Rule model ===
export const LANGUAGES = ['elixir', 'javascript', 'typescript', 'python', 'rust', 'zig', 'sql'] as const;
export type Language = typeof LANGUAGES[number];

// Declaration order is the comparison order: critical < major < warning
export const SEVERITIES = ['critical', 'major', 'warning'] as const;
export type Severity = typeof SEVERITIES[number];

export type DetectionMethod =
  | { type: 'regex'; pattern: string }
  | { type: 'ratio'; pattern: string; threshold: number }
  | { type: 'line_count'; pattern: string; threshold: number }
  | { type: 'custom'; pattern: string }
  | { type: 'ast'; pattern: string };

export type DetectionMethodType = DetectionMethod['type'];

export interface CodeExample {
  bad: string;
  good: string;
  explanation: string;
}

export interface AntiPattern {
  id: string;
  name: string;
  language: Language;
  severity: Severity;
  description: string;
  detectionMethod: DetectionMethod;
  fixSuggestion: string;
  sourceUrl?: string;
  claudeCodeFixable: boolean;
  examples: CodeExample[];
  tags: string[];
  enabled: boolean;
}

// === Diff ===
export type ChangeType = 'added' | 'removed' | 'modified';

export interface ChangedLine {
  lineNumber: number;
  content: string;
  changeType: ChangeType;
  contextBefore: string[];
  contextAfter: string[];
}

export interface FileDiff {
  path: string;
  addedLines: ChangedLine[];
  removedLines: ChangedLine[];
}

export interface GitDiff {
  files: FileDiff[];
}

// === Review ===
export interface ReviewViolation {
  rule: AntiPattern;
  filePath: string;
  lineNumber: number;
  content: string;
  severity: Severity;
  language: Language;
  fixSuggestion: string;
  autoFixable: boolean;
  contextBefore: string[];
  contextAfter: string[];
  confidence: number;
}

export interface ReviewSummary {
  totalViolations: number;
  criticalCount: number;
  majorCount: number;
  warningCount: number;
  filesAffected: string[];
  autoFixableCount: number;
}

export interface ReviewResult {
  violations: ReviewViolation[];
  filesWithViolations: Map<string, ReviewViolation[]>;
  summary: ReviewSummary;
}

// === Config ===
export interface DiffwardenConfig {
  version: string;
  settings: {
    autoFix: boolean;
    severityThreshold: Severity;
    focusLanguages: Language[];
  };
  comment: { marker: string };
  review: { defaultScope: string };
}

// === API ===
// Request bodies arrive unvalidated
export interface ReviewRunRequest {
  diff?: unknown;
  prNumber?: unknown;
  minSeverity?: unknown;
  language?: unknown;
  dryRun?: unknown;
}

export interface HealthResponse {
  status: string;
  version: string;
  timestamp: string;
  rules: number;
  fixProvider: 'gemini' | 'off';
}

export function isLanguage(value: unknown): value is Language {
  return typeof value === 'string' && (LANGUAGES as readonly string[]).includes(value);
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}
