import type { ReviewViolation } from '../types.js';
import type { FixRequest } from './types.js';
import type { ProjectInfo } from '../engine/project-detector.js';
import { groupByFile } from '../engine/report-generator.js';

export function toFixRequest(violation: ReviewViolation): FixRequest {
  return {
    filePath: violation.filePath,
    lineNumber: violation.lineNumber,
    language: violation.language,
    originalCode: violation.content,
    problem: violation.rule.description,
    fixSuggestion: violation.fixSuggestion,
    contextBefore: violation.contextBefore,
    contextAfter: violation.contextAfter,
  };
}

/**
 * Excerpt around the flagged line. Only the flagged line carries a number: context lines
 * are the nearest unchanged lines, which need not be adjacent to it in the new file.
 */
export function numberedExcerpt(
  lineNumber: number,
  content: string,
  contextBefore: string[],
  contextAfter: string[],
): string[] {
  const gutter = ' '.repeat(String(lineNumber).length);
  return [
    ...contextBefore.map((line) => `${gutter} | ${line}`),
    `${lineNumber} | ${content}  <- VIOLATION`,
    ...contextAfter.map((line) => `${gutter} | ${line}`),
  ];
}

export function buildFixPrompt(request: FixRequest): string {
  const excerpt = numberedExcerpt(
    request.lineNumber,
    request.originalCode,
    request.contextBefore,
    request.contextAfter,
  ).join('\n');

  return `Fix this ${request.language} code violation.

File: ${request.filePath}
Line: ${request.lineNumber}

Problem: ${request.problem}
Suggestion: ${request.fixSuggestion}

Context:
\`\`\`${request.language}
${excerpt}
\`\`\`

Answer with a single JSON object and nothing else:

\`\`\`json
{ "fixed_code": "the line(s) that replace line ${request.lineNumber}", "confidence": 0.0 }
\`\`\`

- "fixed_code" replaces only the flagged line, keeping its indentation
- "confidence" is a number between 0 and 1`;
}

/**
 * One prompt covering every violation, for an interactive repair session.
 */
export function buildInteractiveQuery(violations: ReviewViolation[], project: ProjectInfo): string {
  const byFile = groupByFile(violations);
  const languages = project.languages.length > 0 ? project.languages.join(', ') : 'unknown';

  const lines: string[] = [
    'Fix these code quality violations in my project:',
    '',
    `PROJECT: ${project.name} (${languages})`,
    `FILES AFFECTED: ${byFile.size} files with ${violations.length} violations`,
    '',
    'VIOLATIONS FOUND:',
    '',
  ];

  for (const [filePath, fileViolations] of byFile) {
    for (const v of fileViolations) {
      lines.push(`${filePath}:${v.lineNumber}`);
      lines.push(`${v.severity.toUpperCase()}: ${v.rule.name} (${v.rule.id})`);
      lines.push(`   Problem: ${v.rule.description}`);
      lines.push('   Code:');
      for (const excerptLine of numberedExcerpt(v.lineNumber, v.content, v.contextBefore, v.contextAfter)) {
        lines.push(`   ${excerptLine}`);
      }
      lines.push(`   Fix: ${v.fixSuggestion}`);
      lines.push('');
    }
  }

  lines.push('Please help me fix these issues interactively. Show me the problems and guide me through solutions.');
  return lines.join('\n');
}
