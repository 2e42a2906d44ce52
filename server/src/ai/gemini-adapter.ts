import type { ReviewViolation } from '../types.js';
import type { FixProposal } from './types.js';
import { GeminiError } from './types.js';
import { callGemini } from './gemini-client.js';
import { buildFixPrompt, toFixRequest } from './gemini-prompt.js';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

interface ParsedFix {
  fixedCode: string;
  confidence: number;
}

function extractJsonObject(text: string): Record<string, unknown> {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new GeminiError('No JSON object found in Gemini response', 'invalid_response');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonMatch[0]);
  } catch (err) {
    throw new GeminiError(
      `Failed to parse Gemini JSON: ${err instanceof Error ? err.message : String(err)}`,
      'invalid_response',
    );
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new GeminiError('Gemini response is not an object', 'invalid_response');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function parseFixResponse(text: string): ParsedFix {
  const raw = extractJsonObject(text);
  if (typeof raw.fixed_code !== 'string') {
    throw new GeminiError('Gemini response has no "fixed_code"', 'invalid_response');
  }
  const confidence = typeof raw.confidence === 'number' && Number.isFinite(raw.confidence)
    ? Math.min(Math.max(raw.confidence, 0), 1)
    : 0;
  return { fixedCode: raw.fixed_code, confidence };
}

function bracketsBalanced(code: string, open: string, close: string): boolean {
  let depth = 0;
  for (const ch of code) {
    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth < 0) return false;
    }
  }
  return depth === 0;
}

/**
 * Rejects empty or unchanged proposals and ones with unbalanced brackets.
 * Python skips the brace check since braces there are dict/set literals split across lines.
 */
export function isPlausibleFix(original: string, proposed: string, language: string): boolean {
  if (proposed.trim() === '' || proposed.trim() === original.trim()) {
    return false;
  }
  const pairs: Array<[string, string]> = language === 'python'
    ? [['(', ')'], ['[', ']']]
    : [['(', ')'], ['[', ']'], ['{', '}']];
  return pairs.every(([open, close]) => bracketsBalanced(proposed, open, close));
}

export interface FixProposalOptions {
  confidenceThreshold?: number;
}

/**
 * Ask Gemini for replacement code for each auto-fixable violation, one request at a time.
 * An unreadable answer skips that violation; any other failure aborts the batch.
 */
export async function runGeminiFixProposals(
  apiKey: string,
  violations: ReviewViolation[],
  opts: FixProposalOptions = {},
): Promise<FixProposal[]> {
  const threshold = opts.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  const fixable = violations.filter((v) => v.autoFixable);
  const proposals: FixProposal[] = [];

  for (const [i, violation] of fixable.entries()) {
    console.log(`[fix] ${i + 1}/${fixable.length} ${violation.rule.id} at ${violation.filePath}:${violation.lineNumber}`);

    let parsed: ParsedFix;
    try {
      const responseText = await callGemini(apiKey, buildFixPrompt(toFixRequest(violation)), { json: true });
      parsed = parseFixResponse(responseText);
    } catch (err) {
      if (err instanceof GeminiError && err.category === 'invalid_response') {
        console.warn(`[fix] Skipping ${violation.rule.id}: ${err.message}`);
        continue;
      }
      throw err;
    }

    proposals.push({
      filePath: violation.filePath,
      lineNumber: violation.lineNumber,
      ruleId: violation.rule.id,
      original: violation.content,
      proposed: parsed.fixedCode,
      confidence: parsed.confidence,
      accepted: parsed.confidence >= threshold
        && isPlausibleFix(violation.content, parsed.fixedCode, violation.language),
    });
  }

  return proposals;
}
