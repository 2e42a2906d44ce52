import type { Language } from '../types.js';

export interface FixRequest {
  filePath: string;
  lineNumber: number;
  language: Language;
  originalCode: string;
  problem: string;
  fixSuggestion: string;
  contextBefore: string[];
  contextAfter: string[];
}

/**
 * Replacement code proposed for one violation. Proposals are never written to disk;
 * `accepted` marks the ones that cleared the confidence threshold and the sanity checks.
 */
export interface FixProposal {
  filePath: string;
  lineNumber: number;
  ruleId: string;
  original: string;
  proposed: string;
  confidence: number;
  accepted: boolean;
}

export type GeminiErrorCategory =
  | 'auth_failure'
  | 'rate_limit'
  | 'transient'
  | 'invalid_response'
  | 'input_too_large'
  | 'unknown';

export class GeminiError extends Error {
  constructor(
    message: string,
    public readonly category: GeminiErrorCategory,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'GeminiError';
  }
}
