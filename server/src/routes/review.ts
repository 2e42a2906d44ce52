import { Hono } from 'hono';
import type { Language, ReviewRunRequest, Severity } from '../types.js';
import { isLanguage, isSeverity } from '../types.js';
import type { ReviewEngine } from '../engine/review-engine.js';
import { runDiffReview } from '../engine/review-engine.js';
import { generateMarkdownReport, toJsonOutput } from '../engine/report-generator.js';
import { fetchPullRequestDiff } from '../github/pull-request.js';
import { upsertReviewComment } from '../github/comment.js';

interface ValidatedRequest {
  diff?: string;
  prNumber?: number;
  minSeverity?: Severity;
  language?: Language;
  dryRun: boolean;
}

function validate(body: ReviewRunRequest): ValidatedRequest | string {
  if (body.diff === undefined && body.prNumber === undefined) {
    return 'either diff or prNumber is required';
  }
  const diff = typeof body.diff === 'string' ? body.diff : undefined;
  if (body.diff !== undefined && diff === undefined) {
    return 'diff must be a string';
  }
  const prNumber = typeof body.prNumber === 'number' && Number.isInteger(body.prNumber) && body.prNumber > 0
    ? body.prNumber
    : undefined;
  if (body.prNumber !== undefined && prNumber === undefined) {
    return 'prNumber must be a positive integer';
  }
  const minSeverity = isSeverity(body.minSeverity) ? body.minSeverity : undefined;
  if (body.minSeverity !== undefined && minSeverity === undefined) {
    return 'minSeverity must be one of critical, major, warning';
  }
  const language = isLanguage(body.language) ? body.language : undefined;
  if (body.language !== undefined && language === undefined) {
    return `unsupported language "${String(body.language)}"`;
  }
  return { diff, prNumber, minSeverity, language, dryRun: body.dryRun === true };
}

export function createReviewRoutes(engine: ReviewEngine): Hono {
  const review = new Hono();

  review.post('/api/review/run', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: 'request body must be JSON' }, 400);
    }
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      return c.json({ error: 'request body must be a JSON object' }, 400);
    }

    const request = validate(body);
    if (typeof request === 'string') {
      return c.json({ error: request }, 400);
    }

    // An inline diff wins over a pull request number
    const prNumber = request.diff === undefined ? request.prNumber : undefined;
    const diffText = prNumber === undefined ? request.diff ?? '' : await fetchPullRequestDiff(prNumber);
    const { result, violations } = runDiffReview(engine, diffText, {
      minSeverity: request.minSeverity,
      languages: request.language ? [request.language] : undefined,
    });
    const output = toJsonOutput(result, violations);
    const markdownPreview = generateMarkdownReport(result, violations);

    if (prNumber === undefined || request.dryRun) {
      return c.json({ ...output, markdownPreview });
    }

    const comment = await upsertReviewComment(prNumber, markdownPreview);
    return c.json({ ...output, markdownPreview, comment });
  });

  return review;
}
