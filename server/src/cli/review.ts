#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import type { Language, ReviewViolation } from '../types.js';
import { diffwardenConfig, env, getFixProviderConfig, validateConfig } from '../config.js';
import { buildRegistry } from '../engine/pattern-registry.js';
import { CustomRulesManager, loadProjectRulesSafely } from '../engine/custom-rules.js';
import type { ProjectInfo } from '../engine/project-detector.js';
import { detectProject, describeProject } from '../engine/project-detector.js';
import { ReviewEngine, runDiffReview } from '../engine/review-engine.js';
import {
  formatFixSuggestions,
  formatHumanReadable,
  generateMarkdownReport,
  toJsonOutput,
} from '../engine/report-generator.js';
import { describeScope, determineDiffScope, executeGitDiff } from '../git/git-diff.js';
import { fetchPullRequestDiff } from '../github/pull-request.js';
import { upsertReviewComment } from '../github/comment.js';
import { runGeminiFixProposals } from '../ai/gemini-adapter.js';
import { buildInteractiveQuery } from '../ai/gemini-prompt.js';
import type { ReviewArgs } from './args.js';
import { UsageError, parseReviewArgs } from './args.js';

const USAGE = `Usage: diffwarden-review [options]

Scope (default: changes since ${diffwardenConfig.review.defaultScope}):
  --staged              review staged changes
  --uncommitted         review unstaged changes
  --since <ref>         review changes since a commit or branch
  --diff-file <path>    review a saved unified diff
  --pr <number>         review a GitHub pull request
  --comment             post the report on the pull request (with --pr)

Filters:
  --severity <level>    critical | major | warning
  --language <lang>     only files of this language

Output:
  --json                machine-readable output
  --suggest             show fix suggestions for auto-fixable violations
  --fix                 request fix proposals (never writes files)`;

async function loadDiff(args: ReviewArgs): Promise<{ text: string; scope: string }> {
  if (args.diffFile) {
    return { text: readFileSync(args.diffFile, 'utf-8'), scope: args.diffFile };
  }
  if (args.pr !== undefined) {
    return { text: await fetchPullRequestDiff(args.pr), scope: `pull request #${args.pr}` };
  }
  const scope = determineDiffScope(args, diffwardenConfig.review.defaultScope);
  return { text: await executeGitDiff(scope), scope: describeScope(scope) };
}

function reviewLanguages(args: ReviewArgs): readonly Language[] {
  if (args.language) return [args.language];
  return diffwardenConfig.settings.focusLanguages;
}

async function main() {
  const args = parseReviewArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }
  validateConfig();

  const project = detectProject();
  const registry = buildRegistry({
    customRules: loadProjectRulesSafely(new CustomRulesManager(), project.name),
  });
  const engine = new ReviewEngine(registry);

  const diff = await loadDiff(args);
  const { result, violations } = runDiffReview(engine, diff.text, {
    minSeverity: args.severity ?? diffwardenConfig.settings.severityThreshold,
    languages: reviewLanguages(args),
  });

  const wantsFix = args.fix || diffwardenConfig.settings.autoFix;

  if (args.json) {
    console.log(JSON.stringify(toJsonOutput(result, violations), null, 2));
  } else {
    console.log(formatHumanReadable(violations, diff.scope, { showFixHints: args.suggest || wantsFix }));
  }

  if (args.comment && args.pr !== undefined) {
    const comment = await upsertReviewComment(args.pr, generateMarkdownReport(result, violations));
    console.error(`Review comment ${comment.action} (id ${comment.commentId})`);
  }

  if (wantsFix) {
    await proposeFixes(violations, project);
  } else if (args.suggest) {
    console.log('');
    console.log(formatFixSuggestions(violations));
  }
}

async function proposeFixes(violations: ReviewViolation[], project: ProjectInfo) {
  if (violations.length === 0) {
    console.log('No violations to fix.');
    return;
  }

  const provider = getFixProviderConfig();
  if (provider.effective !== 'gemini') {
    console.log(`\nFix proposals are off (FIX_PROVIDER=${env.fixProviderRaw}). Repair prompt for ${describeProject(project)}:\n`);
    console.log(buildInteractiveQuery(violations, project));
    return;
  }

  const proposals = await runGeminiFixProposals(env.geminiApiKey, violations);
  if (proposals.length === 0) {
    console.log('\nNo fix proposals.');
    return;
  }

  console.log('\nFix proposals (not applied):\n');
  for (const p of proposals) {
    const status = p.accepted ? 'proposed' : 'low confidence';
    console.log(`${p.filePath}:${p.lineNumber} ${p.ruleId} [${status}, ${p.confidence.toFixed(2)}]`);
    console.log(`  - ${p.original}`);
    console.log(`  + ${p.proposed}`);
    console.log('');
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error('Error:', message);
  if (err instanceof UsageError) {
    console.error(`\n${USAGE}`);
  }
  process.exit(1);
});
