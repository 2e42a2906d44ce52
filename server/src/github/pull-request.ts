import { getOctokit, getRepoParams } from './client.js';

/**
 * Unified diff of a pull request, as `git diff` would print it.
 */
export async function fetchPullRequestDiff(prNumber: number): Promise<string> {
  const octokit = getOctokit();
  const repo = getRepoParams();

  const response = await octokit.pulls.get({
    ...repo,
    pull_number: prNumber,
    mediaType: { format: 'diff' },
  });

  // The diff media type swaps the JSON body for plain text
  const diff: unknown = response.data;
  if (typeof diff !== 'string') {
    throw new Error(`Pull request #${prNumber} did not return a diff`);
  }
  return diff;
}
