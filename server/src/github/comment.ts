import { getOctokit, getRepoParams } from './client.js';
import { diffwardenConfig } from '../config.js';

export type CommentAction = 'created' | 'updated';

/**
 * Create the review comment on a pull request, or update the one already carrying the marker.
 */
export async function upsertReviewComment(
  prNumber: number,
  body: string,
  marker: string = diffwardenConfig.comment.marker,
): Promise<{ action: CommentAction; commentId: number }> {
  const octokit = getOctokit();
  const repo = getRepoParams();

  const commentBody = body.includes(marker) ? body : `${marker}\n${body}`;

  const { data: comments } = await octokit.issues.listComments({
    ...repo,
    issue_number: prNumber,
    per_page: 100,
  });

  const existing = comments.find((c) => c.body?.includes(marker));

  if (existing) {
    await octokit.issues.updateComment({
      ...repo,
      comment_id: existing.id,
      body: commentBody,
    });
    return { action: 'updated', commentId: existing.id };
  }

  const { data: created } = await octokit.issues.createComment({
    ...repo,
    issue_number: prNumber,
    body: commentBody,
  });
  return { action: 'created', commentId: created.id };
}
