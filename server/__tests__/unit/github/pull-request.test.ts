import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => ({
  pullsGet: vi.fn(),
}));

vi.mock('@octokit/rest', () => ({
  Octokit: vi.fn().mockImplementation(() => ({
    pulls: { get: mocks.pullsGet },
  })),
}));

vi.mock('../../../src/config.js', () => ({
  env: {
    githubToken: 'test-token',
    githubOwner: 'test-owner',
    githubRepo: 'test-repo',
  },
}));

import { fetchPullRequestDiff } from '../../../src/github/pull-request.js';

describe('fetchPullRequestDiff', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('requests the diff media type and returns the text', async () => {
    const diff = 'diff --git a/app.js b/app.js\n@@ -1,0 +1,1 @@\n+eval(x)\n';
    mocks.pullsGet.mockResolvedValue({ data: diff });

    await expect(fetchPullRequestDiff(12)).resolves.toBe(diff);
    expect(mocks.pullsGet).toHaveBeenCalledWith({
      owner: 'test-owner',
      repo: 'test-repo',
      pull_number: 12,
      mediaType: { format: 'diff' },
    });
  });

  it('rejects when the response is not a diff', async () => {
    mocks.pullsGet.mockResolvedValue({ data: { number: 12 } });

    await expect(fetchPullRequestDiff(12)).rejects.toThrow('Pull request #12 did not return a diff');
  });
});
