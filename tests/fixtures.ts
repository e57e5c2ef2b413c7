/**
 * Webhook payload builders shared by the unit and integration tests
 */

import type {
  Actor,
  IssueCommentEvent,
  PullRequestEvent,
  PullRequestPayload,
  PullRequestReviewCommentEvent,
  PullRequestReviewEvent
} from '../src/shared/events.js';

export function actor(login: string): Actor {
  return { login, avatar_url: `https://avatars.example.test/${login}.png` };
}

const repository = { full_name: 'octo/widgets' };

export function pullRequest(overrides: Partial<PullRequestPayload> = {}): PullRequestPayload {
  return {
    title: 'Add widget cache',
    html_url: 'https://github.com/octo/widgets/pull/7',
    user: actor('alice'),
    head: { ref: 'feature/cache' },
    base: { ref: 'main' },
    merged: false,
    ...overrides
  };
}

export function pullRequestEvent(
  action: string,
  overrides: Partial<PullRequestEvent> = {}
): PullRequestEvent {
  return {
    action,
    pull_request: pullRequest(),
    repository,
    sender: actor('bob'),
    ...overrides
  };
}

export function reviewEvent(state: string, reviewer = 'bob'): PullRequestReviewEvent {
  return {
    action: 'submitted',
    pull_request: pullRequest(),
    review: {
      html_url: 'https://github.com/octo/widgets/pull/7#pullrequestreview-1',
      user: actor(reviewer),
      state
    },
    repository,
    sender: actor(reviewer)
  };
}

export function issueCommentEvent(
  body: string,
  options: { writer?: string; onPullRequest?: boolean } = {}
): IssueCommentEvent {
  const writer = options.writer ?? 'bob';
  return {
    action: 'created',
    issue: {
      title: 'Add widget cache',
      html_url: 'https://github.com/octo/widgets/pull/7',
      user: actor('alice'),
      ...(options.onPullRequest === false
        ? {}
        : { pull_request: { html_url: 'https://github.com/octo/widgets/pull/7' } })
    },
    comment: {
      html_url: 'https://github.com/octo/widgets/pull/7#issuecomment-1',
      user: actor(writer),
      body
    },
    repository,
    sender: actor(writer)
  };
}

export function reviewCommentEvent(body: string, writer = 'bob'): PullRequestReviewCommentEvent {
  return {
    action: 'created',
    pull_request: pullRequest(),
    comment: {
      html_url: 'https://github.com/octo/widgets/pull/7#discussion_r1',
      user: actor(writer),
      body
    },
    repository,
    sender: actor(writer)
  };
}
