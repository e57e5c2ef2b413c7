/**
 * Webhook event loading
 * Reads the payload GitHub Actions writes to GITHUB_EVENT_PATH
 */

import fs from 'fs-extra';
import { errorMessage } from './errors.js';

// Only the fields the notifier reads are modelled here
export interface Actor {
  login: string;
  avatar_url: string;
}

export interface Repository {
  full_name: string;
}

export interface PullRequestPayload {
  title: string;
  html_url: string;
  user: Actor;
  head: { ref: string };
  base: { ref: string };
  merged?: boolean | null;
}

export interface PullRequestEvent {
  action: string;
  pull_request: PullRequestPayload;
  repository: Repository;
  sender: Actor;
  requested_reviewer?: Actor;
  assignee?: Actor | null;
}

export interface PullRequestReviewEvent {
  action: string;
  pull_request: PullRequestPayload;
  review: {
    html_url: string;
    user: Actor;
    state: string;
  };
  repository: Repository;
  sender: Actor;
}

export interface CommentPayload {
  html_url: string;
  user: Actor;
  body: string | null;
}

export interface IssueCommentEvent {
  action: string;
  issue: {
    title: string;
    html_url: string;
    user: Actor;
    pull_request?: { html_url?: string } | null;
  };
  comment: CommentPayload;
  repository: Repository;
  sender: Actor;
}

export interface PullRequestReviewCommentEvent {
  action: string;
  pull_request: PullRequestPayload;
  comment: CommentPayload;
  repository: Repository;
  sender: Actor;
}

export type EventEnvelope =
  | { name: 'pull_request'; payload: PullRequestEvent }
  | { name: 'pull_request_review'; payload: PullRequestReviewEvent }
  | { name: 'issue_comment'; payload: IssueCommentEvent }
  | { name: 'pull_request_review_comment'; payload: PullRequestReviewCommentEvent }
  | { name: 'unsupported'; eventName: string; action?: string };

export type LoadResult =
  | { ok: true; envelope: EventEnvelope }
  | { ok: false; reason: string };

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get the action of any envelope, if the payload carries one
 */
export function envelopeAction(envelope: EventEnvelope): string | undefined {
  return envelope.name === 'unsupported' ? envelope.action : envelope.payload.action;
}

/**
 * Load and tag the event payload
 * @param eventPath - Path from GITHUB_EVENT_PATH
 * @param eventName - Value of GITHUB_EVENT_NAME
 */
export async function loadEvent(
  eventPath: string | undefined,
  eventName: string
): Promise<LoadResult> {
  if (!eventPath) {
    return { ok: false, reason: 'GITHUB_EVENT_PATH not set.' };
  }

  if (!(await fs.pathExists(eventPath))) {
    return { ok: false, reason: `Event file not found: ${eventPath}` };
  }

  let payload: unknown;
  try {
    payload = await fs.readJson(eventPath);
  } catch (error) {
    return { ok: false, reason: `Could not parse event file ${eventPath}: ${errorMessage(error)}` };
  }

  if (!isJsonObject(payload)) {
    return { ok: false, reason: `Event file ${eventPath} does not contain a JSON object` };
  }

  return { ok: true, envelope: toEnvelope(eventName, payload) };
}

function toEnvelope(eventName: string, payload: Record<string, unknown>): EventEnvelope {
  switch (eventName) {
    case 'pull_request':
    case 'pull_request_review':
    case 'issue_comment':
    case 'pull_request_review_comment': {
      // GitHub fixes the payload shape per event name; fields are read as trusted
      const body: unknown = payload;
      return { name: eventName, payload: body } as EventEnvelope;
    }
    default:
      return {
        name: 'unsupported',
        eventName,
        action: typeof payload.action === 'string' ? payload.action : undefined
      };
  }
}
