/**
 * Event classification and Discord embed construction
 * Turns one webhook event into a single embed and the logins to notify
 */

import type { ColorTable } from './config.js';
import { DEFAULT_COMMENT_PREVIEW_LENGTH, DEFAULT_FOOTER_TEXT } from './config.js';
import type { Actor, EventEnvelope, PullRequestPayload, Repository } from './events.js';

export type ContextType = 'pr' | 'review_submit' | 'comment';

// Flat view of the event, shared by every rule
export interface NormalizedContext {
  type: ContextType;
  title: string;
  url: string;
  repo: string;
  sender: string;
  avatar: string;
  author: string;
  head: string;
  base: string;
  merged: boolean;
  state?: string;
  body?: string;
}

export interface EmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface Embed {
  title: string;
  url: string;
  author: { name: string; icon_url: string };
  fields: EmbedField[];
  footer: { text: string };
  color?: number;
  description?: string;
}

export type Classification =
  | {
      kind: 'notify';
      context: NormalizedContext;
      embed: Readonly<Embed>;
      recipients: string[];
    }
  | { kind: 'skip'; reason: string; context?: NormalizedContext };

export interface ClassifyOptions {
  footerText?: string;
  commentPreviewLength?: number;
}

const MENTION_PATTERN = /@([a-zA-Z0-9-]+)/g;

function basePullRequestContext(
  pr: PullRequestPayload,
  repository: Repository,
  actor: Actor
): Omit<NormalizedContext, 'type' | 'url'> {
  return {
    title: pr.title,
    repo: repository.full_name,
    sender: actor.login,
    avatar: actor.avatar_url,
    author: pr.user.login,
    head: pr.head.ref,
    base: pr.base.ref,
    merged: pr.merged ?? false
  };
}

/**
 * Extract the normalized context from an event
 * @returns null for unsupported events and comments on plain issues
 */
export function buildContext(envelope: EventEnvelope): NormalizedContext | null {
  switch (envelope.name) {
    case 'pull_request': {
      const { pull_request: pr, repository, sender } = envelope.payload;
      return {
        type: 'pr',
        url: pr.html_url,
        ...basePullRequestContext(pr, repository, sender)
      };
    }

    case 'pull_request_review': {
      const { pull_request: pr, repository, review } = envelope.payload;
      // The reviewer is the sender; the PR author is the target
      return {
        type: 'review_submit',
        url: review.html_url,
        ...basePullRequestContext(pr, repository, review.user),
        state: review.state.toLowerCase()
      };
    }

    case 'issue_comment': {
      const { issue, comment, repository } = envelope.payload;
      if (!('pull_request' in issue)) {
        return null;
      }
      return {
        type: 'comment',
        title: issue.title,
        url: comment.html_url,
        repo: repository.full_name,
        sender: comment.user.login,
        avatar: comment.user.avatar_url,
        author: issue.user.login,
        head: '',
        base: '',
        merged: false,
        body: comment.body ?? ''
      };
    }

    case 'pull_request_review_comment': {
      const { pull_request: pr, comment, repository } = envelope.payload;
      return {
        type: 'comment',
        title: pr.title,
        url: comment.html_url,
        repo: repository.full_name,
        sender: comment.user.login,
        avatar: comment.user.avatar_url,
        author: pr.user.login,
        head: '',
        base: '',
        merged: false,
        body: comment.body ?? ''
      };
    }

    case 'unsupported':
      return null;
  }
}

/**
 * Collect @-mentions from a comment body, de-duplicated in first-seen order
 */
export function extractMentions(body: string): string[] {
  const mentions = new Set<string>();
  for (const match of body.matchAll(MENTION_PATTERN)) {
    mentions.add(match[1]);
  }
  return [...mentions];
}

/**
 * Shorten a comment body for display
 */
export function truncateBody(body: string, limit = DEFAULT_COMMENT_PREVIEW_LENGTH): string {
  // Count code points so an emoji is never split
  const chars = [...body];
  return chars.length > limit ? `${chars.slice(0, limit).join('')}...` : body;
}

/**
 * "pull_request_review" → "Pull Request Review"
 */
export function formatEventName(eventName: string): string {
  return eventName
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/\b[a-z]/g, letter => letter.toUpperCase());
}

/**
 * De-duplicate recipients and drop the person who triggered the event
 */
export function finalizeRecipients(recipients: readonly string[], sender: string): string[] {
  return [...new Set(recipients)].filter(login => login !== sender);
}

function buildBaseEmbed(
  context: NormalizedContext,
  eventName: string,
  footerText: string
): Embed {
  const embed: Embed = {
    title: context.title,
    url: context.url,
    author: {
      name: `${context.sender} (${formatEventName(eventName)})`,
      icon_url: context.avatar
    },
    fields: [
      { name: '📂 Repo', value: context.repo, inline: true },
      { name: '👤 Author', value: context.author, inline: true }
    ],
    footer: { text: footerText }
  };

  if (context.head) {
    embed.fields.push({
      name: '🌿 Branch',
      value: `\`${context.head}\` ➝ \`${context.base}\``,
      inline: true
    });
  }

  return embed;
}

function freezeEmbed(embed: Embed): Readonly<Embed> {
  embed.fields.forEach(field => Object.freeze(field));
  Object.freeze(embed.fields);
  Object.freeze(embed.author);
  Object.freeze(embed.footer);
  return Object.freeze(embed);
}

/**
 * Classify an event and build the embed plus its recipients
 * @param envelope - Loaded event
 * @param colors - Color table
 * @param options - Display options
 */
export function classifyEvent(
  envelope: EventEnvelope,
  colors: Readonly<ColorTable>,
  options: ClassifyOptions = {}
): Classification {
  if (envelope.name === 'unsupported') {
    return { kind: 'skip', reason: `Skipping unsupported event: ${envelope.eventName}` };
  }

  const context = buildContext(envelope);
  if (!context) {
    return { kind: 'skip', reason: 'Comment is on an issue, not a pull request' };
  }

  const embed = buildBaseEmbed(context, envelope.name, options.footerText ?? DEFAULT_FOOTER_TEXT);
  const recipients: string[] = [];

  switch (envelope.name) {
    case 'pull_request_review': {
      if (context.state === 'approved') {
        recipients.push(context.author);
        embed.color = colors.APPROVED;
        embed.description = '**✅ PR Approved!**';
        embed.fields.push({ name: 'Reviewer', value: `Approved by ${context.sender}`, inline: false });
      } else if (context.state === 'changes_requested') {
        recipients.push(context.author);
        embed.color = colors.CHANGES;
        embed.description = '**⚠️ Changes Requested**';
        embed.fields.push({ name: 'Reviewer', value: `${context.sender} requested changes.`, inline: false });
      } else {
        // A "commented" review also fires a comment event, which notifies instead
        return {
          kind: 'skip',
          reason: `Skipping '${context.state ?? 'unknown'}' review type (handled by comment logic)`,
          context
        };
      }
      break;
    }

    case 'pull_request': {
      const { action, requested_reviewer: reviewer, assignee } = envelope.payload;
      if (action === 'review_requested') {
        if (reviewer) {
          recipients.push(reviewer.login);
          embed.color = colors.INFO;
          embed.description = '**Review Requested**\nYou were requested to review this PR.';
        }
      } else if (action === 'assigned') {
        if (assignee) {
          recipients.push(assignee.login);
          embed.color = colors.INFO;
          embed.description = '**Assigned to You**';
        }
      } else if (action === 'closed') {
        if (context.author !== context.sender) {
          recipients.push(context.author);
        }
        embed.color = context.merged ? colors.MERGED : colors.CLOSED;
        embed.description = context.merged
          ? '**Your PR was Merged!**'
          : '**Your PR was Closed** (Unmerged)';
      } else {
        return { kind: 'skip', reason: `No notification rule for pull_request action: ${action}`, context };
      }
      break;
    }

    case 'issue_comment':
    case 'pull_request_review_comment': {
      const body = context.body ?? '';
      embed.color = colors.COMMENT;
      embed.description = '**New Comment**';
      embed.fields.push({
        name: 'Message',
        value: truncateBody(body, options.commentPreviewLength),
        inline: false
      });

      if (context.author !== context.sender) {
        recipients.push(context.author);
      }
      recipients.push(...extractMentions(body));
      break;
    }
  }

  const finalRecipients = finalizeRecipients(recipients, context.sender);
  if (finalRecipients.length === 0) {
    return { kind: 'skip', reason: 'No recipients to notify', context };
  }

  return { kind: 'notify', context, embed: freezeEmbed(embed), recipients: finalRecipients };
}
