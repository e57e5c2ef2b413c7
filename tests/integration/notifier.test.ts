/**
 * Integration Tests for the Notifier
 *
 * Runs the whole flow against a temporary event file and a mocked Discord API
 */

import path from 'path';
import fs from 'fs-extra';
import { dir as tmpDir } from 'tmp-promise';
import type { DirectoryResult } from 'tmp-promise';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildConfig, DEFAULT_COLORS } from '../../src/shared/config.js';
import { Notifier } from '../../src/notifier/index.js';
import { createMockDiscordApi } from './mocks.js';
import {
  actor,
  issueCommentEvent,
  pullRequest,
  pullRequestEvent,
  reviewEvent
} from '../fixtures.js';

function mappingArg(mapping: Record<string, string>): string[] {
  return ['--mapping-b64', Buffer.from(JSON.stringify(mapping)).toString('base64')];
}

describe('Notifier', () => {
  let tmp: DirectoryResult;
  let eventPath: string;

  beforeEach(async () => {
    tmp = await tmpDir({ unsafeCleanup: true });
    eventPath = path.join(tmp.path, 'event.json');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await tmp.cleanup();
  });

  async function runWith(eventName: string, payload: object, argv: string[]) {
    await fs.writeJson(eventPath, payload);
    const config = buildConfig(argv, {
      GITHUB_EVENT_PATH: eventPath,
      GITHUB_EVENT_NAME: eventName,
      DISCORD_BOT_TOKEN: 'test-token'
    });
    const api = createMockDiscordApi();
    const report = await new Notifier(config, { http: api.http }).run();
    return { report, api };
  }

  it('should DM the author once when their PR is merged by someone else', async () => {
    const payload = pullRequestEvent('closed', {
      pull_request: pullRequest({ merged: true }),
      sender: actor('bob')
    });

    const { report, api } = await runWith('pull_request', payload, mappingArg({ alice: '111' }));

    expect(report.status).toBe('completed');
    expect(report.action).toBe('closed');
    expect(report.results).toEqual([
      { status: 'delivered', login: 'alice', discordId: '111', channelId: 'dm-111' }
    ]);
    expect(report.summary).toEqual({ delivered: 1, unmapped: 0, failed: 0 });
    expect(api.http.post).toHaveBeenCalledTimes(2);
    expect(api.http.post).toHaveBeenNthCalledWith(1, '/users/@me/channels', { recipient_id: '111' });
    expect(api.messages).toHaveLength(1);
    expect(report.embed?.color).toBe(DEFAULT_COLORS.MERGED);
    expect(report.embed?.description).toBe('**Your PR was Merged!**');
    expect(api.messages[0].embeds).toEqual([report.embed]);
  });

  it('should not deliver anything for a comment on a plain issue', async () => {
    const payload = issueCommentEvent('hey @alice', { onPullRequest: false });

    const { report, api } = await runWith('issue_comment', payload, mappingArg({ alice: '111' }));

    expect(report.status).toBe('skipped');
    expect(report.reason).toBe('Comment is on an issue, not a pull request');
    expect(report.results).toEqual([]);
    expect(api.http.post).not.toHaveBeenCalled();
  });

  it('should share one embed across all recipients of a comment', async () => {
    const payload = issueCommentEvent('@carol @dave please take a look');

    const { report, api } = await runWith(
      'issue_comment',
      payload,
      mappingArg({ alice: '111', carol: '333' })
    );

    expect(report.recipients).toEqual(['alice', 'carol', 'dave']);
    expect(report.summary).toEqual({ delivered: 2, unmapped: 1, failed: 0 });
    expect(api.messages.map(message => message.channelId)).toEqual(['dm-111', 'dm-333']);
    expect(api.messages[0].embeds).toEqual(api.messages[1].embeds);
  });

  it('should not deliver anything for a commented review', async () => {
    const { report, api } = await runWith(
      'pull_request_review',
      reviewEvent('commented'),
      mappingArg({ alice: '111' })
    );

    expect(report.status).toBe('skipped');
    expect(report.embed).toBeUndefined();
    expect(api.http.post).not.toHaveBeenCalled();
  });

  it('should continue with an empty mapping when the mapping is malformed', async () => {
    const { report, api } = await runWith(
      'pull_request',
      pullRequestEvent('closed'),
      ['--mapping-b64', '%%%not-base64%%%']
    );

    expect(report.status).toBe('completed');
    expect(report.results).toEqual([{ status: 'unmapped', login: 'alice' }]);
    expect(api.http.post).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalled();
  });

  it('should abort cleanly without an event path', async () => {
    const api = createMockDiscordApi();
    const config = buildConfig(mappingArg({ alice: '111' }), { GITHUB_EVENT_NAME: 'pull_request' });

    const report = await new Notifier(config, { http: api.http }).run();

    expect(report.status).toBe('aborted');
    expect(report.reason).toBe('GITHUB_EVENT_PATH not set.');
    expect(api.http.post).not.toHaveBeenCalled();
  });

  it('should abort cleanly on a payload missing required fields', async () => {
    const { report, api } = await runWith('pull_request', { action: 'closed' }, mappingArg({ alice: '111' }));

    expect(report.status).toBe('aborted');
    expect(report.reason).toMatch(/^Malformed pull_request payload: /);
    expect(api.http.post).not.toHaveBeenCalled();
  });

  it('should skip unsupported events', async () => {
    const { report } = await runWith('push', { ref: 'refs/heads/main' }, []);

    expect(report.status).toBe('skipped');
    expect(report.reason).toBe('Skipping unsupported event: push');
    expect(report.action).toBeUndefined();
  });
});
