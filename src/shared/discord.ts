/**
 * Discord REST client
 * Opens a DM channel per recipient and posts the embed into it
 */

import axios from 'axios';
import type { Embed } from './embed.js';
import type { UserMapping } from './config.js';
import { errorMessage } from './errors.js';

export interface DiscordClientOptions {
  token: string;
  baseUrl: string;
  userAgent: string;
}

// The part of axios the client calls; tests hand in a fake
export interface HttpClient {
  post(url: string, data: unknown): Promise<{ data: unknown }>;
}

export type DeliveryStage = 'open_channel' | 'send_message';

export type DeliveryResult =
  | { status: 'delivered'; login: string; discordId: string; channelId: string }
  | { status: 'unmapped'; login: string }
  | { status: 'failed'; login: string; discordId: string; stage: DeliveryStage; error: string };

export interface DeliverySummary {
  delivered: number;
  unmapped: number;
  failed: number;
}

export function createHttpClient(options: DiscordClientOptions): HttpClient {
  return axios.create({
    baseURL: options.baseUrl,
    headers: {
      Authorization: `Bot ${options.token}`,
      'Content-Type': 'application/json',
      'User-Agent': options.userAgent
    }
  });
}

export class DiscordClient {
  private http: HttpClient;
  private hasToken: boolean;

  /**
   * @param options - Token, API base URL and user agent
   * @param http - HTTP client; defaults to an axios instance built from options
   */
  constructor(options: DiscordClientOptions, http?: HttpClient) {
    this.hasToken = options.token.length > 0;
    this.http = http ?? createHttpClient(options);
  }

  get configured(): boolean {
    return this.hasToken;
  }

  /**
   * Create (or fetch) the DM channel with a user
   * @returns The channel ID
   */
  async openDirectMessage(userId: string): Promise<string> {
    const { data } = await this.http.post('/users/@me/channels', {
      recipient_id: userId
    });
    if (
      typeof data !== 'object' ||
      data === null ||
      !('id' in data) ||
      typeof data.id !== 'string'
    ) {
      throw new Error('DM channel response did not include a channel id');
    }
    return data.id;
  }

  /**
   * Post a message carrying one embed
   */
  async sendEmbed(channelId: string, embed: Readonly<Embed>): Promise<void> {
    await this.http.post(`/channels/${channelId}/messages`, { embeds: [embed] });
  }
}

async function deliverOne(
  client: DiscordClient,
  login: string,
  discordId: string,
  embed: Readonly<Embed>
): Promise<DeliveryResult> {
  if (!client.configured) {
    console.log(`⚠️ Missing token for ${discordId}`);
    return { status: 'failed', login, discordId, stage: 'open_channel', error: 'Missing Discord bot token' };
  }

  let channelId: string;
  try {
    channelId = await client.openDirectMessage(discordId);
  } catch (error) {
    const message = errorMessage(error);
    console.error(`❌ Could not open DM with ${discordId}: ${message}`);
    return { status: 'failed', login, discordId, stage: 'open_channel', error: message };
  }

  try {
    await client.sendEmbed(channelId, embed);
  } catch (error) {
    const message = errorMessage(error);
    console.error(`❌ Failed to send message to ${discordId}: ${message}`);
    return { status: 'failed', login, discordId, stage: 'send_message', error: message };
  }

  console.log(`✅ DM sent to ${discordId}`);
  return { status: 'delivered', login, discordId, channelId };
}

/**
 * Deliver the embed to each recipient, one at a time
 * A failure for one recipient never stops the others
 */
export async function deliver(
  client: DiscordClient,
  recipients: readonly string[],
  mapping: UserMapping,
  embed: Readonly<Embed>
): Promise<DeliveryResult[]> {
  const results: DeliveryResult[] = [];

  for (const login of recipients) {
    const discordId = mapping.get(login);
    if (!discordId) {
      console.log(`⚠️ Skipping ${login}: No Discord ID mapped.`);
      results.push({ status: 'unmapped', login });
      continue;
    }

    console.log(`🚀 Sending DM to ${login} (${discordId})`);
    results.push(await deliverOne(client, login, discordId, embed));
  }

  return results;
}

export function summarizeDeliveries(results: readonly DeliveryResult[]): DeliverySummary {
  const summary: DeliverySummary = { delivered: 0, unmapped: 0, failed: 0 };
  for (const result of results) {
    summary[result.status] += 1;
  }
  return summary;
}
