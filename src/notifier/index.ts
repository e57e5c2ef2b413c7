/**
 * Notifier component
 * Loads one webhook event, classifies it and DMs the recipients on Discord
 */

import type { NotifierConfig, UserMapping } from '../shared/config.js';
import { decodeUserMapping } from '../shared/config.js';
import { classifyEvent } from '../shared/embed.js';
import type { Classification, Embed } from '../shared/embed.js';
import { errorMessage } from '../shared/errors.js';
import { envelopeAction, loadEvent } from '../shared/events.js';
import { DiscordClient, deliver, summarizeDeliveries } from '../shared/discord.js';
import type { DeliveryResult, DeliverySummary, HttpClient } from '../shared/discord.js';

export type RunStatus = 'aborted' | 'skipped' | 'completed';

export interface NotifierReport {
  status: RunStatus;
  eventName: string;
  action?: string;
  reason?: string;
  recipients: string[];
  embed?: Readonly<Embed>;
  results: DeliveryResult[];
  summary: DeliverySummary;
}

export interface NotifierDeps {
  // Injected in tests in place of the axios-backed client
  http?: HttpClient;
}

/**
 * Notifier class
 */
export class Notifier {
  private config: NotifierConfig;
  private discord: DiscordClient;

  constructor(config: NotifierConfig, deps: NotifierDeps = {}) {
    this.config = config;
    this.discord = new DiscordClient(
      {
        token: config.discordToken,
        baseUrl: config.discordApiBaseUrl,
        userAgent: config.userAgent
      },
      deps.http
    );
  }

  /**
   * Run the whole notification flow once
   */
  async run(): Promise<NotifierReport> {
    const { config } = this;
    const mapping: UserMapping = decodeUserMapping(config.mappingB64);

    const loaded = await loadEvent(config.eventPath, config.eventName);
    if (!loaded.ok) {
      console.log(`❌ Error: ${loaded.reason}`);
      return this.report('aborted', { reason: loaded.reason });
    }

    const envelope = loaded.envelope;
    const action = envelopeAction(envelope);
    console.log(`🔍 Event: ${config.eventName} | Action: ${action ?? 'none'}`);

    let classification: Classification;
    try {
      classification = classifyEvent(envelope, config.colors, {
        footerText: config.footerText,
        commentPreviewLength: config.commentPreviewLength
      });
    } catch (error) {
      // Payload is missing a field its event type always carries
      const reason = `Malformed ${config.eventName} payload: ${errorMessage(error)}`;
      console.log(`❌ Error: ${reason}`);
      return this.report('aborted', { action, reason });
    }

    if (classification.kind === 'skip') {
      console.log(classification.reason);
      return this.report('skipped', { action, reason: classification.reason });
    }

    const { embed, recipients } = classification;
    const results = await deliver(this.discord, recipients, mapping, embed);

    return this.report('completed', { action, recipients, embed, results });
  }

  private report(
    status: RunStatus,
    details: Partial<Omit<NotifierReport, 'status' | 'eventName' | 'summary'>>
  ): NotifierReport {
    const results = details.results ?? [];
    return {
      status,
      eventName: this.config.eventName,
      action: details.action,
      reason: details.reason,
      recipients: details.recipients ?? [],
      embed: details.embed,
      results,
      summary: summarizeDeliveries(results)
    };
  }
}
