/**
 * Configuration for the PR notifier
 * Resolved once from argv, environment and action inputs, then frozen
 */

import { errorMessage } from './errors.js';

export interface ColorTable {
  OPENED: number;
  MERGED: number;
  CLOSED: number;
  INFO: number;
  COMMENT: number;
  APPROVED: number;
  CHANGES: number;
}

export const DEFAULT_COLORS: Readonly<ColorTable> = Object.freeze({
  OPENED: 5763719, // green
  MERGED: 10181046, // purple
  CLOSED: 15548997, // red
  INFO: 3447003, // blue
  COMMENT: 16776960, // yellow
  APPROVED: 5763719,
  CHANGES: 15548997
});

export const DEFAULT_DISCORD_API_BASE_URL = 'https://discord.com/api/v10';
export const DEFAULT_USER_AGENT = 'GitHub-Actions-Bot/1.0';
export const DEFAULT_FOOTER_TEXT = 'GitHub Notification';
export const DEFAULT_COMMENT_PREVIEW_LENGTH = 200;

export const MAPPING_ARG = '--mapping-b64';

export interface NotifierConfig {
  readonly eventPath?: string;
  readonly eventName: string;
  readonly mappingB64?: string;
  readonly discordToken: string;
  readonly discordApiBaseUrl: string;
  readonly userAgent: string;
  readonly footerText: string;
  readonly commentPreviewLength: number;
  readonly colors: Readonly<ColorTable>;
}

// Action inputs, read by the entry point through @actions/core
export interface ActionInputs {
  userMappingB64?: string;
}

export type UserMapping = ReadonlyMap<string, string>;

/**
 * Find the mapping argument in argv
 * Accepts both `--mapping-b64 <value>` and `--mapping-b64=<value>`
 */
export function parseMappingArg(argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === MAPPING_ARG) {
      const value = argv[i + 1];
      return value && !value.startsWith('--') ? value : undefined;
    }
    if (arg.startsWith(`${MAPPING_ARG}=`)) {
      return arg.slice(MAPPING_ARG.length + 1) || undefined;
    }
  }
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the immutable run configuration
 * @param argv - Command-line arguments (without node and script path)
 * @param env - Process environment
 * @param inputs - Action inputs
 */
export function buildConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  inputs: ActionInputs = {}
): NotifierConfig {
  const mappingB64 =
    nonEmpty(parseMappingArg(argv)) ??
    nonEmpty(env.DISCORD_USER_MAPPING_B64) ??
    nonEmpty(inputs.userMappingB64);

  return Object.freeze({
    eventPath: nonEmpty(env.GITHUB_EVENT_PATH),
    eventName: nonEmpty(env.GITHUB_EVENT_NAME) ?? 'unknown',
    mappingB64,
    discordToken: env.DISCORD_BOT_TOKEN?.trim() ?? '',
    discordApiBaseUrl: nonEmpty(env.DISCORD_API_BASE_URL) ?? DEFAULT_DISCORD_API_BASE_URL,
    userAgent: DEFAULT_USER_AGENT,
    footerText: DEFAULT_FOOTER_TEXT,
    commentPreviewLength: DEFAULT_COMMENT_PREVIEW_LENGTH,
    colors: DEFAULT_COLORS
  });
}

/**
 * Decode the base64 GitHub login → Discord ID mapping
 * Never throws: bad input is logged and yields an empty mapping
 */
export function decodeUserMapping(mappingB64: string | undefined): UserMapping {
  const mapping = new Map<string, string>();
  if (!mappingB64) {
    return mapping;
  }

  let parsed: unknown;
  try {
    const decoded = Buffer.from(mappingB64, 'base64').toString('utf-8');
    parsed = JSON.parse(decoded);
  } catch (error) {
    console.warn(`⚠️ Error decoding User Mapping: ${errorMessage(error)}`);
    return mapping;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    console.warn('⚠️ Error decoding User Mapping: expected a JSON object');
    return mapping;
  }

  for (const [login, id] of Object.entries(parsed)) {
    if (typeof id === 'string' && id.trim()) {
      mapping.set(login, id.trim());
    } else if (typeof id === 'number' && Number.isSafeInteger(id)) {
      mapping.set(login, String(id));
    } else if (typeof id === 'number') {
      // Snowflakes past 2^53 are already rounded by JSON.parse
      console.warn(`⚠️ Ignoring mapping for ${login}: Discord ID must be quoted`);
    } else {
      console.warn(`⚠️ Ignoring mapping for ${login}: Discord ID must be a string or number`);
    }
  }

  return mapping;
}
