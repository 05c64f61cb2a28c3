/**
 * Discord markup preprocessing before markdown rendering
 */

import type { ArchiveAuthor } from '../../types/archive.js';
import { formatTimestamp } from './grouping.js';

// Discord mention and token patterns
const USER_MENTION_PATTERN = /<@!?(\d+)>/g;
const ROLE_MENTION_PATTERN = /<@&(\d+)>/g;
const CHANNEL_MENTION_PATTERN = /<#(\d+)>/g;
const CUSTOM_EMOJI_PATTERN = /<a?:(\w+):\d+>/g;
const TIMESTAMP_PATTERN = /<t:(-?\d+)(?::[tTdDfFR])?>/g;
const SPOILER_PATTERN = /\|\|([\s\S]+?)\|\|/g;
// Code fences and inline code spans
const CODE_SEGMENT_PATTERN = /(```[\s\S]*?```|``[^\n]+?``|`[^`\n]+`)/;
const MARKDOWN_SPECIAL_CHARACTERS = /[\\`*_~|[\]<>#]/g;

// Private-use characters marking spoiler boundaries through the markdown pass
export const SPOILER_OPEN = '\uE000';
export const SPOILER_CLOSE = '\uE001';

export interface MentionContext {
  users: ArchiveAuthor[];
  channelNames?: ReadonlyMap<string, string>;
}

/**
 * Escape characters that would otherwise be read as markdown
 */
export function escapeMarkdown(text: string): string {
  return text.replace(MARKDOWN_SPECIAL_CHARACTERS, '\\$&');
}

function resolveTokens(
  content: string,
  context: MentionContext,
  inCode: boolean
): string {
  const users = new Map(context.users.map((user) => [user.id, user]));
  const escape = inCode ? (text: string) => text : escapeMarkdown;

  return content
    .replace(USER_MENTION_PATTERN, (_match, userId: string) => {
      const user = users.get(userId);
      return `@${escape(user ? user.displayName : 'unknown-user')}`;
    })
    .replace(ROLE_MENTION_PATTERN, '@Role')
    .replace(CHANNEL_MENTION_PATTERN, (_match, channelId: string) => {
      const name = context.channelNames?.get(channelId);
      return `${inCode ? '#' : '\\#'}${escape(name ?? 'unknown-channel')}`;
    })
    .replace(CUSTOM_EMOJI_PATTERN, ':$1:')
    .replace(TIMESTAMP_PATTERN, (match, seconds: string) => {
      const date = new Date(Number(seconds) * 1000);
      return Number.isNaN(date.getTime())
        ? match
        : formatTimestamp(date.toISOString());
    });
}

/**
 * Resolve mentions, custom emoji and timestamp tokens to readable text.
 * Names are markdown-escaped outside code spans and fences and left as-is inside them.
 */
export function resolveDiscordTokens(
  content: string,
  context: MentionContext
): string {
  return content
    .split(CODE_SEGMENT_PATTERN)
    .map((segment, index) => resolveTokens(segment, context, index % 2 === 1))
    .join('');
}

/**
 * Replace `||spoiler||` delimiters with boundary markers
 */
export function markSpoilers(content: string): string {
  return content.replace(
    SPOILER_PATTERN,
    `${SPOILER_OPEN}$1${SPOILER_CLOSE}`
  );
}

/**
 * Put the original `||` delimiters back, used inside code where spoilers don't apply
 */
export function restoreSpoilerDelimiters(text: string): string {
  return text.replaceAll(SPOILER_OPEN, '||').replaceAll(SPOILER_CLOSE, '||');
}

export function preprocessContent(
  content: string,
  context: MentionContext
): string {
  return markSpoilers(resolveDiscordTokens(content, context));
}
