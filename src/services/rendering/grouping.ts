import type { ArchiveMessage, MessageGroup } from '../../types/archive.js';

/**
 * Group a newest-first message list into chronological runs by author.
 * A new group starts whenever the author id changes; there is no time gap rule.
 */
export function groupMessages(newestFirst: ArchiveMessage[]): MessageGroup[] {
  const groups: MessageGroup[] = [];
  let current: MessageGroup | undefined;

  for (const message of [...newestFirst].reverse()) {
    if (!current || current.author.id !== message.author.id) {
      current = {
        author: message.author,
        timestamp: message.timestamp,
        messages: [],
      };
      groups.push(current);
    }
    current.messages.push(message);
  }

  return groups;
}

const EXTRA_FRACTION_DIGITS = /(\.\d{3})\d+/;

/**
 * Format an ISO-8601 timestamp as `YYYY-MM-DD HH:mm` (UTC).
 * Unparseable input is returned unchanged.
 */
export function formatTimestamp(raw: string): string {
  const date = new Date(raw.replace(EXTRA_FRACTION_DIGITS, '$1'));
  if (Number.isNaN(date.getTime())) {
    return raw;
  }
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

/**
 * Format a date as `YYYY-MM-DD` (UTC)
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
