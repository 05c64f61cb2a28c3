/**
 * Name sanitization for archive folders and files
 * Keeps letters, digits, spaces, dots, underscores and hyphens
 */

import type { ArchiveChannel } from '../types/archive.js';

const DISALLOWED_CHARACTERS = /[^\p{L}\p{N} ._-]/gu;

export const UNCATEGORIZED = 'Uncategorized';
export const UNKNOWN_GUILD = 'Unknown Guild';

/**
 * Strip disallowed characters and surrounding whitespace
 * @param name - Raw guild, category or channel name
 * @returns Sanitized name, possibly empty
 */
export function sanitizeName(name: string): string {
  return name.replace(DISALLOWED_CHARACTERS, '').trim();
}

export interface ArchivePathNames {
  guild: string;
  category: string;
  channel: string;
}

/**
 * Resolve the three sanitized path segments of a channel archive,
 * substituting a stable fallback for any segment that sanitizes to nothing
 */
export function resolveArchivePathNames(
  guildName: string,
  channel: ArchiveChannel
): ArchivePathNames {
  return {
    guild: sanitizeName(guildName) || UNKNOWN_GUILD,
    category: sanitizeName(channel.category) || UNCATEGORIZED,
    channel: sanitizeName(channel.name) || channel.id,
  };
}
