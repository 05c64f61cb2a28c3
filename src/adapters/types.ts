/**
 * Message source interfaces for the archive pipeline
 */

import type {
  ArchiveChannel,
  ArchiveMessage,
  Guild,
} from '../types/archive.js';

/**
 * Options for fetching a channel's message history
 */
export interface FetchMessagesOptions {
  /**
   * Messages requested per page (platform limit applies)
   */
  limit?: number;
}

/**
 * Read access to a chat platform's guilds, channels and message history
 */
export interface MessageSource {
  /**
   * Guilds visible to the configured token
   */
  listGuilds(): Promise<Guild[]>;

  /**
   * A single guild, or null when it is unknown or inaccessible
   */
  getGuild(guildId: string): Promise<Guild | null>;

  /**
   * Text-like channels of a guild, in source order, with category names resolved
   */
  listChannels(guildId: string): Promise<ArchiveChannel[]>;

  /**
   * Lazily page through a channel's history, newest first.
   * Each yielded batch is newest-first; the sequence ends at the first empty page.
   */
  fetchMessages(
    channelId: string,
    options?: FetchMessagesOptions
  ): AsyncGenerator<ArchiveMessage[], void, undefined>;
}
