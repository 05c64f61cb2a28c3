/**
 * Discord message source backed by the REST API
 */

import { ChannelType, Routes } from 'discord.js';
import logger from '../../utils/logger.js';
import type { FetchMessagesOptions, MessageSource } from '../types.js';
import {
  DIRECT_MESSAGES_GUILD,
  type ArchiveChannel,
  type ArchiveMessage,
  type Guild,
} from '../../types/archive.js';
import {
  DiscordChannelSchema,
  DiscordGuildSchema,
  DiscordMessageSchema,
  type DiscordChannel,
} from '../../validation/discord/schemas.js';
import { UNCATEGORIZED } from '../../utils/sanitize.js';
import type { DiscordQueryParams, DiscordRestClient } from './DiscordRestClient.js';

const DEFAULT_PAGE_SIZE = 100;

const TEXT_CHANNEL_TYPES = new Set<number>([
  ChannelType.GuildText,
  ChannelType.GuildAnnouncement,
]);

/**
 * Discord adapter implementation for reading archive input
 */
export class DiscordAdapter implements MessageSource {
  constructor(private rest: Pick<DiscordRestClient, 'get'>) {}

  async listGuilds(): Promise<Guild[]> {
    const data = await this.rest.get(Routes.userGuilds());
    if (!Array.isArray(data)) {
      return [];
    }

    const guilds: Guild[] = [];
    for (const raw of data) {
      const parsed = DiscordGuildSchema.safeParse(raw);
      if (parsed.success) {
        guilds.push(parsed.data);
      } else {
        logger.warn('Skipping malformed guild payload', {
          issues: parsed.error.issues.length,
        });
      }
    }
    return guilds;
  }

  async getGuild(guildId: string): Promise<Guild | null> {
    if (guildId === DIRECT_MESSAGES_GUILD.id) {
      return DIRECT_MESSAGES_GUILD;
    }

    const data = await this.rest.get(Routes.guild(guildId));
    if (data === null) {
      return null;
    }

    const parsed = DiscordGuildSchema.safeParse(data);
    return parsed.success ? parsed.data : null;
  }

  async listChannels(guildId: string): Promise<ArchiveChannel[]> {
    if (guildId === DIRECT_MESSAGES_GUILD.id) {
      // TODO: list DM and group DM channels via /users/@me/channels once a user token flow exists
      logger.debug('Direct message listing is not implemented');
      return [];
    }

    const data = await this.rest.get(Routes.guildChannels(guildId));
    if (!Array.isArray(data)) {
      return [];
    }

    const channels: DiscordChannel[] = [];
    for (const raw of data) {
      const parsed = DiscordChannelSchema.safeParse(raw);
      if (parsed.success) {
        channels.push(parsed.data);
      }
    }

    const categories = new Map<string, string>();
    for (const channel of channels) {
      if (channel.type === ChannelType.GuildCategory) {
        categories.set(channel.id, channel.name ?? UNCATEGORIZED);
      }
    }

    return channels
      .filter((channel) => TEXT_CHANNEL_TYPES.has(channel.type))
      .map((channel) => ({
        id: channel.id,
        name: channel.name ?? channel.id,
        category:
          (channel.parent_id && categories.get(channel.parent_id)) ||
          UNCATEGORIZED,
      }));
  }

  async *fetchMessages(
    channelId: string,
    options: FetchMessagesOptions = {}
  ): AsyncGenerator<ArchiveMessage[], void, undefined> {
    const limit = options.limit ?? DEFAULT_PAGE_SIZE;
    let before: string | undefined;

    while (true) {
      const params: DiscordQueryParams = { limit };
      if (before) {
        params.before = before;
      }

      logger.debug('Fetching messages batch', { channelId, before, limit });
      const data = await this.rest.get(Routes.channelMessages(channelId), params);
      if (!Array.isArray(data) || data.length === 0) {
        return;
      }

      const batch = this.parseMessages(channelId, data);
      if (batch.length === 0) {
        return;
      }

      yield batch;
      before = batch[batch.length - 1].id;
    }
  }

  private parseMessages(channelId: string, data: unknown[]): ArchiveMessage[] {
    const messages: ArchiveMessage[] = [];
    for (const raw of data) {
      const parsed = DiscordMessageSchema.safeParse(raw);
      if (parsed.success) {
        messages.push(parsed.data);
      } else {
        logger.warn('Skipping malformed message payload', {
          channelId,
          issues: parsed.error.issues.map((issue) => issue.path.join('.')),
        });
      }
    }
    return messages;
  }
}

/**
 * Drain a message source into one newest-first list
 */
export async function collectMessages(
  source: MessageSource,
  channelId: string,
  options?: FetchMessagesOptions
): Promise<ArchiveMessage[]> {
  const messages: ArchiveMessage[] = [];
  for await (const batch of source.fetchMessages(channelId, options)) {
    messages.push(...batch);
  }
  return messages;
}
