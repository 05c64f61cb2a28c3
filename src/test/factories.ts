/**
 * Builders for archive test data
 */

import type {
  ArchiveAuthor,
  ArchiveChannel,
  ArchiveJobData,
  ArchiveMessage,
} from '../types/archive.js';

export function buildAuthor(overrides: Partial<ArchiveAuthor> = {}): ArchiveAuthor {
  const id = overrides.id ?? '100';
  return {
    id,
    username: `user${id}`,
    displayName: `User ${id}`,
    avatar: null,
    discriminator: '0',
    bot: false,
    ...overrides,
  };
}

export function buildMessage(
  id: string,
  overrides: Partial<ArchiveMessage> = {}
): ArchiveMessage {
  return {
    id,
    author: buildAuthor(),
    timestamp: '2024-03-01T12:00:00.000000+00:00',
    content: `message ${id}`,
    attachments: [],
    embeds: [],
    mentions: [],
    ...overrides,
  };
}

export function buildChannel(
  overrides: Partial<ArchiveChannel> = {}
): ArchiveChannel {
  return {
    id: '2001',
    name: 'general',
    category: 'Text Channels',
    ...overrides,
  };
}

export function buildJob(overrides: Partial<ArchiveJobData> = {}): ArchiveJobData {
  return {
    channel: buildChannel(),
    guildName: 'Test Guild',
    channelNames: { '2001': 'general' },
    token: 'test-discord-token',
    credential: {
      type: 'authorized_user',
      client_id: 'test-client-id',
      client_secret: 'test-secret',
      refresh_token: 'test-refresh-token',
    },
    settings: {
      scratchRoot: 'Temp_Export_Test',
      fallbackRoot: 'Local_Backup_Test',
      rootFolderName: 'Discord Archive',
      maxUploadRetries: 3,
      uploadRetryBaseDelayMs: 1000,
      messageFetchSize: 100,
      discordApiBaseUrl: 'https://discord.com/api/v10',
      discordAuthScheme: 'Bot',
      chromeExecutablePath: '/usr/bin/chromium',
      pdfSettleDelayMs: 1000,
      pdfNavigationTimeoutMs: 60000,
    },
    ...overrides,
  };
}
