/**
 * Tests for Discord payload schemas
 */

import { describe, it, expect } from 'vitest';
import {
  DiscordMessageSchema,
  DiscordUserSchema,
  DiscordEmbedSchema,
  DiscordRateLimitSchema,
} from '../schemas.js';

describe('Discord Payload Schemas', () => {
  describe('DiscordUserSchema', () => {
    it('should prefer the global display name', () => {
      const author = DiscordUserSchema.parse({
        id: '42',
        username: 'alice',
        global_name: 'Alice A.',
        avatar: 'abc123',
        discriminator: '0',
      });

      expect(author).toEqual({
        id: '42',
        username: 'alice',
        displayName: 'Alice A.',
        avatar: 'abc123',
        discriminator: '0',
        bot: false,
      });
    });

    it('should fall back to the username and default missing fields', () => {
      const author = DiscordUserSchema.parse({
        id: '7',
        username: 'helper',
        global_name: null,
        bot: true,
      });

      expect(author.displayName).toBe('helper');
      expect(author.avatar).toBeNull();
      expect(author.discriminator).toBe('0');
      expect(author.bot).toBe(true);
    });
  });

  describe('DiscordMessageSchema', () => {
    it('should default every optional collection', () => {
      const message = DiscordMessageSchema.parse({
        id: '1001',
        author: { id: '42', username: 'alice' },
        timestamp: '2024-03-01T12:30:00.000000+00:00',
        content: null,
      });

      expect(message.content).toBe('');
      expect(message.attachments).toEqual([]);
      expect(message.embeds).toEqual([]);
      expect(message.mentions).toEqual([]);
    });

    it('should substitute an unknown author when missing', () => {
      const message = DiscordMessageSchema.parse({ id: '1002' });

      expect(message.author.id).toBe('0');
      expect(message.author.displayName).toBe('Unknown');
      expect(message.timestamp).toBe('');
    });

    it('should map attachments to camel case', () => {
      const message = DiscordMessageSchema.parse({
        id: '1003',
        author: { id: '42', username: 'alice' },
        attachments: [
          {
            url: 'https://cdn.example.test/file.png',
            filename: 'file.png',
            content_type: 'image/png',
            size: 2048,
          },
        ],
      });

      expect(message.attachments).toEqual([
        {
          url: 'https://cdn.example.test/file.png',
          filename: 'file.png',
          contentType: 'image/png',
          size: 2048,
        },
      ]);
    });

    it('should reject a message without an id', () => {
      expect(DiscordMessageSchema.safeParse({ content: 'hi' }).success).toBe(
        false
      );
    });
  });

  describe('DiscordEmbedSchema', () => {
    it('should normalize nested embed blocks', () => {
      const embed = DiscordEmbedSchema.parse({
        title: 'Release',
        color: 5814783,
        footer: { text: 'v1.0', icon_url: 'https://cdn.example.test/i.png' },
        fields: [{ name: 'Version', value: '1.0', inline: true }, { name: 'Notes', value: 'None' }],
      });

      expect(embed.footer).toEqual({
        text: 'v1.0',
        iconUrl: 'https://cdn.example.test/i.png',
      });
      expect(embed.author).toBeUndefined();
      expect(embed.fields).toEqual([
        { name: 'Version', value: '1.0', inline: true },
        { name: 'Notes', value: 'None', inline: false },
      ]);
    });
  });

  describe('DiscordRateLimitSchema', () => {
    it('should read retry_after in seconds', () => {
      expect(DiscordRateLimitSchema.parse({ retry_after: 1.5 }).retry_after).toBe(1.5);
      expect(DiscordRateLimitSchema.parse({}).retry_after).toBe(1);
    });
  });
});
