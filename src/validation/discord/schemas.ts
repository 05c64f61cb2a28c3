/**
 * Zod schemas for Discord REST payloads
 *
 * Responses are validated and defaulted once here so the rest of the
 * pipeline only ever sees the typed archive records.
 */

import { z } from 'zod';
import type {
  ArchiveAttachment,
  ArchiveAuthor,
  ArchiveEmbed,
  ArchiveMessage,
  Guild,
} from '../../types/archive.js';

/**
 * Discord user object
 * - `global_name` is the display name of migrated accounts
 * - `discriminator` is "0" for accounts without a legacy tag
 */
export const DiscordUserSchema = z
  .object({
    id: z.string().min(1),
    username: z.string().default('Unknown'),
    global_name: z.string().nullish(),
    avatar: z.string().nullish(),
    discriminator: z.string().default('0'),
    bot: z.boolean().optional().default(false),
  })
  .transform(
    (user): ArchiveAuthor => ({
      id: user.id,
      username: user.username,
      displayName: user.global_name || user.username,
      avatar: user.avatar ?? null,
      discriminator: user.discriminator,
      bot: user.bot,
    })
  );

const UNKNOWN_AUTHOR = {
  id: '0',
  username: 'Unknown',
  discriminator: '0',
};

export const DiscordAttachmentSchema = z
  .object({
    url: z.string(),
    filename: z.string().default('attachment'),
    content_type: z.string().nullish(),
    size: z.number().nonnegative().default(0),
  })
  .transform(
    (attachment): ArchiveAttachment => ({
      url: attachment.url,
      filename: attachment.filename,
      contentType: attachment.content_type ?? null,
      size: attachment.size,
    })
  );

const EmbedMediaSchema = z.object({ url: z.string() });

export const DiscordEmbedSchema = z
  .object({
    title: z.string().optional(),
    url: z.string().optional(),
    description: z.string().optional(),
    color: z.number().int().nonnegative().optional(),
    author: z
      .object({
        name: z.string(),
        url: z.string().optional(),
        icon_url: z.string().optional(),
      })
      .optional(),
    footer: z
      .object({
        text: z.string(),
        icon_url: z.string().optional(),
      })
      .optional(),
    image: EmbedMediaSchema.optional(),
    thumbnail: EmbedMediaSchema.optional(),
    fields: z
      .array(
        z.object({
          name: z.string().default(''),
          value: z.string().default(''),
          inline: z.boolean().optional().default(false),
        })
      )
      .default([]),
  })
  .transform(
    (embed): ArchiveEmbed => ({
      title: embed.title,
      url: embed.url,
      description: embed.description,
      color: embed.color,
      author: embed.author && {
        name: embed.author.name,
        url: embed.author.url,
        iconUrl: embed.author.icon_url,
      },
      footer: embed.footer && {
        text: embed.footer.text,
        iconUrl: embed.footer.icon_url,
      },
      image: embed.image,
      thumbnail: embed.thumbnail,
      fields: embed.fields,
    })
  );

/**
 * Discord message object
 */
export const DiscordMessageSchema = z
  .object({
    id: z.string().min(1),
    author: DiscordUserSchema.default(UNKNOWN_AUTHOR),
    timestamp: z.string().default(''),
    content: z.string().nullish(),
    attachments: z.array(DiscordAttachmentSchema).default([]),
    embeds: z.array(DiscordEmbedSchema).default([]),
    mentions: z.array(DiscordUserSchema).default([]),
  })
  .transform(
    (message): ArchiveMessage => ({
      id: message.id,
      author: message.author,
      timestamp: message.timestamp,
      content: message.content ?? '',
      attachments: message.attachments,
      embeds: message.embeds,
      mentions: message.mentions,
    })
  );

/**
 * Discord channel object (only the fields needed for listing)
 */
export const DiscordChannelSchema = z.object({
  id: z.string().min(1),
  type: z.number().int(),
  name: z.string().nullish(),
  parent_id: z.string().nullish(),
  position: z.number().optional(),
});

export const DiscordGuildSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().default(''),
  })
  .transform((guild): Guild => ({ id: guild.id, name: guild.name }));

/**
 * `429 Too Many Requests` body; `retry_after` is in seconds
 */
export const DiscordRateLimitSchema = z.object({
  retry_after: z.coerce.number().nonnegative().default(1),
  global: z.boolean().optional(),
});

export type DiscordUserInput = z.input<typeof DiscordUserSchema>;
export type DiscordMessageInput = z.input<typeof DiscordMessageSchema>;
export type DiscordChannel = z.infer<typeof DiscordChannelSchema>;
