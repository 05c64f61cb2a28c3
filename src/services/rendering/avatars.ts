import type { ArchiveAuthor } from '../../types/archive.js';

const CDN_BASE_URL = 'https://cdn.discordapp.com';

/**
 * Index of the default avatar Discord shows for a user without a custom one.
 * Legacy accounts use their discriminator; migrated accounts (discriminator "0")
 * use the snowflake's timestamp bits.
 */
export function defaultAvatarIndex(
  author: Pick<ArchiveAuthor, 'id' | 'discriminator'>
): number {
  if (author.discriminator && author.discriminator !== '0') {
    const discriminator = Number.parseInt(author.discriminator, 10);
    if (Number.isFinite(discriminator)) {
      return discriminator % 5;
    }
  }

  if (!/^\d+$/.test(author.id)) {
    return 0;
  }
  return Number((BigInt(author.id) >> 22n) % 6n);
}

/**
 * Avatar URL for an author: the custom avatar when set (gif for animated
 * hashes), otherwise the matching default avatar
 */
export function getAvatarUrl(
  author: Pick<ArchiveAuthor, 'id' | 'avatar' | 'discriminator'>
): string {
  if (author.avatar) {
    const extension = author.avatar.startsWith('a_') ? 'gif' : 'png';
    return `${CDN_BASE_URL}/avatars/${author.id}/${author.avatar}.${extension}`;
  }
  return `${CDN_BASE_URL}/embed/avatars/${defaultAvatarIndex(author)}.png`;
}
