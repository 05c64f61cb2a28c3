import { describe, it, expect } from 'vitest';
import { defaultAvatarIndex, getAvatarUrl } from '../avatars.js';

describe('defaultAvatarIndex', () => {
  it('should use the snowflake for migrated accounts', () => {
    const id = '123456789012345678';

    expect(defaultAvatarIndex({ id, discriminator: '0' })).toBe(
      Number((123456789012345678n >> 22n) % 6n)
    );
    expect(defaultAvatarIndex({ id: '987654321098765432', discriminator: '0' })).toBe(3);
  });

  it('should use the discriminator for legacy accounts', () => {
    expect(defaultAvatarIndex({ id: '123456789012345678', discriminator: '4' })).toBe(4);
    expect(defaultAvatarIndex({ id: '1', discriminator: '1337' })).toBe(2);
  });

  it('should treat an empty discriminator like a migrated account', () => {
    expect(defaultAvatarIndex({ id: '80351110224678912', discriminator: '' })).toBe(5);
  });

  it('should fall back to the first avatar for non-numeric ids', () => {
    expect(defaultAvatarIndex({ id: 'webhook', discriminator: '0' })).toBe(0);
  });
});

describe('getAvatarUrl', () => {
  it('should build a png URL for a static custom avatar', () => {
    expect(
      getAvatarUrl({ id: '42', avatar: 'abc123', discriminator: '0' })
    ).toBe('https://cdn.discordapp.com/avatars/42/abc123.png');
  });

  it('should build a gif URL for an animated avatar', () => {
    expect(
      getAvatarUrl({ id: '42', avatar: 'a_abc123', discriminator: '0' })
    ).toBe('https://cdn.discordapp.com/avatars/42/a_abc123.gif');
  });

  it('should fall back to a default avatar', () => {
    expect(getAvatarUrl({ id: '1', avatar: null, discriminator: '0004' })).toBe(
      'https://cdn.discordapp.com/embed/avatars/4.png'
    );
  });
});
