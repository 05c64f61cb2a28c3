import { describe, it, expect } from 'vitest';
import { DocumentRenderer } from '../DocumentRenderer.js';
import { buildAuthor, buildMessage } from '../../../test/factories.js';

const archivedAt = new Date('2024-03-05T08:00:00Z');

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('DocumentRenderer', () => {
  const renderer = new DocumentRenderer();
  const alice = buildAuthor({ id: '1', displayName: 'Alice' });
  const helper = buildAuthor({
    id: '2',
    displayName: 'Helper',
    bot: true,
    avatar: 'a_feed',
  });

  it('should return an empty string for no messages', () => {
    expect(renderer.render('general', [], { archivedAt })).toBe('');
  });

  it('should render the document header', () => {
    const html = renderer.render('general', [buildMessage('1')], {
      archivedAt,
    });

    expect(html.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true);
    expect(html).toContain('<div class="channel-name"># general</div>');
    expect(html).toContain(
      '<div class="timestamp">Archived on 2024-03-05</div>'
    );
  });

  it('should emit one author header per group', () => {
    const html = renderer.render(
      'general',
      [
        buildMessage('4', { author: alice }),
        buildMessage('3', { author: helper }),
        buildMessage('2', { author: alice, content: 'second' }),
        buildMessage('1', { author: alice, content: 'first' }),
      ],
      { archivedAt }
    );

    expect(countOccurrences(html, 'class="message-group"')).toBe(3);
    expect(countOccurrences(html, '<span class="username">Alice</span>')).toBe(2);
    expect(html).toContain(
      '<span class="username">Helper</span><span class="bot-tag">BOT</span>'
    );
    expect(html).toContain(
      '<img class="avatar" src="https://cdn.discordapp.com/avatars/2/a_feed.gif" alt=""/>'
    );
    expect(html).toContain(
      '<img class="avatar" src="https://cdn.discordapp.com/embed/avatars/0.png" alt=""/>'
    );
    expect(html.indexOf('first')).toBeLessThan(html.indexOf('second'));
  });

  it('should format group timestamps and keep malformed ones raw', () => {
    const html = renderer.render(
      'general',
      [
        buildMessage('2', { author: helper, timestamp: 'not-a-date' }),
        buildMessage('1', {
          author: alice,
          timestamp: '2024-03-01T12:00:30.500000+00:00',
        }),
      ],
      { archivedAt }
    );

    expect(html).toContain('<span class="timestamp">2024-03-01 12:00</span>');
    expect(html).toContain('<span class="timestamp">not-a-date</span>');
  });

  it('should convert markup to formatted HTML', () => {
    const html = renderer.render(
      'general',
      [
        buildMessage('1', {
          content:
            '**bold** *italic* ~~gone~~ `code` ||secret|| [docs](https://docs.example.test)',
        }),
      ],
      { archivedAt }
    );

    expect(html).toContain(
      '<p><strong>bold</strong> <em>italic</em> <del>gone</del> <code>code</code> <span class="spoiler">secret</span> <a href="https://docs.example.test" target="_blank" rel="noopener noreferrer">docs</a></p>'
    );
  });

  it('should keep spoiler delimiters inside code', () => {
    const html = renderer.render(
      'general',
      [buildMessage('1', { content: 'use `a || b || c` here' })],
      { archivedAt }
    );

    expect(html).toContain('<code>a || b || c</code>');
  });

  it('should mask spoilers inside links and minor headings', () => {
    const html = renderer.render(
      'general',
      [
        buildMessage('2', { content: '#### ||hidden||' }),
        buildMessage('1', { content: '[||secret||](https://example.com)' }),
      ],
      { archivedAt }
    );

    expect(html).toContain(
      '<a href="https://example.com" target="_blank" rel="noopener noreferrer"><span class="spoiler">secret</span></a>'
    );
    expect(html).toContain('<h4><span class="spoiler">hidden</span></h4>');
    expect(html).not.toMatch(/[\uE000\uE001]/);
  });

  it('should mask spoilers inside quotes and table cells', () => {
    const html = renderer.render(
      'general',
      [
        buildMessage('2', { content: '> ||quoted||' }),
        buildMessage('1', { content: '| a |\n| - |\n| ||cell|| |' }),
      ],
      { archivedAt }
    );

    expect(html).toContain('<span class="spoiler">quoted</span>');
    expect(html).toContain('<td><span class="spoiler">cell</span></td>');
    expect(html).not.toMatch(/[\uE000\uE001]/);
  });

  it('should keep mention names unescaped inside code', () => {
    const author = buildAuthor({ id: '7', displayName: 'snake_case_name' });
    const html = renderer.render(
      'general',
      [buildMessage('1', { content: 'ping `<@7>`', mentions: [author] })],
      { archivedAt }
    );

    expect(html).toContain('<code>@snake_case_name</code>');
  });

  it('should resolve channel mentions from the supplied names', () => {
    const html = renderer.render(
      'general',
      [buildMessage('1', { content: 'see <#555>' })],
      { archivedAt, channelNames: new Map([['555', 'announcements']]) }
    );

    expect(html).toContain('<p>see #announcements</p>');
  });

  it('should never emit raw HTML from message content', () => {
    const html = renderer.render(
      'general',
      [buildMessage('1', { content: 'hi <script>alert(1)</script>' })],
      { archivedAt }
    );

    expect(html).not.toContain('<script');
  });

  it('should render image attachments inline and other files as links', () => {
    const html = renderer.render(
      'general',
      [
        buildMessage('1', {
          content: '',
          attachments: [
            {
              url: 'https://cdn.example.test/cat.png',
              filename: 'cat.png',
              contentType: 'image/png',
              size: 100,
            },
            {
              url: 'https://cdn.example.test/notes.txt',
              filename: 'notes.txt',
              contentType: null,
              size: 10,
            },
          ],
        }),
      ],
      { archivedAt }
    );

    expect(html).toContain(
      '<div class="attachment"><img src="https://cdn.example.test/cat.png" alt="cat.png"/></div>'
    );
    expect(html).toContain(
      '<div class="attachment"><a href="https://cdn.example.test/notes.txt">notes.txt</a></div>'
    );
    expect(html).not.toContain('class="content"');
  });

  it('should render embeds with colour, fields and footer', () => {
    const html = renderer.render(
      'general',
      [
        buildMessage('1', {
          content: '',
          embeds: [
            {
              title: 'Release',
              url: 'https://example.test/release',
              color: 0x5865f2,
              footer: { text: 'v1.0' },
              fields: [
                { name: 'A', value: '1', inline: true },
                { name: 'B', value: '2', inline: true },
                { name: 'Notes', value: 'long', inline: false },
              ],
            },
            { description: 'plain', fields: [] },
          ],
        }),
      ],
      { archivedAt }
    );

    expect(html).toContain('style="border-left-color:#5865f2"');
    expect(html).toContain('style="border-left-color:#202225"');
    expect(html).toContain(
      '<div class="embed-title"><a href="https://example.test/release">Release</a></div>'
    );
    expect(countOccurrences(html, 'class="embed-field-row"')).toBe(1);
    expect(countOccurrences(html, 'class="embed-field-row block"')).toBe(1);
    expect(html).toContain('<div class="embed-footer">v1.0</div>');
    expect(html).toContain(
      '<div class="content embed-description"><p>plain</p></div>'
    );
  });
});
