import { renderToStaticMarkup } from 'react-dom/server';
import type { ArchiveMessage } from '../../types/archive.js';
import { ArchiveDocument } from './components.js';
import { groupMessages } from './grouping.js';

export interface RenderOptions {
  /**
   * Date shown in the document header, defaults to now
   */
  archivedAt?: Date;
  /**
   * Channel id to name lookup for `<#id>` mentions
   */
  channelNames?: ReadonlyMap<string, string>;
}

/**
 * Renders a channel's messages into one self-contained HTML document
 */
export class DocumentRenderer {
  /**
   * @param channelName - Shown in the document header
   * @param messages - Newest first, as returned by the message source
   * @returns The HTML document, or an empty string when there are no messages
   */
  render(
    channelName: string,
    messages: ArchiveMessage[],
    options: RenderOptions = {}
  ): string {
    if (messages.length === 0) {
      return '';
    }

    const markup = renderToStaticMarkup(
      <ArchiveDocument
        channelName={channelName}
        groups={groupMessages(messages)}
        archivedAt={options.archivedAt ?? new Date()}
        channelNames={options.channelNames}
      />
    );
    return `<!DOCTYPE html>${markup}`;
  }
}
