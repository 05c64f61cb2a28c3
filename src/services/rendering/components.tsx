import { Children, type ReactNode } from 'react';
import ReactMarkdown, { type Components } from 'react-markdown';
import remarkGfm from 'remark-gfm';
import remarkBreaks from 'remark-breaks';
import rehypeSanitize from 'rehype-sanitize';
import type {
  ArchiveAttachment,
  ArchiveEmbed,
  ArchiveMessage,
  MessageGroup,
} from '../../types/archive.js';
import { getAvatarUrl } from './avatars.js';
import { embedColor, layoutEmbedFields } from './embeds.js';
import { formatDate, formatTimestamp } from './grouping.js';
import {
  preprocessContent,
  restoreSpoilerDelimiters,
  SPOILER_CLOSE,
  SPOILER_OPEN,
  type MentionContext,
} from './markdown.js';
import { ARCHIVE_STYLES } from './styles.js';

const SPOILER_BOUNDARY = /([\uE000\uE001])/;

/**
 * Wrap everything between spoiler markers in a masked span.
 * Markers may sit in different text children around inline elements.
 */
function withSpoilers(children: ReactNode): ReactNode[] {
  const output: ReactNode[] = [];
  let spoiler: ReactNode[] | null = null;

  const flush = () => {
    if (spoiler && spoiler.length > 0) {
      output.push(
        <span className="spoiler" key={`spoiler-${output.length}`}>
          {spoiler}
        </span>
      );
    }
    spoiler = null;
  };

  for (const child of Children.toArray(children)) {
    if (typeof child !== 'string') {
      (spoiler ?? output).push(child);
      continue;
    }

    for (const part of child.split(SPOILER_BOUNDARY)) {
      if (part === SPOILER_OPEN) {
        flush();
        spoiler = [];
      } else if (part === SPOILER_CLOSE) {
        flush();
      } else if (part) {
        (spoiler ?? output).push(part);
      }
    }
  }

  flush();
  return output;
}

function withoutSpoilers(children: ReactNode): ReactNode {
  return Children.map(children, (child) =>
    typeof child === 'string' ? restoreSpoilerDelimiters(child) : child
  );
}

const markdownComponents: Components = {
  a: ({ href, children }) => (
    <a href={href} target="_blank" rel="noopener noreferrer">
      {withSpoilers(children)}
    </a>
  ),
  p: ({ children }) => <p>{withSpoilers(children)}</p>,
  li: ({ children }) => <li>{withSpoilers(children)}</li>,
  blockquote: ({ children }) => (
    <blockquote>{withSpoilers(children)}</blockquote>
  ),
  h1: ({ children }) => <h1>{withSpoilers(children)}</h1>,
  h2: ({ children }) => <h2>{withSpoilers(children)}</h2>,
  h3: ({ children }) => <h3>{withSpoilers(children)}</h3>,
  h4: ({ children }) => <h4>{withSpoilers(children)}</h4>,
  h5: ({ children }) => <h5>{withSpoilers(children)}</h5>,
  h6: ({ children }) => <h6>{withSpoilers(children)}</h6>,
  th: ({ style, children }) => <th style={style}>{withSpoilers(children)}</th>,
  td: ({ style, children }) => <td style={style}>{withSpoilers(children)}</td>,
  strong: ({ children }) => <strong>{withSpoilers(children)}</strong>,
  em: ({ children }) => <em>{withSpoilers(children)}</em>,
  del: ({ children }) => <del>{withSpoilers(children)}</del>,
  img: ({ src, alt }) => (
    <img src={src} alt={alt === undefined ? alt : restoreSpoilerDelimiters(alt)} />
  ),
  code: ({ className, children }) => (
    <code className={className}>{withoutSpoilers(children)}</code>
  ),
};

interface MarkdownContentProps {
  content: string;
  context: MentionContext;
  className?: string;
}

export function MarkdownContent({
  content,
  context,
  className = 'content',
}: MarkdownContentProps) {
  return (
    <div className={className}>
      <ReactMarkdown
        remarkPlugins={[remarkGfm, remarkBreaks]}
        rehypePlugins={[rehypeSanitize]}
        components={markdownComponents}
      >
        {preprocessContent(content, context)}
      </ReactMarkdown>
    </div>
  );
}

function AttachmentView({ attachment }: { attachment: ArchiveAttachment }) {
  const isImage = attachment.contentType?.startsWith('image/') ?? false;
  return (
    <div className="attachment">
      {isImage ? (
        <img src={attachment.url} alt={attachment.filename} />
      ) : (
        <a href={attachment.url}>{attachment.filename}</a>
      )}
    </div>
  );
}

function EmbedView({
  embed,
  context,
}: {
  embed: ArchiveEmbed;
  context: MentionContext;
}) {
  const rows = layoutEmbedFields(embed.fields);

  return (
    <div className="embed" style={{ borderLeftColor: embedColor(embed.color) }}>
      <div className="embed-body">
        {embed.author && (
          <div className="embed-author">
            {embed.author.url ? (
              <a href={embed.author.url}>{embed.author.name}</a>
            ) : (
              embed.author.name
            )}
          </div>
        )}
        {embed.title && (
          <div className="embed-title">
            {embed.url ? <a href={embed.url}>{embed.title}</a> : embed.title}
          </div>
        )}
        {embed.description && (
          <MarkdownContent
            content={embed.description}
            context={context}
            className="content embed-description"
          />
        )}
        {rows.length > 0 && (
          <div className="embed-fields">
            {rows.map((row, rowIndex) => (
              <div
                key={rowIndex}
                className={
                  row.every((field) => field.inline)
                    ? 'embed-field-row'
                    : 'embed-field-row block'
                }
              >
                {row.map((field, fieldIndex) => (
                  <div key={fieldIndex} className="embed-field">
                    <div className="embed-field-name">{field.name}</div>
                    <MarkdownContent
                      content={field.value}
                      context={context}
                      className="content embed-field-value"
                    />
                  </div>
                ))}
              </div>
            ))}
          </div>
        )}
        {embed.image && (
          <div className="embed-image">
            <img src={embed.image.url} alt="" />
          </div>
        )}
        {embed.footer && <div className="embed-footer">{embed.footer.text}</div>}
      </div>
      {embed.thumbnail && (
        <div className="embed-thumbnail">
          <img src={embed.thumbnail.url} alt="" />
        </div>
      )}
    </div>
  );
}

function MessageView({
  message,
  channelNames,
}: {
  message: ArchiveMessage;
  channelNames?: ReadonlyMap<string, string>;
}) {
  const context: MentionContext = { users: message.mentions, channelNames };

  return (
    <div className="message" id={`message-${message.id}`}>
      {message.content && (
        <MarkdownContent content={message.content} context={context} />
      )}
      {message.attachments.map((attachment, index) => (
        <AttachmentView key={index} attachment={attachment} />
      ))}
      {message.embeds.map((embed, index) => (
        <EmbedView key={index} embed={embed} context={context} />
      ))}
    </div>
  );
}

export function MessageGroupView({
  group,
  channelNames,
}: {
  group: MessageGroup;
  channelNames?: ReadonlyMap<string, string>;
}) {
  const { author } = group;

  return (
    <div className="message-group">
      <div className="header">
        <img className="avatar" src={getAvatarUrl(author)} alt="" />
        <span className="username">{author.displayName}</span>
        {author.bot && <span className="bot-tag">BOT</span>}
        <span className="timestamp">{formatTimestamp(group.timestamp)}</span>
      </div>
      {group.messages.map((message) => (
        <MessageView
          key={message.id}
          message={message}
          channelNames={channelNames}
        />
      ))}
    </div>
  );
}

export interface ArchiveDocumentProps {
  channelName: string;
  groups: MessageGroup[];
  archivedAt: Date;
  channelNames?: ReadonlyMap<string, string>;
}

export function ArchiveDocument({
  channelName,
  groups,
  archivedAt,
  channelNames,
}: ArchiveDocumentProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="UTF-8" />
        <title>{`#${channelName}`}</title>
        <style dangerouslySetInnerHTML={{ __html: ARCHIVE_STYLES }} />
      </head>
      <body>
        <div className="server-header">
          <div className="channel-name">{`# ${channelName}`}</div>
          <div className="timestamp">{`Archived on ${formatDate(archivedAt)}`}</div>
        </div>
        {groups.map((group) => (
          <MessageGroupView
            key={group.messages[0].id}
            group={group}
            channelNames={channelNames}
          />
        ))}
      </body>
    </html>
  );
}
