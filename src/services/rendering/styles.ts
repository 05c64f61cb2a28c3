/**
 * Stylesheet embedded in every archive document.
 * Approximates the Discord dark theme for print.
 */
export const ARCHIVE_STYLES = `
body {
  background-color: #313338;
  color: #dbdee1;
  font-family: 'gg sans', 'Noto Sans', 'Helvetica Neue', Helvetica, Arial, sans-serif;
  margin: 0;
  padding: 20px;
}
.server-header {
  border-bottom: 1px solid #3f4147;
  padding-bottom: 20px;
  margin-bottom: 20px;
}
.channel-name {
  font-size: 24px;
  font-weight: bold;
  color: #f2f3f5;
}
.message-group {
  margin: 10px 0;
  padding: 2px 0;
  break-inside: avoid-page;
}
.header {
  display: flex;
  align-items: center;
  margin-bottom: 4px;
}
.avatar {
  width: 40px;
  height: 40px;
  border-radius: 50%;
  margin-right: 16px;
  background-color: #5865f2;
}
.username {
  font-weight: 500;
  color: #f2f3f5;
  font-size: 16px;
  margin-right: 8px;
}
.bot-tag {
  background-color: #5865f2;
  color: #ffffff;
  font-size: 10px;
  font-weight: 600;
  border-radius: 3px;
  padding: 1px 4px;
  margin-right: 8px;
}
.timestamp {
  color: #949ba4;
  font-size: 12px;
}
.message {
  margin-left: 56px;
}
.content {
  font-size: 16px;
  line-height: 1.375rem;
  overflow-wrap: anywhere;
}
.content p {
  margin: 0;
}
.content code {
  background-color: #2b2d31;
  border-radius: 3px;
  padding: 0 3px;
  font-family: Consolas, 'Courier New', monospace;
  font-size: 14px;
}
.content pre {
  background-color: #2b2d31;
  border: 1px solid #1e1f22;
  border-radius: 4px;
  padding: 8px;
  white-space: pre-wrap;
}
.content pre code {
  padding: 0;
}
.content blockquote {
  border-left: 4px solid #4e5058;
  margin: 4px 0;
  padding-left: 12px;
}
.content a,
.attachment a {
  color: #00a8fc;
  text-decoration: none;
}
.spoiler {
  background-color: #1e1f22;
  border-radius: 3px;
  padding: 0 2px;
}
.attachment {
  margin-top: 8px;
  max-width: 400px;
}
.attachment img {
  max-width: 100%;
  border-radius: 8px;
}
.embed {
  background-color: #2b2d31;
  border-left: 4px solid #202225;
  border-radius: 4px;
  margin-top: 8px;
  max-width: 520px;
  padding: 8px 16px 16px 12px;
  display: flex;
  gap: 16px;
}
.embed-body {
  flex: 1;
  min-width: 0;
}
.embed-author {
  font-size: 14px;
  font-weight: 600;
  margin-top: 8px;
}
.embed-title {
  font-weight: 600;
  color: #f2f3f5;
  margin-top: 8px;
}
.embed-description {
  font-size: 14px;
  margin-top: 8px;
}
.embed-fields {
  margin-top: 8px;
}
.embed-field-row {
  display: grid;
  grid-template-columns: repeat(3, 1fr);
  gap: 8px;
  margin-top: 8px;
}
.embed-field-row.block {
  grid-template-columns: 1fr;
}
.embed-field-name {
  font-size: 14px;
  font-weight: 600;
  color: #f2f3f5;
}
.embed-field-value {
  font-size: 14px;
}
.embed-image img {
  max-width: 100%;
  border-radius: 4px;
  margin-top: 16px;
}
.embed-thumbnail img {
  max-width: 80px;
  max-height: 80px;
  border-radius: 4px;
  margin-top: 8px;
}
.embed-footer {
  color: #949ba4;
  font-size: 12px;
  margin-top: 8px;
}
`;
