export { DocumentRenderer } from './DocumentRenderer.js';
export type { RenderOptions } from './DocumentRenderer.js';
export { groupMessages, formatTimestamp } from './grouping.js';
export { getAvatarUrl, defaultAvatarIndex } from './avatars.js';
