/**
 * Message source exports
 */

export { MessageSourceFactory } from './factory.js';
export type { MessageSourceConfig } from './factory.js';
export { DiscordAdapter, collectMessages } from './discord/DiscordAdapter.js';
export { DiscordRestClient } from './discord/DiscordRestClient.js';
export type { MessageSource, FetchMessagesOptions } from './types.js';
