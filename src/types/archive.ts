/**
 * Archive pipeline data types
 */

/**
 * Guild (server) visible to the fetch token
 */
export interface Guild {
  id: string;
  name: string;
}

/**
 * Pseudo-guild used to expose direct message conversations
 */
export const DIRECT_MESSAGES_GUILD: Guild = {
  id: '0',
  name: 'Direct Messages',
};

/**
 * Archival unit. Category is "Uncategorized" when the channel has no parent
 */
export interface ArchiveChannel {
  id: string;
  name: string;
  category: string;
}

export interface ArchiveAuthor {
  id: string;
  username: string;
  displayName: string;
  avatar: string | null;
  discriminator: string;
  bot: boolean;
}

export interface ArchiveAttachment {
  url: string;
  filename: string;
  contentType: string | null;
  size: number;
}

export interface ArchiveEmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface ArchiveEmbed {
  title?: string;
  url?: string;
  description?: string;
  color?: number;
  author?: { name: string; url?: string; iconUrl?: string };
  footer?: { text: string; iconUrl?: string };
  image?: { url: string };
  thumbnail?: { url: string };
  fields: ArchiveEmbedField[];
}

/**
 * One chat message, validated and defaulted at the Discord boundary
 */
export interface ArchiveMessage {
  id: string;
  author: ArchiveAuthor;
  timestamp: string;
  content: string;
  attachments: ArchiveAttachment[];
  embeds: ArchiveEmbed[];
  mentions: ArchiveAuthor[];
}

/**
 * Consecutive messages from a single author
 */
export interface MessageGroup {
  author: ArchiveAuthor;
  timestamp: string;
  messages: ArchiveMessage[];
}

/**
 * Worker state machine states
 */
export type ArchiveWorkerState =
  | 'Init'
  | 'CheckExists'
  | 'Exists'
  | 'Fetching'
  | 'Empty'
  | 'Rendering'
  | 'Converting'
  | 'Uploading'
  | 'Success'
  | 'LocalFallback'
  | 'Error';

export type WorkerResultStatus = 'Success' | 'Exists' | 'Empty' | 'Error';

/**
 * Terminal outcome reported once per channel
 */
export interface WorkerResult {
  channelId: string;
  status: WorkerResultStatus;
  message: string;
}

/**
 * Google credential JSON (authorized user or service account)
 */
export interface DriveCredential {
  type: 'authorized_user' | 'service_account';
  client_id?: string;
  client_secret?: string;
  refresh_token?: string;
  client_email?: string;
  private_key?: string;
  project_id?: string;
  quota_project_id?: string;
}

/**
 * Settings a worker process needs to build its own pipeline
 */
export interface ArchiveWorkerSettings {
  scratchRoot: string;
  fallbackRoot: string;
  rootFolderName: string;
  maxUploadRetries: number;
  uploadRetryBaseDelayMs: number;
  messageFetchSize: number;
  discordApiBaseUrl: string;
  discordAuthScheme: 'Bot' | 'Bearer';
  chromeExecutablePath: string;
  pdfSettleDelayMs: number;
  pdfNavigationTimeoutMs: number;
}

/**
 * Self-contained, serializable description of one channel archive
 */
export interface ArchiveJobData {
  channel: ArchiveChannel;
  guildName: string;
  /** Every channel of the guild by id, for resolving `<#id>` mentions */
  channelNames: Record<string, string>;
  token: string;
  credential: DriveCredential;
  settings: ArchiveWorkerSettings;
}
