/**
 * Archive service interface
 */

import type { ArchiveResult } from './results.js';
import type {
  ArchiveChannel,
  ArchiveWorkerState,
  DriveCredential,
  Guild,
  WorkerResult,
} from '../../types/archive.js';
import type { CreateArchiveRunInput } from '../../validation/archive/schemas.js';

/**
 * Credentials a caller archives with; passed in explicitly, never read from globals
 */
export interface ArchiveSession {
  token: string;
  credential: DriveCredential;
}

/**
 * Operator-facing summary of a terminal worker status
 */
export type ArchiveOutcome = 'uploaded' | 'skipped' | 'empty' | 'error';

export type ArchiveRunStatus = 'running' | 'completed';

export interface ChannelListing extends ArchiveChannel {
  archived: boolean;
}

export interface GuildChannels {
  guild: Guild;
  channels: ChannelListing[];
}

export interface ArchiveRunChannel {
  channel: ArchiveChannel;
  progress: 'Queued' | ArchiveWorkerState;
  result?: WorkerResult;
  outcome?: ArchiveOutcome;
}

export interface ArchiveRun {
  id: string;
  guild: Guild;
  status: ArchiveRunStatus;
  createdAt: string;
  completedAt?: string;
  channels: ArchiveRunChannel[];
}

export interface ArchiveService {
  /**
   * Guilds visible to the session token, plus the Direct Messages pseudo-guild
   */
  listGuilds(): Promise<ArchiveResult<Guild[]>>;

  /**
   * Archivable channels of a guild, flagged when already present in the store
   */
  listChannels(guildId: string): Promise<ArchiveResult<GuildChannels>>;

  /**
   * Start archiving channels in the background
   */
  startRun(input: CreateArchiveRunInput): Promise<ArchiveResult<ArchiveRun>>;

  getRun(runId: string): Promise<ArchiveResult<ArchiveRun>>;
}
