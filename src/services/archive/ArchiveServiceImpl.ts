/**
 * Archive service implementation
 */

import { v4 as uuidv4 } from 'uuid';
import type { MessageSource } from '../../adapters/types.js';
import type { ArchiveStore } from '../archiveStore/ArchiveStore.js';
import type {
  ArchiveChannel,
  ArchiveJobData,
  ArchiveWorkerSettings,
  Guild,
  WorkerResult,
  WorkerResultStatus,
} from '../../types/archive.js';
import { DIRECT_MESSAGES_GUILD } from '../../types/archive.js';
import { getErrorMessage } from '../../types/errors.js';
import logger from '../../utils/logger.js';
import { resolveArchivePathNames } from '../../utils/sanitize.js';
import type { CreateArchiveRunInput } from '../../validation/archive/schemas.js';
import type { ArchiveOrchestrator } from '../../workers/archiveOrchestrator.js';
import type {
  ArchiveOutcome,
  ArchiveRun,
  ArchiveService,
  ArchiveSession,
  GuildChannels,
} from './ArchiveService.js';
import {
  invalidRequest,
  notFound,
  succeeded,
  upstreamFailure,
  type ArchiveResult,
} from './results.js';

const OUTCOMES: Record<WorkerResultStatus, ArchiveOutcome> = {
  Success: 'uploaded',
  Exists: 'skipped',
  Empty: 'empty',
  Error: 'error',
};

export function toOutcome(status: WorkerResultStatus): ArchiveOutcome {
  return OUTCOMES[status];
}

export interface ArchiveServiceDeps {
  session: ArchiveSession;
  settings: ArchiveWorkerSettings;
  source: MessageSource;
  store: Pick<ArchiveStore, 'listArchivedChannels'>;
  orchestrator: Pick<ArchiveOrchestrator, 'run'>;
  /** Completed runs kept for status queries; older ones are forgotten */
  maxRetainedRuns?: number;
}

export const DEFAULT_MAX_RETAINED_RUNS = 100;

export class ArchiveServiceImpl implements ArchiveService {
  private runs = new Map<string, ArchiveRun>();
  private maxRetainedRuns: number;

  constructor(private deps: ArchiveServiceDeps) {
    this.maxRetainedRuns = deps.maxRetainedRuns ?? DEFAULT_MAX_RETAINED_RUNS;
  }

  async listGuilds(): Promise<ArchiveResult<Guild[]>> {
    try {
      const guilds = await this.deps.source.listGuilds();
      return succeeded([...guilds, DIRECT_MESSAGES_GUILD]);
    } catch (error) {
      return this.upstreamError('Failed to list guilds', error);
    }
  }

  async listChannels(guildId: string): Promise<ArchiveResult<GuildChannels>> {
    const resolved = await this.resolveGuild(guildId);
    if (!resolved.success) {
      return resolved;
    }

    const { guild, channels } = resolved.data;
    try {
      const archived = await this.deps.store.listArchivedChannels(guild.name);
      return succeeded({
        guild,
        channels: channels.map((channel) => ({
          ...channel,
          archived: archived.has(
            resolveArchivePathNames(guild.name, channel).channel
          ),
        })),
      });
    } catch (error) {
      return this.upstreamError('Failed to list archived channels', error);
    }
  }

  async startRun(
    input: CreateArchiveRunInput
  ): Promise<ArchiveResult<ArchiveRun>> {
    const resolved = await this.resolveGuild(input.guildId);
    if (!resolved.success) {
      return resolved;
    }

    const { guild, channels: available } = resolved.data;
    const byId = new Map(available.map((channel) => [channel.id, channel]));
    const requested = [...new Set(input.channelIds)];
    const unknownChannelIds = requested.filter((id) => !byId.has(id));
    if (unknownChannelIds.length > 0) {
      return invalidRequest(
        `Unknown channels for guild ${guild.id}: ${unknownChannelIds.join(', ')}`,
        { unknownChannelIds }
      );
    }

    const channels = requested.flatMap((id) => {
      const channel = byId.get(id);
      return channel ? [channel] : [];
    });

    const run: ArchiveRun = {
      id: uuidv4(),
      guild,
      status: 'running',
      createdAt: new Date().toISOString(),
      channels: channels.map((channel) => ({ channel, progress: 'Queued' })),
    };
    this.runs.set(run.id, run);

    const channelNames = Object.fromEntries(
      available.map((channel) => [channel.id, channel.name])
    );
    const jobs: ArchiveJobData[] = channels.map((channel) => ({
      channel,
      guildName: run.guild.name,
      channelNames,
      token: this.deps.session.token,
      credential: this.deps.session.credential,
      settings: this.deps.settings,
    }));

    logger.info('Archive run started', {
      runId: run.id,
      guildId: guild.id,
      channels: jobs.length,
    });

    this.execute(run, jobs).catch((error) => {
      logger.error('Archive run failed', {
        runId: run.id,
        error: getErrorMessage(error),
      });
    });

    return succeeded(run);
  }

  async getRun(runId: string): Promise<ArchiveResult<ArchiveRun>> {
    const run = this.runs.get(runId);
    if (!run) {
      return notFound(`Archive run ${runId} not found`);
    }
    return succeeded(run);
  }

  private async execute(run: ArchiveRun, jobs: ArchiveJobData[]): Promise<void> {
    const entries = new Map(
      run.channels.map((entry) => [entry.channel.id, entry])
    );

    try {
      await this.deps.orchestrator.run(jobs, {
        onStateChange: (channelId, state) => {
          const entry = entries.get(channelId);
          if (entry && !entry.result) {
            entry.progress = state;
          }
        },
        onResult: (result: WorkerResult) => {
          const entry = entries.get(result.channelId);
          if (entry) {
            entry.result = result;
            entry.outcome = toOutcome(result.status);
          }
          logger.info('Channel archive finished', {
            runId: run.id,
            ...result,
          });
        },
      });
    } finally {
      run.status = 'completed';
      run.completedAt = new Date().toISOString();
      this.evictCompletedRuns();
    }
  }

  /**
   * Drop the oldest completed runs beyond the retention cap. Running runs stay.
   */
  private evictCompletedRuns(): void {
    const completed = [...this.runs.values()].filter(
      (run) => run.status === 'completed'
    );
    const excess = completed.length - this.maxRetainedRuns;
    for (const run of completed.slice(0, Math.max(excess, 0))) {
      this.runs.delete(run.id);
      logger.debug('Archive run evicted', { runId: run.id });
    }
  }

  private async resolveGuild(
    guildId: string
  ): Promise<ArchiveResult<{ guild: Guild; channels: ArchiveChannel[] }>> {
    try {
      const guild = await this.deps.source.getGuild(guildId);
      if (!guild) {
        return notFound(`Guild ${guildId} not found`);
      }
      const channels = await this.deps.source.listChannels(guildId);
      return succeeded({ guild, channels });
    } catch (error) {
      return this.upstreamError('Failed to list channels', error);
    }
  }

  private upstreamError<T>(message: string, error: unknown): ArchiveResult<T> {
    logger.error(message, { error: getErrorMessage(error) });
    return upstreamFailure(message, error);
  }
}
