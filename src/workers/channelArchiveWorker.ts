/**
 * Per-channel archival pipeline: check, fetch, render, convert, upload
 */

import { copyFile, mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { collectMessages } from '../adapters/discord/DiscordAdapter.js';
import type { MessageSource } from '../adapters/types.js';
import type { ArchiveStore } from '../services/archiveStore/ArchiveStore.js';
import type { ArtifactConverter } from '../services/conversion/ArtifactConverter.js';
import type { DocumentRenderer } from '../services/rendering/DocumentRenderer.js';
import type {
  ArchiveChannel,
  ArchiveWorkerSettings,
  ArchiveWorkerState,
  WorkerResult,
  WorkerResultStatus,
} from '../types/archive.js';
import { getErrorMessage, isRetryableError } from '../types/errors.js';
import logger from '../utils/logger.js';
import {
  resolveArchivePathNames,
  type ArchivePathNames,
} from '../utils/sanitize.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';

export type StateChangeListener = (
  channelId: string,
  state: ArchiveWorkerState
) => void;

export type ChannelArchiveSettings = Pick<
  ArchiveWorkerSettings,
  | 'scratchRoot'
  | 'fallbackRoot'
  | 'rootFolderName'
  | 'maxUploadRetries'
  | 'uploadRetryBaseDelayMs'
  | 'messageFetchSize'
>;

export interface ChannelArchiveWorkerDeps {
  source: MessageSource;
  store: ArchiveStore;
  converter: ArtifactConverter;
  renderer: Pick<DocumentRenderer, 'render'>;
  settings: ChannelArchiveSettings;
  sleep?: Sleep;
  onStateChange?: StateChangeListener;
}

type UploadOutcome =
  | { uploaded: true }
  | { uploaded: false; error: unknown };

export class ChannelArchiveWorker {
  private sleep: Sleep;

  constructor(private deps: ChannelArchiveWorkerDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Archive one channel. Never throws: every failure becomes an Error result.
   *
   * @param channelNames - names of the guild's channels by id, for `<#id>` mentions
   */
  async archive(
    channel: ArchiveChannel,
    guildName: string,
    channelNames: ReadonlyMap<string, string> = new Map()
  ): Promise<WorkerResult> {
    this.transition(channel.id, 'Init');

    try {
      return await this.runPipeline(channel, guildName, channelNames);
    } catch (error) {
      logger.error('Channel archive failed', {
        channelId: channel.id,
        error: getErrorMessage(error),
      });
      return this.finish(channel.id, 'Error', 'Error', getErrorMessage(error));
    }
  }

  private async runPipeline(
    channel: ArchiveChannel,
    guildName: string,
    channelNames: ReadonlyMap<string, string>
  ): Promise<WorkerResult> {
    const { store, settings } = this.deps;
    const names = resolveArchivePathNames(guildName, channel);
    const artifactName = `${names.channel}.pdf`;

    this.transition(channel.id, 'CheckExists');
    const rootId = await store.ensureFolder(settings.rootFolderName);
    const guildId = await store.ensureFolder(names.guild, rootId);
    const categoryId = await store.ensureFolder(names.category, guildId);

    if (await store.exists(artifactName, categoryId)) {
      return this.finish(channel.id, 'Exists', 'Exists', 'Already archived');
    }

    this.transition(channel.id, 'Fetching');
    const scratchDir = path.join(settings.scratchRoot, channel.id);
    await rm(scratchDir, { recursive: true, force: true });
    await mkdir(scratchDir, { recursive: true });

    const messages = await collectMessages(this.deps.source, channel.id, {
      limit: settings.messageFetchSize,
    });
    logger.info('Fetched channel messages', {
      channelId: channel.id,
      count: messages.length,
    });

    if (messages.length === 0) {
      await rm(scratchDir, { recursive: true, force: true });
      return this.finish(channel.id, 'Empty', 'Empty', 'No messages found');
    }

    this.transition(channel.id, 'Rendering');
    const documentPath = path.join(scratchDir, `${names.channel}.html`);
    try {
      const html = this.deps.renderer.render(channel.name, messages, {
        channelNames,
      });
      await writeFile(documentPath, html, 'utf-8');
    } catch (error) {
      return this.finish(
        channel.id,
        'Error',
        'Error',
        `Render failed: ${getErrorMessage(error)}`
      );
    }

    this.transition(channel.id, 'Converting');
    const artifactPath = path.join(scratchDir, artifactName);
    try {
      await this.deps.converter.convert(documentPath, artifactPath);
    } catch (error) {
      return this.finish(
        channel.id,
        'Error',
        'Error',
        `PDF generation failed: ${getErrorMessage(error)}`
      );
    }

    this.transition(channel.id, 'Uploading');
    const upload = await this.uploadWithRetry(
      channel.id,
      artifactPath,
      artifactName,
      categoryId
    );

    if (!upload.uploaded) {
      this.transition(channel.id, 'LocalFallback');
      return this.saveLocally(channel.id, artifactPath, names, upload.error);
    }

    await rm(scratchDir, { recursive: true, force: true });
    return this.finish(channel.id, 'Success', 'Success', 'Done');
  }

  private async uploadWithRetry(
    channelId: string,
    artifactPath: string,
    artifactName: string,
    parentId: string
  ): Promise<UploadOutcome> {
    const { maxUploadRetries, uploadRetryBaseDelayMs } = this.deps.settings;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxUploadRetries; attempt++) {
      try {
        await this.deps.store.upload(artifactPath, artifactName, parentId);
        return { uploaded: true };
      } catch (error) {
        lastError = error;

        if (!isRetryableError(error)) {
          logger.error('Upload failed with non-retryable error', {
            channelId,
            attempt,
            error: getErrorMessage(error),
          });
          break;
        }

        logger.warn('Upload attempt failed', {
          channelId,
          attempt,
          maxUploadRetries,
          error: getErrorMessage(error),
        });
        if (attempt < maxUploadRetries) {
          await this.sleep(2 ** attempt * uploadRetryBaseDelayMs);
        }
      }
    }

    return { uploaded: false, error: lastError };
  }

  private async saveLocally(
    channelId: string,
    artifactPath: string,
    names: ArchivePathNames,
    uploadError: unknown
  ): Promise<WorkerResult> {
    const fallbackDir = path.join(
      this.deps.settings.fallbackRoot,
      names.guild,
      names.category
    );
    const fallbackPath = path.join(fallbackDir, `${names.channel}.pdf`);

    try {
      await mkdir(fallbackDir, { recursive: true });
      await copyFile(artifactPath, fallbackPath);
    } catch (copyError) {
      return this.finish(
        channelId,
        'Error',
        'Error',
        `Upload failed (${getErrorMessage(uploadError)}) and local save failed (${getErrorMessage(copyError)})`
      );
    }

    logger.warn('Upload failed, archive kept locally', {
      channelId,
      fallbackPath,
      error: getErrorMessage(uploadError),
    });
    return this.finish(
      channelId,
      'Error',
      'Error',
      `Upload failed, saved locally: ${fallbackPath}`
    );
  }

  private finish(
    channelId: string,
    state: ArchiveWorkerState,
    status: WorkerResultStatus,
    message: string
  ): WorkerResult {
    this.transition(channelId, state);
    return { channelId, status, message };
  }

  private transition(channelId: string, state: ArchiveWorkerState): void {
    logger.debug('Worker state change', { channelId, state });
    this.deps.onStateChange?.(channelId, state);
  }
}
