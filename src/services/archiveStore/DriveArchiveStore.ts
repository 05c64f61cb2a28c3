/**
 * Archive store backed by Google Drive folders
 *
 * Layout: <root folder> / <guild> / <category> / <channel>.pdf
 */

import { createReadStream } from 'node:fs';
import logger from '../../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../../utils/sleep.js';
import { sanitizeName, UNKNOWN_GUILD } from '../../utils/sanitize.js';
import type { ArchiveStore } from './ArchiveStore.js';
import type { DriveFile, DriveFilesClient } from './driveClient.js';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';
export const PDF_MIME_TYPE = 'application/pdf';

const PDF_EXTENSION = '.pdf';
const PAGE_SIZE = 1000;

/**
 * Escape a value for use inside a single-quoted Drive query literal
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export interface DriveArchiveStoreOptions {
  rootFolderName: string;
  /**
   * Wait before re-querying after a failed folder creation
   */
  createRetryDelayMs?: number;
  sleep?: Sleep;
}

export class DriveArchiveStore implements ArchiveStore {
  private rootFolderName: string;
  private createRetryDelayMs: number;
  private sleep: Sleep;

  constructor(
    private files: DriveFilesClient,
    options: DriveArchiveStoreOptions
  ) {
    this.rootFolderName = options.rootFolderName;
    this.createRetryDelayMs = options.createRetryDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async ensureFolder(name: string, parentId?: string): Promise<string> {
    const existing = await this.findFolder(name, parentId);
    if (existing) {
      return existing;
    }

    try {
      return await this.createFolder(name, parentId);
    } catch (error) {
      // Another worker may have created the same folder concurrently
      logger.warn('Folder creation failed, re-checking', {
        name,
        parentId,
        error: error instanceof Error ? error.message : String(error),
      });
      await this.sleep(this.createRetryDelayMs);

      const created = await this.findFolder(name, parentId);
      if (created) {
        return created;
      }
      return this.createFolder(name, parentId);
    }
  }

  async exists(name: string, parentId: string): Promise<boolean> {
    const result = await this.files.list({
      q: [
        `name='${escapeQueryValue(name)}'`,
        `'${escapeQueryValue(parentId)}' in parents`,
        'trashed=false',
      ].join(' and '),
      fields: 'files(id)',
      pageSize: 1,
    });
    return result.files.length > 0;
  }

  async upload(
    filePath: string,
    name: string,
    parentId: string
  ): Promise<string> {
    const file = await this.files.create({
      requestBody: { name, parents: [parentId] },
      media: {
        mimeType: PDF_MIME_TYPE,
        body: createReadStream(filePath),
      },
      fields: 'id',
    });

    if (!file.id) {
      throw new Error(`Drive did not return an id for uploaded file ${name}`);
    }
    logger.info('Uploaded archive', { name, parentId, fileId: file.id });
    return file.id;
  }

  async listArchivedChannels(guildName: string): Promise<Set<string>> {
    const archived = new Set<string>();

    const rootId = await this.findFolder(this.rootFolderName);
    if (!rootId) {
      return archived;
    }

    const guildId = await this.findFolder(
      sanitizeName(guildName) || UNKNOWN_GUILD,
      rootId
    );
    if (!guildId) {
      return archived;
    }

    const categories = await this.listAll(
      [
        `mimeType='${FOLDER_MIME_TYPE}'`,
        `'${escapeQueryValue(guildId)}' in parents`,
        'trashed=false',
      ].join(' and ')
    );

    for (const category of categories) {
      if (!category.id) {
        continue;
      }
      const pdfs = await this.listAll(
        [
          `mimeType='${PDF_MIME_TYPE}'`,
          `'${escapeQueryValue(category.id)}' in parents`,
          'trashed=false',
        ].join(' and ')
      );
      for (const pdf of pdfs) {
        if (pdf.name?.endsWith(PDF_EXTENSION)) {
          archived.add(pdf.name.slice(0, -PDF_EXTENSION.length));
        }
      }
    }

    return archived;
  }

  private async findFolder(
    name: string,
    parentId?: string
  ): Promise<string | null> {
    const result = await this.files.list({
      q: [
        `mimeType='${FOLDER_MIME_TYPE}'`,
        `name='${escapeQueryValue(name)}'`,
        `'${parentId ? escapeQueryValue(parentId) : 'root'}' in parents`,
        'trashed=false',
      ].join(' and '),
      fields: 'files(id, name)',
      pageSize: 1,
    });
    return result.files[0]?.id ?? null;
  }

  private async createFolder(name: string, parentId?: string): Promise<string> {
    const folder = await this.files.create({
      requestBody: {
        name,
        mimeType: FOLDER_MIME_TYPE,
        parents: parentId ? [parentId] : undefined,
      },
      fields: 'id',
    });

    if (!folder.id) {
      throw new Error(`Drive did not return an id for folder ${name}`);
    }
    logger.debug('Created folder', { name, parentId, folderId: folder.id });
    return folder.id;
  }

  private async listAll(q: string): Promise<DriveFile[]> {
    const files: DriveFile[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.files.list({
        q,
        fields: 'nextPageToken, files(id, name)',
        pageSize: PAGE_SIZE,
        pageToken,
      });
      files.push(...page.files);
      pageToken = page.nextPageToken ?? undefined;
    } while (pageToken);

    return files;
  }
}
