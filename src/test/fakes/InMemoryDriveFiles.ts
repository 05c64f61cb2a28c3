/**
 * In-process stand-in for the Drive files API.
 *
 * Understands the `name=`, `mimeType=`, `in parents` and `trashed=false`
 * clauses the archive store emits.
 */

import type {
  DriveCreateParams,
  DriveFile,
  DriveFileList,
  DriveFilesClient,
  DriveListParams,
} from '../../services/archiveStore/driveClient.js';

export interface StoredDriveFile {
  id: string;
  name: string;
  mimeType: string;
  parents: string[];
}

interface CreateFailure {
  error: Error;
  /** Store the file anyway, as when a concurrent creator won the race */
  createAnyway: boolean;
}

const QUOTED = "'((?:\\\\.|[^'\\\\])*)'";
const NAME_CLAUSE = new RegExp(`(?:^|\\s)name=${QUOTED}`);
const MIME_CLAUSE = new RegExp(`mimeType=${QUOTED}`);
const PARENT_CLAUSE = new RegExp(`${QUOTED} in parents`);

function unescape(value: string): string {
  return value.replace(/\\(.)/g, '$1');
}

export class InMemoryDriveFiles implements DriveFilesClient {
  readonly files: StoredDriveFile[] = [];
  readonly listCalls: DriveListParams[] = [];
  readonly createCalls: DriveCreateParams[] = [];
  private createFailures: CreateFailure[] = [];
  private nextId = 1;

  add(file: Omit<StoredDriveFile, 'id'>): StoredDriveFile {
    const stored = { id: `file-${this.nextId++}`, ...file };
    this.files.push(stored);
    return stored;
  }

  failNextCreate(error: Error, options: { createAnyway?: boolean } = {}): void {
    this.createFailures.push({ error, createAnyway: options.createAnyway ?? false });
  }

  async list(params: DriveListParams): Promise<DriveFileList> {
    this.listCalls.push(params);

    const name = params.q.match(NAME_CLAUSE);
    const mimeType = params.q.match(MIME_CLAUSE);
    const parent = params.q.match(PARENT_CLAUSE);

    const matches = this.files.filter(
      (file) =>
        (!name || file.name === unescape(name[1])) &&
        (!mimeType || file.mimeType === unescape(mimeType[1])) &&
        (!parent || file.parents.includes(unescape(parent[1])))
    );

    const offset = params.pageToken ? Number(params.pageToken) : 0;
    const pageSize = params.pageSize ?? 100;
    const page = matches.slice(offset, offset + pageSize);
    const next = offset + pageSize;

    return {
      files: page.map((file): DriveFile => ({ id: file.id, name: file.name })),
      nextPageToken: next < matches.length ? String(next) : undefined,
    };
  }

  async create(params: DriveCreateParams): Promise<DriveFile> {
    this.createCalls.push(params);

    const stored = {
      name: params.requestBody.name,
      mimeType:
        params.requestBody.mimeType ??
        params.media?.mimeType ??
        'application/octet-stream',
      parents: params.requestBody.parents ?? ['root'],
    };

    const failure = this.createFailures.shift();
    if (failure) {
      if (failure.createAnyway) {
        this.add(stored);
      }
      throw failure.error;
    }

    params.media?.body.destroy();
    const file = this.add(stored);
    return { id: file.id };
  }
}
