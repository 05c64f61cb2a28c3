/**
 * Narrow view of the Google Drive v3 files API used by the archive store
 */

import type { Readable } from 'node:stream';
import { google } from 'googleapis';
import type { DriveCredential } from '../../types/archive.js';

export const DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive'];

export interface DriveFile {
  id?: string | null;
  name?: string | null;
}

export interface DriveListParams {
  q: string;
  fields: string;
  pageSize?: number;
  pageToken?: string;
  spaces?: string;
}

export interface DriveFileList {
  files: DriveFile[];
  nextPageToken?: string | null;
}

export interface DriveCreateParams {
  requestBody: {
    name: string;
    mimeType?: string;
    parents?: string[];
  };
  media?: {
    mimeType: string;
    body: Readable;
  };
  fields: string;
}

export interface DriveFilesClient {
  list(params: DriveListParams): Promise<DriveFileList>;
  create(params: DriveCreateParams): Promise<DriveFile>;
}

/**
 * Build a files client authenticated with an authorized-user or
 * service-account credential
 */
export function createDriveFilesClient(
  credential: DriveCredential
): DriveFilesClient {
  const auth = new google.auth.GoogleAuth({
    credentials: credential,
    scopes: DRIVE_SCOPES,
  });
  const drive = google.drive({ version: 'v3', auth });

  return {
    async list(params) {
      const response = await drive.files.list(params);
      return {
        files: response.data.files ?? [],
        nextPageToken: response.data.nextPageToken,
      };
    },
    async create(params) {
      const response = await drive.files.create(params);
      return response.data;
    },
  };
}
