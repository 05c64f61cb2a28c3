export type { ArchiveStore } from './ArchiveStore.js';
export {
  DriveArchiveStore,
  escapeQueryValue,
  FOLDER_MIME_TYPE,
  PDF_MIME_TYPE,
} from './DriveArchiveStore.js';
export type { DriveArchiveStoreOptions } from './DriveArchiveStore.js';
export { createDriveFilesClient, DRIVE_SCOPES } from './driveClient.js';
export type {
  DriveCreateParams,
  DriveFile,
  DriveFileList,
  DriveFilesClient,
  DriveListParams,
} from './driveClient.js';
