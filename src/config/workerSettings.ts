import type { Config } from './env.js';
import type { ArchiveWorkerSettings } from '../types/archive.js';

/**
 * Settings shipped to every worker process with its job
 */
export function buildWorkerSettings(config: Config): ArchiveWorkerSettings {
  return {
    scratchRoot: config.TEMP_DIR,
    fallbackRoot: config.LOCAL_BACKUP_DIR,
    rootFolderName: config.ARCHIVE_ROOT_FOLDER,
    maxUploadRetries: config.MAX_UPLOAD_RETRIES,
    uploadRetryBaseDelayMs: config.UPLOAD_RETRY_BASE_DELAY_MS,
    messageFetchSize: config.DISCORD_MESSAGE_FETCH_SIZE,
    discordApiBaseUrl: config.DISCORD_API_BASE_URL,
    discordAuthScheme: config.DISCORD_AUTH_SCHEME,
    chromeExecutablePath: config.CHROME_EXECUTABLE_PATH,
    pdfSettleDelayMs: config.PDF_SETTLE_DELAY_MS,
    pdfNavigationTimeoutMs: config.PDF_NAVIGATION_TIMEOUT_MS,
  };
}
