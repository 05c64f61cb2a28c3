/**
 * Entry point of a forked archive worker process.
 *
 * Receives one job over IPC, builds its own Discord client, Drive client and
 * Chromium instance, streams state changes back and reports a single result.
 */

import { pathToFileURL } from 'node:url';
import { MessageSourceFactory } from '../adapters/factory.js';
import {
  createDriveFilesClient,
  DriveArchiveStore,
} from '../services/archiveStore/index.js';
import { PdfConverter } from '../services/conversion/index.js';
import { DocumentRenderer } from '../services/rendering/index.js';
import type { ArchiveJobData, WorkerResult } from '../types/archive.js';
import { getErrorMessage } from '../types/errors.js';
import logger from '../utils/logger.js';
import {
  WorkerRequestSchema,
  type WorkerResponse,
} from '../validation/archive/schemas.js';
import {
  ChannelArchiveWorker,
  type StateChangeListener,
} from './channelArchiveWorker.js';

/**
 * Run a job in the current process with production dependencies
 */
export async function runArchiveJob(
  job: ArchiveJobData,
  onStateChange?: StateChangeListener
): Promise<WorkerResult> {
  const { settings } = job;
  const converter = new PdfConverter({
    executablePath: settings.chromeExecutablePath,
    settleDelayMs: settings.pdfSettleDelayMs,
    navigationTimeoutMs: settings.pdfNavigationTimeoutMs,
  });

  const worker = new ChannelArchiveWorker({
    source: MessageSourceFactory.createDiscord({
      token: job.token,
      authScheme: settings.discordAuthScheme,
      baseUrl: settings.discordApiBaseUrl,
    }),
    store: new DriveArchiveStore(createDriveFilesClient(job.credential), {
      rootFolderName: settings.rootFolderName,
    }),
    converter,
    renderer: new DocumentRenderer(),
    settings,
    onStateChange,
  });

  try {
    return await worker.archive(
      job.channel,
      job.guildName,
      new Map(Object.entries(job.channelNames))
    );
  } finally {
    await converter.close();
  }
}

function sendToParent(message: WorkerResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!process.send) {
      reject(new Error('Worker process has no IPC channel'));
      return;
    }
    process.send(message, undefined, undefined, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

export interface WorkerRequestDeps {
  send: (message: WorkerResponse) => Promise<void>;
  run?: typeof runArchiveJob;
}

/**
 * Validate one job request, run it and report exactly one result.
 * A job that throws is reported as an Error result carrying the fault.
 */
export async function handleWorkerRequest(
  raw: unknown,
  { send, run = runArchiveJob }: WorkerRequestDeps
): Promise<void> {
  const parsed = WorkerRequestSchema.safeParse(raw);
  if (!parsed.success) {
    await send({
      type: 'result',
      result: {
        channelId: 'unknown',
        status: 'Error',
        message: `Invalid job: ${parsed.error.message}`,
      },
    });
    return;
  }

  const { job } = parsed.data;
  logger.info('Worker process started job', {
    pid: process.pid,
    channelId: job.channel.id,
  });

  let result: WorkerResult;
  try {
    result = await run(job, (channelId, state) => {
      send({ type: 'state', channelId, state }).catch((error) => {
        logger.warn('Failed to report worker state', {
          channelId,
          state,
          error: getErrorMessage(error),
        });
      });
    });
  } catch (error) {
    logger.error('Archive job crashed', {
      channelId: job.channel.id,
      error: getErrorMessage(error),
    });
    result = {
      channelId: job.channel.id,
      status: 'Error',
      message: getErrorMessage(error),
    };
  }

  await send({ type: 'result', result });
}

// Start listening only when launched as a forked child
if (
  process.send &&
  process.argv[1] &&
  import.meta.url === pathToFileURL(process.argv[1]).href
) {
  process.once('message', (raw: unknown) => {
    handleWorkerRequest(raw, { send: sendToParent })
      .catch((error) => {
        logger.error('Worker process failed', {
          error: getErrorMessage(error),
        });
        process.exitCode = 1;
      })
      .finally(() => {
        process.disconnect?.();
      });
  });
}
