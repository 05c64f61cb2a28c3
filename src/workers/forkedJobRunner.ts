/**
 * Job runner that executes each archive job in its own child process
 */

import { fork } from 'node:child_process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ArchiveJobData, WorkerResult } from '../types/archive.js';
import logger from '../utils/logger.js';
import {
  WorkerResponseSchema,
  type WorkerRequest,
} from '../validation/archive/schemas.js';
import type { StateChangeListener } from './channelArchiveWorker.js';
import type { JobRunner } from './jobRunner.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * The parts of a child process the runner talks to
 */
export interface WorkerHandle {
  send(message: WorkerRequest): boolean;
  on(event: 'message', listener: (message: unknown) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(
    event: 'exit',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
  kill(): boolean;
}

export type SpawnWorker = () => WorkerHandle;

/**
 * Fork the worker entry beside this module. Under a TypeScript loader the
 * sibling is a .ts file and the child needs tsx too.
 */
export const forkWorkerProcess: SpawnWorker = () => {
  const extension = path.extname(__filename);
  const entry = path.join(__dirname, `workerProcess${extension}`);
  return fork(entry, [], {
    execArgv: extension === '.ts' ? ['--import', 'tsx'] : [],
    serialization: 'json',
  });
};

export function createForkedJobRunner(
  spawnWorker: SpawnWorker = forkWorkerProcess
): JobRunner {
  return (job: ArchiveJobData, onStateChange?: StateChangeListener) =>
    new Promise<WorkerResult>((resolve, reject) => {
      const channelId = job.channel.id;
      const child = spawnWorker();
      let settled = false;

      const fail = (error: Error) => {
        if (settled) {
          return;
        }
        settled = true;
        child.kill();
        reject(error);
      };

      child.on('message', (raw) => {
        const parsed = WorkerResponseSchema.safeParse(raw);
        if (!parsed.success) {
          logger.warn('Ignoring malformed worker message', {
            channelId,
            error: parsed.error.message,
          });
          return;
        }

        const message = parsed.data;
        if (message.type === 'state') {
          onStateChange?.(channelId, message.state);
          return;
        }

        if (!settled) {
          settled = true;
          resolve({ ...message.result, channelId });
        }
      });

      child.on('error', fail);

      child.on('exit', (code, signal) => {
        fail(
          new Error(
            `Worker process exited before reporting (code ${code}, signal ${signal})`
          )
        );
      });

      try {
        child.send({ type: 'job', job });
      } catch (error) {
        fail(error instanceof Error ? error : new Error(String(error)));
      }
    });
}
