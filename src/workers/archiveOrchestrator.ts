/**
 * Fans channel archive jobs out across a bounded pool of workers
 */

import { v4 as uuidv4 } from 'uuid';
import type { ArchiveJobData, WorkerResult } from '../types/archive.js';
import { getErrorMessage } from '../types/errors.js';
import logger from '../utils/logger.js';
import type { StateChangeListener } from './channelArchiveWorker.js';
import type { JobRunner } from './jobRunner.js';

export const DEFAULT_MAX_WORKERS = 4;

export interface OrchestratorHooks {
  /** Called once per channel, in completion order */
  onResult?: (result: WorkerResult) => void;
  onStateChange?: StateChangeListener;
}

export class ArchiveOrchestrator {
  constructor(
    private runner: JobRunner,
    private maxWorkers: number = DEFAULT_MAX_WORKERS
  ) {}

  async run(
    jobs: ArchiveJobData[],
    hooks: OrchestratorHooks = {}
  ): Promise<WorkerResult[]> {
    const batchId = uuidv4().substring(0, 8);
    const results: WorkerResult[] = [];
    const laneCount = Math.max(1, Math.min(this.maxWorkers, jobs.length));
    let next = 0;

    logger.info('Starting archive batch', {
      batchId,
      channels: jobs.length,
      workers: laneCount,
    });

    const lane = async (): Promise<void> => {
      while (next < jobs.length) {
        const job = jobs[next++];
        const result = await this.runJob(job, hooks.onStateChange);
        results.push(result);
        this.notify(hooks, result);
      }
    };

    await Promise.all(Array.from({ length: laneCount }, () => lane()));

    logger.info('Archive batch finished', {
      batchId,
      results: results.length,
      errors: results.filter((result) => result.status === 'Error').length,
    });
    return results;
  }

  private async runJob(
    job: ArchiveJobData,
    onStateChange?: StateChangeListener
  ): Promise<WorkerResult> {
    try {
      return await this.runner(job, onStateChange);
    } catch (error) {
      logger.error('Archive worker failed', {
        channelId: job.channel.id,
        error: getErrorMessage(error),
      });
      return {
        channelId: job.channel.id,
        status: 'Error',
        message: `Worker error: ${getErrorMessage(error)}`,
      };
    }
  }

  private notify(hooks: OrchestratorHooks, result: WorkerResult): void {
    try {
      hooks.onResult?.(result);
    } catch (error) {
      logger.warn('Result hook failed', {
        channelId: result.channelId,
        error: getErrorMessage(error),
      });
    }
  }
}
