import type { ArchiveJobData, WorkerResult } from '../types/archive.js';
import type { StateChangeListener } from './channelArchiveWorker.js';

/**
 * Runs one channel archive job to completion, wherever it executes
 */
export type JobRunner = (
  job: ArchiveJobData,
  onStateChange?: StateChangeListener
) => Promise<WorkerResult>;
