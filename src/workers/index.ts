export { ChannelArchiveWorker } from './channelArchiveWorker.js';
export type {
  ChannelArchiveSettings,
  ChannelArchiveWorkerDeps,
  StateChangeListener,
} from './channelArchiveWorker.js';
export { ArchiveOrchestrator, DEFAULT_MAX_WORKERS } from './archiveOrchestrator.js';
export type { OrchestratorHooks } from './archiveOrchestrator.js';
export { createForkedJobRunner, forkWorkerProcess } from './forkedJobRunner.js';
export type { SpawnWorker, WorkerHandle } from './forkedJobRunner.js';
export type { JobRunner } from './jobRunner.js';
