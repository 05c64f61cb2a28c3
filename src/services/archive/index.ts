export type {
  ArchiveOutcome,
  ArchiveRun,
  ArchiveRunChannel,
  ArchiveRunStatus,
  ArchiveService,
  ArchiveSession,
  ChannelListing,
  GuildChannels,
} from './ArchiveService.js';
export { ArchiveServiceImpl, toOutcome } from './ArchiveServiceImpl.js';
export type { ArchiveServiceDeps } from './ArchiveServiceImpl.js';
export {
  failed,
  invalidRequest,
  notFound,
  succeeded,
  upstreamFailure,
} from './results.js';
export type {
  ArchiveFailure,
  ArchiveFailureReason,
  ArchiveResult,
} from './results.js';
