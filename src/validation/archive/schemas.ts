/**
 * Zod validation schemas for archive operations
 */

import { z } from 'zod';
import type {
  ArchiveJobData,
  ArchiveWorkerState,
  DriveCredential,
  WorkerResult,
} from '../../types/archive.js';

/**
 * Discord snowflake ID
 */
const SnowflakeSchema = z
  .string()
  .min(1, 'ID is required')
  .regex(/^\d+$/, 'ID must be a numeric snowflake');

/**
 * Body of `POST /api/archives`
 */
export const CreateArchiveRunSchema = z.object({
  guildId: SnowflakeSchema,
  channelIds: z
    .array(SnowflakeSchema)
    .min(1, 'At least one channel must be selected')
    .max(500, 'Too many channels in one run'),
});

export const GuildParamsSchema = z.object({
  guildId: SnowflakeSchema,
});

export const ArchiveRunParamsSchema = z.object({
  runId: z.string().uuid('Invalid run ID format'),
});

export type CreateArchiveRunInput = z.infer<typeof CreateArchiveRunSchema>;

/**
 * Google credential JSON, authorized user or service account
 */
export const DriveCredentialSchema = z
  .discriminatedUnion('type', [
    z.object({
      type: z.literal('authorized_user'),
      client_id: z.string().min(1),
      client_secret: z.string().min(1),
      refresh_token: z.string().min(1),
      quota_project_id: z.string().optional(),
    }),
    z.object({
      type: z.literal('service_account'),
      client_email: z.string().email(),
      private_key: z.string().min(1),
      project_id: z.string().optional(),
    }),
  ])
  .transform((credential): DriveCredential => credential);

const ArchiveWorkerStateSchema = z.enum([
  'Init',
  'CheckExists',
  'Exists',
  'Fetching',
  'Empty',
  'Rendering',
  'Converting',
  'Uploading',
  'Success',
  'LocalFallback',
  'Error',
] as const satisfies readonly ArchiveWorkerState[]);

export const WorkerResultSchema = z
  .object({
    channelId: z.string().min(1),
    status: z.enum(['Success', 'Exists', 'Empty', 'Error']),
    message: z.string(),
  })
  .transform((result): WorkerResult => result);

/**
 * Serializable job handed to a worker process
 */
export const ArchiveJobSchema = z
  .object({
    channel: z.object({
      id: SnowflakeSchema,
      name: z.string(),
      category: z.string(),
    }),
    guildName: z.string(),
    channelNames: z.record(z.string()),
    token: z.string().min(1, 'Token is required'),
    credential: DriveCredentialSchema,
    settings: z.object({
      scratchRoot: z.string().min(1),
      fallbackRoot: z.string().min(1),
      rootFolderName: z.string().min(1),
      maxUploadRetries: z.number().int().positive(),
      uploadRetryBaseDelayMs: z.number().int().nonnegative(),
      messageFetchSize: z.number().int().positive().max(100),
      discordApiBaseUrl: z.string().url(),
      discordAuthScheme: z.enum(['Bot', 'Bearer']),
      chromeExecutablePath: z.string().min(1),
      pdfSettleDelayMs: z.number().int().nonnegative(),
      pdfNavigationTimeoutMs: z.number().int().positive(),
    }),
  })
  .transform((job): ArchiveJobData => job);

/**
 * Messages exchanged with a worker process over IPC
 */
export const WorkerRequestSchema = z.object({
  type: z.literal('job'),
  job: ArchiveJobSchema,
});

export const WorkerResponseSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('state'),
    channelId: z.string(),
    state: ArchiveWorkerStateSchema,
  }),
  z.object({
    type: z.literal('result'),
    result: WorkerResultSchema,
  }),
]);

export interface WorkerRequest {
  type: 'job';
  job: ArchiveJobData;
}
export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;
