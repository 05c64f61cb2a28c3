/**
 * Guild listing and archive run routes
 */

import { Router, Request, Response } from 'express';
import {
  validateApiKey,
  asyncHandler,
  validateRequest,
  parseOrThrow,
  toApiError,
} from '../middleware/index.js';
import type { ArchiveService } from '../services/archive/index.js';
import {
  ArchiveRunParamsSchema,
  CreateArchiveRunSchema,
  GuildParamsSchema,
} from '../validation/archive/schemas.js';

/**
 * Create archive router bound to a service instance
 */
export function createArchiveRouter(archiveService: ArchiveService): Router {
  const router = Router();

  router.use(validateApiKey);

  /**
   * GET /api/guilds
   */
  router.get(
    '/guilds',
    asyncHandler(async (_req: Request, res: Response) => {
      const result = await archiveService.listGuilds();
      if (!result.success) {
        throw toApiError(result.error);
      }
      res.json({ guilds: result.data });
    })
  );

  /**
   * GET /api/guilds/:guildId/channels
   * Channels with their archived flag
   */
  router.get(
    '/guilds/:guildId/channels',
    validateRequest({ params: GuildParamsSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const result = await archiveService.listChannels(req.params.guildId);
      if (!result.success) {
        throw toApiError(result.error);
      }
      res.json(result.data);
    })
  );

  /**
   * POST /api/archives
   * Start archiving the selected channels; progress is polled by run id
   */
  router.post(
    '/archives',
    asyncHandler(async (req: Request, res: Response) => {
      const input = parseOrThrow(CreateArchiveRunSchema, req.body);

      const result = await archiveService.startRun(input);
      if (!result.success) {
        throw toApiError(result.error);
      }

      res.status(202).json({
        runId: result.data.id,
        message: `Archiving ${result.data.channels.length} channel(s) from ${result.data.guild.name}`,
      });
    })
  );

  /**
   * GET /api/archives/:runId
   */
  router.get(
    '/archives/:runId',
    validateRequest({ params: ArchiveRunParamsSchema }),
    asyncHandler(async (req: Request, res: Response) => {
      const result = await archiveService.getRun(req.params.runId);
      if (!result.success) {
        throw toApiError(result.error);
      }
      res.json(result.data);
    })
  );

  return router;
}
