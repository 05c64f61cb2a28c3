import { Router, Request, Response } from 'express';
import { createArchiveRouter } from './archive.js';
import type { ArchiveService } from '../services/archive/index.js';

export function createRouter(archiveService: ArchiveService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'Discord Archiver API',
      version: '1.0.0',
    });
  });

  router.use(createArchiveRouter(archiveService));

  return router;
}
