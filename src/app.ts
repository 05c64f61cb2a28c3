import express, { Application, Request, Response } from 'express';
import { createRouter } from './routes/index.js';
import { errorHandler, requestLogger } from './middleware/index.js';
import type { ArchiveService } from './services/archive/index.js';

export interface AppDependencies {
  archiveService: ArchiveService;
}

export const createApp = ({ archiveService }: AppDependencies): Application => {
  const app = express();

  // Request logging middleware
  app.use(requestLogger);

  app.use(express.json());

  app.use('/api', createRouter(archiveService));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Centralized error handling middleware
  app.use(errorHandler);

  return app;
};
