import 'dotenv/config';
import { createApp } from './app.js';
import { config } from './config/env.js';
import { loadDriveCredential } from './config/credentials.js';
import { buildWorkerSettings } from './config/workerSettings.js';
import { MessageSourceFactory } from './adapters/index.js';
import {
  createDriveFilesClient,
  DriveArchiveStore,
} from './services/archiveStore/index.js';
import { ArchiveServiceImpl } from './services/archive/index.js';
import { ArchiveOrchestrator, createForkedJobRunner } from './workers/index.js';
import logger from './utils/logger.js';

const PORT = config.PORT;

/**
 * Start the application
 */
async function startServer() {
  try {
    // Missing or invalid Drive credentials stop startup before any worker runs
    const credential = loadDriveCredential(config);
    const settings = buildWorkerSettings(config);

    const archiveService = new ArchiveServiceImpl({
      session: { token: config.DISCORD_BOT_TOKEN, credential },
      settings,
      source: MessageSourceFactory.createDiscord({
        token: config.DISCORD_BOT_TOKEN,
        authScheme: config.DISCORD_AUTH_SCHEME,
        baseUrl: config.DISCORD_API_BASE_URL,
      }),
      store: new DriveArchiveStore(createDriveFilesClient(credential), {
        rootFolderName: config.ARCHIVE_ROOT_FOLDER,
      }),
      orchestrator: new ArchiveOrchestrator(
        createForkedJobRunner(),
        config.MAX_WORKERS
      ),
    });

    const app = createApp({ archiveService });

    const server = app.listen(PORT, () => {
      logger.info('Server started', {
        port: PORT,
        environment: config.NODE_ENV,
        maxWorkers: config.MAX_WORKERS,
      });
    });

    // Graceful shutdown handling
    const gracefulShutdown = (signal: string) => {
      logger.info('Signal received, starting graceful shutdown', { signal });

      // Running worker processes are not cancelled; they finish or die with us
      server.close(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Graceful shutdown timeout - forcing exit');
        process.exit(1);
      }, 30000).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

// Start the server
void startServer();
