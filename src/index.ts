import { loadedFrom } from './env.js';

import { createApp, VERSION } from './app.js';
import { ensureAppDirectories, getAllPaths } from './services/app-paths.service.js';
import { initializeConfig, getStoreSettings, hasApiKey } from './services/config.service.js';
import { ApprovalStore } from './services/approval-store.service.js';
import { AudiobookLibrary } from './services/library.service.js';
import { createServiceLogger } from './services/logger.service.js';

const logger = createServiceLogger('server');

const PORT = Number(process.env.PORT) || 3001;
const CLIENT_URL = process.env.CLIENT_URL || 'http://localhost:5173';

// =============================================================================
// Server Startup
// =============================================================================

async function startServer(): Promise<void> {
  if (loadedFrom) {
    logger.debug({ path: loadedFrom }, 'Loaded environment variables');
  }

  ensureAppDirectories();
  const config = initializeConfig();
  logger.info({ version: config.version, paths: getAllPaths() }, 'Configuration loaded');

  if (!hasApiKey('anthropic')) {
    logger.info('No Anthropic API key configured, language-model inference disabled');
  }

  const store = new ApprovalStore(getStoreSettings().documentPath);
  const library = new AudiobookLibrary({ store });
  const loaded = await library.load();
  logger.info({ entities: loaded.loaded, skipped: loaded.skipped }, 'Entity document loaded');

  const app = createApp(library, { clientUrl: CLIENT_URL, logRequests: true });

  const server = app.listen(PORT, () => {
    logger.info({ port: PORT, version: VERSION }, `Tomekeeper running at http://localhost:${PORT}/api`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Shutting down gracefully');

    server.close(() => {
      library.save()
        .then((result) => {
          logger.info({ saved: result.saved }, 'Entities saved');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Failed to save entities on shutdown');
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start server');
  process.exit(1);
});
