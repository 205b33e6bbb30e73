/**
 * Express application
 *
 * Built separately from the entry point so tests can mount it with supertest.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import type { AudiobookLibrary } from './services/library.service.js';
import { requestLogger } from './services/logger.service.js';
import { errorHandler, notFoundHandler, sendSuccess } from './middleware/response.middleware.js';
import { createEntityRoutes } from './routes/entities.routes.js';
import { createScanRoutes } from './routes/scan.routes.js';

export const VERSION = '0.1.0';

export interface AppOptions {
  /** Allowed CORS origin for the approval UI */
  clientUrl?: string;
  /** Attach the pino request logger */
  logRequests?: boolean;
}

export function createApp(library: AudiobookLibrary, options: AppOptions = {}): Express {
  const app = express();

  // ===========================================================================
  // Middleware
  // ===========================================================================

  app.use(cors(options.clientUrl ? { origin: options.clientUrl } : undefined));
  app.use(express.json());
  if (options.logRequests) {
    app.use(requestLogger());
  }

  // ===========================================================================
  // API Routes
  // ===========================================================================

  app.get('/api/health', (_req, res) => {
    sendSuccess(res, {
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
      entities: library.store.size,
    });
  });

  app.use('/api/entities', createEntityRoutes(library));
  app.use('/api/scan', createScanRoutes(library));

  // ===========================================================================
  // Error Handling
  // ===========================================================================

  app.use('/api', notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
